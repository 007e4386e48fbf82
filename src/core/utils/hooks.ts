import { Logger } from '@nestjs/common';
import { toError } from '../errors';

/**
 * Run an optional lifecycle hook. Hook failures are logged, never rethrown.
 */
export async function invokeHook<TArgs extends unknown[]>(
  logger: Logger,
  name: string,
  hook: ((...args: TArgs) => void | Promise<void>) | undefined,
  ...args: TArgs
): Promise<void> {
  if (!hook) {
    return;
  }

  try {
    await hook(...args);
  } catch (error) {
    logger.warn(`Lifecycle hook ${name} failed: ${toError(error).message}`);
  }
}
