import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import type { AutomationDispatcher, RecoverySummary } from '../../../core';
import type { TrackingModuleConfig } from '../tracking.config';
import { AUTOMATION_DISPATCHER, TRACKING_CONFIG } from '../constants';

/**
 * Invocation Recovery Processor
 *
 * Picks up automation invocations that failed or were interrupted and
 * runs their missing actions again
 */
@Injectable()
export class InvocationRecoveryProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(InvocationRecoveryProcessor.name);
  private intervalId?: NodeJS.Timeout;
  private isProcessing = false;

  constructor(
    @Inject(AUTOMATION_DISPATCHER)
    private readonly dispatcher: AutomationDispatcher,
    @Inject(TRACKING_CONFIG)
    private readonly config: TrackingModuleConfig,
  ) {}

  onModuleInit(): void {
    if (this.config.processors?.recovery?.enabled) {
      this.startProcessing();
    }
  }

  onModuleDestroy(): void {
    this.stopProcessing();
  }

  startProcessing(): void {
    const intervalMs = this.config.processors?.recovery?.intervalMs ?? 60000;

    this.logger.log(`Starting invocation recovery (interval: ${intervalMs}ms)`);

    this.intervalId = setInterval(() => {
      void this.recover();
    }, intervalMs);
  }

  stopProcessing(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped invocation recovery');
    }
  }

  async recover(now: Date = new Date()): Promise<RecoverySummary | null> {
    if (this.isProcessing) {
      return null;
    }

    this.isProcessing = true;

    try {
      const summary = await this.dispatcher.retryIncomplete(now);
      if (summary.retried > 0) {
        this.logger.log(
          `Recovered invocations: ${summary.completed}/${summary.retried} completed, ${summary.abandoned} abandoned`,
        );
      }
      return summary;
    } catch (error) {
      this.logger.error('Error recovering automation invocations:', error);
      return null;
    } finally {
      this.isProcessing = false;
    }
  }
}
