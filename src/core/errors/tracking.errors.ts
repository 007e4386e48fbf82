import { CanonicalStatus } from '../domain/enums';

/**
 * Carrier adapter could not read the payload at all
 */
export class MalformedPayloadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * Raised by storage adapters when the dedup key already exists
 */
export class DuplicateEventError extends Error {
  constructor(
    message: string,
    public readonly dedupKey: string,
  ) {
    super(message);
    this.name = 'DuplicateEventError';
  }
}

/**
 * Transition not allowed by the transition table
 */
export class InvalidTransitionError extends Error {
  constructor(
    message: string,
    public readonly fromStatus: CanonicalStatus,
    public readonly toStatus: CanonicalStatus,
  ) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * One automation action failed; sibling actions still run
 */
export class ActionFailureError extends Error {
  constructor(
    message: string,
    public readonly actionType: string,
    public readonly actionIndex: number,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ActionFailureError';
  }
}

/**
 * Optimistic concurrency check on currentStatusVersion lost the race
 */
export class StorageConflictError extends Error {
  constructor(
    message: string,
    public readonly shipmentId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number | null,
  ) {
    super(message);
    this.name = 'StorageConflictError';
  }
}

/**
 * (shipment, rule, status version) was already claimed
 */
export class InvocationAlreadyClaimedError extends Error {
  constructor(
    message: string,
    public readonly invocationKey: string,
  ) {
    super(message);
    this.name = 'InvocationAlreadyClaimedError';
  }
}

export class ShipmentNotFoundError extends Error {
  constructor(
    message: string,
    public readonly shipmentId: string,
  ) {
    super(message);
    this.name = 'ShipmentNotFoundError';
  }
}

export class ShipmentAlreadyExistsError extends Error {
  constructor(
    message: string,
    public readonly trackingCode: string,
  ) {
    super(message);
    this.name = 'ShipmentAlreadyExistsError';
  }
}

/**
 * Registry reload rejected; the previous table stays in effect
 */
export class RegistryReloadError extends Error {
  constructor(
    message: string,
    public readonly problems: string[],
  ) {
    super(message);
    this.name = 'RegistryReloadError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
