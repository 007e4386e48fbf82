import { AnomalyKind, CanonicalStatus } from '../domain/enums';
import { Shipment, TrackingEvent } from '../domain/models';

/**
 * State transition definition
 */
export interface StateTransition {
  from: CanonicalStatus;
  to: CanonicalStatus;
  conditions?: TransitionCondition[];
  metadata?: {
    description: string;
    terminal?: boolean;
    recovery?: boolean;
  };
}

/**
 * Transition condition - must be met for transition to be valid
 */
export interface TransitionCondition {
  name: string;
  evaluate: (context: TransitionContext) => boolean;
  errorMessage?: string;
}

/**
 * Context for evaluating transitions
 */
export interface TransitionContext {
  currentStatus: CanonicalStatus;
  targetStatus: CanonicalStatus;

  /**
   * Highest progress rank the shipment has reached so far. Stays put while
   * the shipment sits in exception.
   */
  progressRank: number;
}

export interface TransitionResult {
  success: boolean;
  fromStatus: CanonicalStatus;
  toStatus: CanonicalStatus;
  reason?: string;
  conditionFailures?: string[];
}

export interface StateMachineConfig {
  initialState: CanonicalStatus;
  transitions: StateTransition[];
}

/**
 * Accumulator of the status fold
 */
export interface FoldState {
  status: CanonicalStatus;
  progressRank: number;
  lastAppliedEventId: string | null;
}

export type FoldOutcome = 'applied' | 'noop' | 'anomaly';

/**
 * What one event did to the fold
 */
export interface FoldStep {
  event: TrackingEvent;
  outcome: FoldOutcome;
  anomaly: AnomalyKind | null;
  statusBefore: CanonicalStatus;
  statusAfter: CanonicalStatus;
  reason?: string;
}

export interface Derivation extends FoldState {
  steps: FoldStep[];
}

/**
 * Result of applying one event (or a reconciliation) to a stored shipment
 */
export type TransitionOutcome =
  | {
      kind: 'applied';
      shipment: Shipment;
      fromStatus: CanonicalStatus;
      toStatus: CanonicalStatus;
      statusVersion: number;
      triggeringEventId: string | null;
      anomaly: AnomalyKind | null;

      /**
       * The triggering event sorted before the latest stored one
       */
      late: boolean;
    }
  | {
      kind: 'unchanged';
      shipment: Shipment;
      anomaly: AnomalyKind | null;
      late: boolean;
    };
