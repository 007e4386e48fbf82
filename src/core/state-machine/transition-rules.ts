import {
  CanonicalStatus,
  isTerminalStatus,
  progressRank,
} from '../domain/enums';
import { StateTransition, TransitionCondition } from './types';

/**
 * Leaving exception may not land below the progress reached before it
 */
export const NOT_BELOW_PROGRESS: TransitionCondition = {
  name: 'not_below_progress',
  evaluate: (context) => {
    const rank = progressRank(context.targetStatus);
    return rank !== undefined && rank >= context.progressRank;
  },
  errorMessage: 'Target status ranks below progress already reached',
};

/**
 * Shipment status transition rules
 *
 * Key principles:
 * - Progress only moves forward; skipping stages is allowed
 * - Exception and returned are reachable from any non-terminal state
 * - Delivered and returned are terminal
 * - Leaving exception resumes at or above the progress already reached
 */
export const TRANSITION_RULES: StateTransition[] = [
  // ============ Forward Progress ============

  {
    from: CanonicalStatus.CREATED,
    to: CanonicalStatus.COLLECTED,
    metadata: { description: 'Picked up by the carrier' },
  },
  {
    from: CanonicalStatus.CREATED,
    to: CanonicalStatus.IN_TRANSIT,
    metadata: { description: 'First sighting already in the network' },
  },
  {
    from: CanonicalStatus.CREATED,
    to: CanonicalStatus.OUT_FOR_DELIVERY,
    metadata: { description: 'First sighting on the delivery vehicle' },
  },
  {
    from: CanonicalStatus.CREATED,
    to: CanonicalStatus.DELIVERED,
    metadata: { description: 'Delivered without intermediate reports', terminal: true },
  },
  {
    from: CanonicalStatus.COLLECTED,
    to: CanonicalStatus.IN_TRANSIT,
    metadata: { description: 'Left the origin unit' },
  },
  {
    from: CanonicalStatus.COLLECTED,
    to: CanonicalStatus.OUT_FOR_DELIVERY,
    metadata: { description: 'Sent straight to delivery' },
  },
  {
    from: CanonicalStatus.COLLECTED,
    to: CanonicalStatus.DELIVERED,
    metadata: { description: 'Delivered', terminal: true },
  },
  {
    from: CanonicalStatus.IN_TRANSIT,
    to: CanonicalStatus.OUT_FOR_DELIVERY,
    metadata: { description: 'Loaded for final delivery' },
  },
  {
    from: CanonicalStatus.IN_TRANSIT,
    to: CanonicalStatus.DELIVERED,
    metadata: { description: 'Delivered', terminal: true },
  },
  {
    from: CanonicalStatus.OUT_FOR_DELIVERY,
    to: CanonicalStatus.DELIVERED,
    metadata: { description: 'Delivered', terminal: true },
  },

  // ============ Exceptions ============

  {
    from: CanonicalStatus.CREATED,
    to: CanonicalStatus.EXCEPTION,
    metadata: { description: 'Problem before pickup' },
  },
  {
    from: CanonicalStatus.COLLECTED,
    to: CanonicalStatus.EXCEPTION,
    metadata: { description: 'Problem after pickup' },
  },
  {
    from: CanonicalStatus.IN_TRANSIT,
    to: CanonicalStatus.EXCEPTION,
    metadata: { description: 'Problem in the network' },
  },
  {
    from: CanonicalStatus.OUT_FOR_DELIVERY,
    to: CanonicalStatus.EXCEPTION,
    metadata: { description: 'Delivery attempt failed' },
  },

  // ============ Returns ============

  {
    from: CanonicalStatus.CREATED,
    to: CanonicalStatus.RETURNED,
    metadata: { description: 'Returned to sender', terminal: true },
  },
  {
    from: CanonicalStatus.COLLECTED,
    to: CanonicalStatus.RETURNED,
    metadata: { description: 'Returned to sender', terminal: true },
  },
  {
    from: CanonicalStatus.IN_TRANSIT,
    to: CanonicalStatus.RETURNED,
    metadata: { description: 'Returned to sender', terminal: true },
  },
  {
    from: CanonicalStatus.OUT_FOR_DELIVERY,
    to: CanonicalStatus.RETURNED,
    metadata: { description: 'Returned to sender', terminal: true },
  },
  {
    from: CanonicalStatus.EXCEPTION,
    to: CanonicalStatus.RETURNED,
    metadata: { description: 'Returned after an exception', terminal: true },
  },

  // ============ Exception Recovery ============

  {
    from: CanonicalStatus.EXCEPTION,
    to: CanonicalStatus.CREATED,
    conditions: [NOT_BELOW_PROGRESS],
    metadata: { description: 'Pickup rescheduled', recovery: true },
  },
  {
    from: CanonicalStatus.EXCEPTION,
    to: CanonicalStatus.COLLECTED,
    conditions: [NOT_BELOW_PROGRESS],
    metadata: { description: 'Collected after an exception', recovery: true },
  },
  {
    from: CanonicalStatus.EXCEPTION,
    to: CanonicalStatus.IN_TRANSIT,
    conditions: [NOT_BELOW_PROGRESS],
    metadata: { description: 'Moving again after an exception', recovery: true },
  },
  {
    from: CanonicalStatus.EXCEPTION,
    to: CanonicalStatus.OUT_FOR_DELIVERY,
    conditions: [NOT_BELOW_PROGRESS],
    metadata: { description: 'Delivery re-attempt', recovery: true },
  },
  {
    from: CanonicalStatus.EXCEPTION,
    to: CanonicalStatus.DELIVERED,
    conditions: [NOT_BELOW_PROGRESS],
    metadata: { description: 'Delivered after an exception', terminal: true, recovery: true },
  },
];

/**
 * Get terminal states (no further transitions possible)
 */
export function getTerminalStates(): CanonicalStatus[] {
  return Object.values(CanonicalStatus).filter(isTerminalStatus);
}

export function isTerminalState(status: CanonicalStatus): boolean {
  return isTerminalStatus(status);
}

export function getInitialState(): CanonicalStatus {
  return CanonicalStatus.CREATED;
}
