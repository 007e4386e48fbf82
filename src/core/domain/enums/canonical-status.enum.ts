/**
 * Canonical shipment lifecycle states
 * Every carrier occurrence code resolves to exactly one of these
 */
export enum CanonicalStatus {
  /**
   * Initial state - shipment registered, nothing physical has happened yet
   */
  CREATED = 'created',

  /**
   * Picked up by the carrier
   */
  COLLECTED = 'collected',

  IN_TRANSIT = 'in_transit',

  OUT_FOR_DELIVERY = 'out_for_delivery',

  /**
   * Delivered to the recipient (terminal state)
   */
  DELIVERED = 'delivered',

  /**
   * Delivery problem; reachable from any non-terminal state
   */
  EXCEPTION = 'exception',

  /**
   * Returned to sender (terminal state)
   */
  RETURNED = 'returned',

  /**
   * Occurrence code not present in the registry. Recorded and flagged for
   * review, never adopted as a shipment's current status
   */
  UNCLASSIFIED = 'unclassified',
}

const PROGRESS_RANKS: Partial<Record<CanonicalStatus, number>> = {
  [CanonicalStatus.CREATED]: 0,
  [CanonicalStatus.COLLECTED]: 1,
  [CanonicalStatus.IN_TRANSIT]: 2,
  [CanonicalStatus.OUT_FOR_DELIVERY]: 3,
  [CanonicalStatus.DELIVERED]: 4,
  [CanonicalStatus.RETURNED]: 4,
};

/**
 * Forward progress statuses in order, used for gap detection
 */
export const PROGRESS_SEQUENCE: readonly CanonicalStatus[] = [
  CanonicalStatus.CREATED,
  CanonicalStatus.COLLECTED,
  CanonicalStatus.IN_TRANSIT,
  CanonicalStatus.OUT_FOR_DELIVERY,
  CanonicalStatus.DELIVERED,
];

/**
 * Position of a status on the forward progress line.
 * Exception and unclassified carry no rank.
 */
export function progressRank(status: CanonicalStatus): number | undefined {
  return PROGRESS_RANKS[status];
}

/**
 * Helper to determine if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: CanonicalStatus): boolean {
  return (
    status === CanonicalStatus.DELIVERED || status === CanonicalStatus.RETURNED
  );
}

export function isCanonicalStatus(value: unknown): value is CanonicalStatus {
  const values: readonly string[] = Object.values(CanonicalStatus);
  return typeof value === 'string' && values.includes(value);
}

/**
 * Display catalogue for the canonical statuses
 */
export const STATUS_METADATA: Record<
  CanonicalStatus,
  { label: string; description: string }
> = {
  [CanonicalStatus.CREATED]: {
    label: 'Created',
    description: 'Shipment registered, awaiting pickup',
  },
  [CanonicalStatus.COLLECTED]: {
    label: 'Collected',
    description: 'Picked up by the carrier',
  },
  [CanonicalStatus.IN_TRANSIT]: {
    label: 'In transit',
    description: 'Moving through the carrier network',
  },
  [CanonicalStatus.OUT_FOR_DELIVERY]: {
    label: 'Out for delivery',
    description: 'On the vehicle for final delivery',
  },
  [CanonicalStatus.DELIVERED]: {
    label: 'Delivered',
    description: 'Delivered to the recipient',
  },
  [CanonicalStatus.EXCEPTION]: {
    label: 'Exception',
    description: 'Delivery problem reported by the carrier',
  },
  [CanonicalStatus.RETURNED]: {
    label: 'Returned',
    description: 'Returned to the sender',
  },
  [CanonicalStatus.UNCLASSIFIED]: {
    label: 'Unclassified',
    description: 'Unknown carrier occurrence, pending review',
  },
};
