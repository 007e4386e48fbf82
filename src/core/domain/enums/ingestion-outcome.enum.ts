/**
 * Final fate of a raw event submitted to the ingestion pipeline
 */
export enum IngestionOutcome {
  /**
   * Persisted as a new tracking event
   */
  ACCEPTED = 'accepted',

  /**
   * Same dedup key already stored; nothing downstream runs
   */
  DUPLICATE = 'duplicate',

  /**
   * No shipment matched yet; parked in the replay queue
   */
  UNRESOLVED = 'unresolved',

  /**
   * Could not be read or replay window exhausted; waiting for a human
   */
  MANUAL_REVIEW = 'manual_review',

  /**
   * Primary store failure
   */
  FAILED = 'failed',
}

/**
 * Why the normalizer refused to produce a canonical event
 */
export enum RejectionReason {
  UNRESOLVED_SHIPMENT = 'unresolved_shipment',
  MALFORMED_PAYLOAD = 'malformed_payload',
}
