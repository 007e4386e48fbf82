import { CanonicalStatus } from '../enums';
import { JsonObject } from './shared.types';

/**
 * TrackingEvent domain model - one normalized carrier occurrence
 * Immutable once persisted; no two stored events share a dedupKey.
 * `sequence` is assigned by the store and grows with insertion order.
 */
export class TrackingEvent {
  constructor(
    public readonly id: string,
    public readonly shipmentId: string,
    public readonly occurrenceCode: string | null,
    public readonly canonicalStatus: CanonicalStatus,
    public readonly source: string,
    public readonly occurredAt: Date,
    public readonly receivedAt: Date,
    public readonly dedupKey: string,
    public readonly occurredAtEstimated: boolean = false,
    public readonly needsReview: boolean = false,
    public readonly carrierEventId: string | null = null,
    public readonly description: string | null = null,
    public readonly location: string | null = null,
    public readonly rawPayload: JsonObject = {},
    public readonly sequence: number = 0,
  ) {}

  isClassified(): boolean {
    return this.canonicalStatus !== CanonicalStatus.UNCLASSIFIED;
  }
}
