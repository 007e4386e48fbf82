import { RejectionReason } from '../domain/enums';
import {
  OccurrenceCode,
  Shipment,
  ShipmentReference,
} from '../domain/models';
import { CreateTrackingEventDto } from '../interfaces';

/**
 * Normalized event ready for the ingestion store
 */
export interface CanonicalEvent extends CreateTrackingEventDto {
  carrier: string;

  /**
   * Registry entry the code resolved to; null for unclassified events
   */
  occurrence: OccurrenceCode | null;
}

/**
 * Event the normalizer could not turn into a canonical event
 */
export interface RejectedEvent {
  reason: RejectionReason;
  source: string;
  rawPayload: unknown;
  shipmentRef: ShipmentReference | null;
  receivedAt: Date;
  message: string;
}

export type NormalizationResult =
  | { kind: 'canonical'; event: CanonicalEvent; shipment: Shipment }
  | { kind: 'rejected'; rejection: RejectedEvent };
