import { JsonObject, ShipmentReference } from '../domain/models';

/**
 * Fields a carrier adapter pulls out of a raw payload
 */
export interface ExtractedOccurrence {
  /**
   * Carrier whose code table applies (registry lookup key)
   */
  carrier: string;
  shipmentRef: ShipmentReference;
  occurrenceCode: string | null;

  /**
   * Carrier timestamp; null when missing or unparseable
   */
  occurredAt: Date | null;
  carrierEventId: string | null;
  description: string | null;
  location: string | null;
}

/**
 * Per-source translator from raw payload to occurrence fields.
 * Throws MalformedPayloadError when the payload cannot be read at all.
 */
export interface CarrierAdapter {
  readonly source: string;
  extract(payload: JsonObject): ExtractedOccurrence;
}
