import {
  CarrierAdapter,
  ExtractedOccurrence,
  JsonObject,
  MalformedPayloadError,
} from '../../../core';
import { parseCarrierTimestamp, readString } from '../payload-readers';

/**
 * Adapter for integrations that already speak the engine's vocabulary:
 *
 * { trackingCode | shipmentId | invoiceNumber + document,
 *   code, occurredAt, eventId?, carrier?, description?, location? }
 *
 * Also the fallback for sources without a dedicated adapter.
 */
export class GenericCarrierAdapter implements CarrierAdapter {
  constructor(
    readonly source = 'generic',
    private readonly timezoneOffset = 'Z',
  ) {}

  extract(payload: JsonObject): ExtractedOccurrence {
    const shipmentId = readString(payload, 'shipmentId', 'shipment_id');
    const trackingCode = readString(payload, 'trackingCode', 'tracking_code');
    const invoiceNumber = readString(payload, 'invoiceNumber', 'invoice_number');
    const document = readString(payload, 'document');
    const occurrenceCode = readString(
      payload,
      'code',
      'occurrenceCode',
      'occurrence_code',
      'status',
    );

    if (!shipmentId && !trackingCode && !invoiceNumber && !occurrenceCode) {
      throw new MalformedPayloadError(
        'Payload carries neither a shipment reference nor an occurrence code',
        this.source,
      );
    }

    return {
      carrier: (readString(payload, 'carrier') ?? this.source).toLowerCase(),
      shipmentRef: {
        shipmentId: shipmentId ?? undefined,
        trackingCode: trackingCode ?? undefined,
        invoiceNumber: invoiceNumber ?? undefined,
        document: document ?? undefined,
      },
      occurrenceCode,
      occurredAt: parseCarrierTimestamp(
        readString(payload, 'occurredAt', 'occurred_at', 'timestamp'),
        this.timezoneOffset,
      ),
      carrierEventId: readString(payload, 'eventId', 'event_id', 'id'),
      description: readString(payload, 'description', 'message'),
      location: readString(payload, 'location'),
    };
  }
}
