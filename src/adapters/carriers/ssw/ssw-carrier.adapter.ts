import {
  CarrierAdapter,
  ExtractedOccurrence,
  JsonObject,
  MalformedPayloadError,
} from '../../../core';
import { parseCarrierTimestamp, readString } from '../payload-readers';

export interface SswCarrierAdapterOptions {
  /**
   * Offset of the local time SSW prints (default Brasília, -03:00)
   */
  timezoneOffset?: string;
}

/**
 * SSW tracking adapter
 *
 * Reads the scraper payload: tracking_code / invoice_number + document
 * identify the shipment, occurrence_code is the SSW numeric code, and the
 * timestamp is either `occurred_at` or the `date` + `time` pair printed on
 * the tracking page (DD/MM/YY HH:mm, carrier local time).
 */
export class SswCarrierAdapter implements CarrierAdapter {
  readonly source = 'ssw';
  private readonly timezoneOffset: string;

  constructor(options: SswCarrierAdapterOptions = {}) {
    this.timezoneOffset = options.timezoneOffset ?? '-03:00';
  }

  extract(payload: JsonObject): ExtractedOccurrence {
    const trackingCode = readString(payload, 'tracking_code', 'trackingCode');
    const invoiceNumber = readString(payload, 'invoice_number', 'invoiceNumber');
    const document = readString(payload, 'document', 'cnpj', 'cpf');
    const occurrenceCode = this.normalizeCode(
      readString(payload, 'occurrence_code', 'code'),
    );
    const description = readString(
      payload,
      'description',
      'status_raw',
      'status',
    );

    if (!trackingCode && !invoiceNumber && !occurrenceCode && !description) {
      throw new MalformedPayloadError(
        'SSW payload carries neither a shipment reference nor an occurrence',
        this.source,
      );
    }

    return {
      carrier: 'ssw',
      shipmentRef: {
        trackingCode: trackingCode ?? undefined,
        invoiceNumber: invoiceNumber ?? undefined,
        document: document ?? undefined,
      },
      occurrenceCode,
      occurredAt: this.extractTimestamp(payload),
      carrierEventId: readString(payload, 'event_id', 'eventId'),
      description,
      location: this.extractLocation(payload),
    };
  }

  private extractTimestamp(payload: JsonObject): Date | null {
    const explicit = readString(payload, 'occurred_at', 'datetime');
    if (explicit) {
      return parseCarrierTimestamp(explicit, this.timezoneOffset);
    }

    const date = readString(payload, 'date');
    const time = readString(payload, 'time');
    if (date && time) {
      return parseCarrierTimestamp(`${date} ${time}`, this.timezoneOffset);
    }

    return null;
  }

  private extractLocation(payload: JsonObject): string | null {
    const location = readString(payload, 'location');
    const unit = readString(payload, 'unit', 'unidade');
    if (location && unit) {
      return `${location} (${unit})`;
    }
    return location ?? unit;
  }

  /**
   * SSW prints codes zero-padded on some screens ("01")
   */
  private normalizeCode(code: string | null): string | null {
    if (!code) {
      return null;
    }
    return /^\d+$/.test(code) ? String(Number(code)) : code;
  }
}
