import { CanonicalStatus, RejectionReason } from '../domain/enums';
import {
  JsonObject,
  ShipmentReference,
  hasShipmentKey,
  isJsonObject,
} from '../domain/models';
import { MalformedPayloadError, toError } from '../errors';
import {
  CarrierAdapter,
  ExtractedOccurrence,
  StorageAdapter,
} from '../interfaces';
import { OccurrenceCodeRegistry } from '../registry';
import { computeDedupKey } from './dedup-key';
import { CanonicalEvent, NormalizationResult, RejectedEvent } from './types';

export interface EventNormalizerOptions {
  /**
   * Used for sources without a registered adapter
   */
  fallbackAdapter?: CarrierAdapter;
}

/**
 * Turns raw carrier payloads into canonical events
 *
 * Never drops an event: anything it cannot resolve comes back as a
 * RejectedEvent for the replay queue or for manual review.
 */
export class EventNormalizer {
  private readonly adapters = new Map<string, CarrierAdapter>();

  constructor(
    private readonly registry: OccurrenceCodeRegistry,
    private readonly storageAdapter: StorageAdapter,
    adapters: Iterable<CarrierAdapter>,
    private readonly options: EventNormalizerOptions = {},
  ) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.source.toLowerCase(), adapter);
    }
  }

  registerAdapter(adapter: CarrierAdapter): void {
    this.adapters.set(adapter.source.toLowerCase(), adapter);
  }

  getSources(): string[] {
    return Array.from(this.adapters.keys());
  }

  async normalize(
    rawPayload: unknown,
    source: string,
    receivedAt: Date,
    shipmentHint?: ShipmentReference,
  ): Promise<NormalizationResult> {
    const payload = this.coercePayload(rawPayload);
    if (!payload) {
      return this.reject(
        RejectionReason.MALFORMED_PAYLOAD,
        'Payload is not a JSON object',
        source,
        rawPayload,
        shipmentHint ?? null,
        receivedAt,
      );
    }

    const adapter =
      this.adapters.get(source.toLowerCase()) ?? this.options.fallbackAdapter;
    if (!adapter) {
      return this.reject(
        RejectionReason.MALFORMED_PAYLOAD,
        `No carrier adapter registered for source ${source}`,
        source,
        payload,
        shipmentHint ?? null,
        receivedAt,
      );
    }

    let extracted: ExtractedOccurrence;
    try {
      extracted = adapter.extract(payload);
    } catch (error) {
      const message =
        error instanceof MalformedPayloadError
          ? error.message
          : `Carrier adapter ${adapter.source} failed: ${toError(error).message}`;
      return this.reject(
        RejectionReason.MALFORMED_PAYLOAD,
        message,
        source,
        payload,
        shipmentHint ?? null,
        receivedAt,
      );
    }

    const shipmentRef = this.mergeReference(extracted.shipmentRef, shipmentHint);
    if (!hasShipmentKey(shipmentRef)) {
      return this.reject(
        RejectionReason.MALFORMED_PAYLOAD,
        'Payload carries no usable shipment reference',
        source,
        payload,
        null,
        receivedAt,
      );
    }

    const shipment = await this.storageAdapter.findShipment(shipmentRef);
    if (!shipment) {
      return this.reject(
        RejectionReason.UNRESOLVED_SHIPMENT,
        `No shipment matches ${this.describeReference(shipmentRef)}`,
        source,
        payload,
        shipmentRef,
        receivedAt,
      );
    }

    const event = this.buildCanonicalEvent(
      extracted,
      payload,
      source,
      shipment.id,
      receivedAt,
    );

    return { kind: 'canonical', event, shipment };
  }

  /**
   * Shipment reference a payload points at, without touching storage.
   * Null when the payload cannot be read.
   */
  peekReference(
    rawPayload: unknown,
    source: string,
    shipmentHint?: ShipmentReference,
  ): ShipmentReference | null {
    const payload = this.coercePayload(rawPayload);
    const adapter =
      this.adapters.get(source.toLowerCase()) ?? this.options.fallbackAdapter;
    if (!payload || !adapter) {
      return shipmentHint ?? null;
    }

    try {
      return this.mergeReference(adapter.extract(payload).shipmentRef, shipmentHint);
    } catch {
      return shipmentHint ?? null;
    }
  }

  private buildCanonicalEvent(
    extracted: ExtractedOccurrence,
    payload: JsonObject,
    source: string,
    shipmentId: string,
    receivedAt: Date,
  ): CanonicalEvent {
    let canonicalStatus = CanonicalStatus.UNCLASSIFIED;
    let occurrence: CanonicalEvent['occurrence'] = null;

    if (extracted.occurrenceCode) {
      const lookup = this.registry.lookup(
        extracted.occurrenceCode,
        extracted.carrier,
      );
      if (lookup.kind === 'known') {
        occurrence = lookup.occurrence;
        canonicalStatus = lookup.occurrence.canonicalStatus;
      }
    }

    const occurredAtEstimated = extracted.occurredAt === null;
    const occurredAt = extracted.occurredAt ?? receivedAt;

    return {
      shipmentId,
      carrier: extracted.carrier,
      occurrence,
      occurrenceCode: extracted.occurrenceCode,
      canonicalStatus,
      source,
      occurredAt,
      occurredAtEstimated,
      receivedAt,
      needsReview: canonicalStatus === CanonicalStatus.UNCLASSIFIED,
      carrierEventId: extracted.carrierEventId,
      description: extracted.description ?? occurrence?.description ?? null,
      location: extracted.location,
      rawPayload: payload,
      dedupKey: computeDedupKey({
        shipmentId,
        source,
        carrierEventId: extracted.carrierEventId,
        occurrenceCode: extracted.occurrenceCode,
        description: extracted.description,
        occurredAt,
        occurredAtEstimated,
        payload,
      }),
    };
  }

  /**
   * Hint keys override whatever the payload carries
   */
  private mergeReference(
    extracted: ShipmentReference,
    hint?: ShipmentReference,
  ): ShipmentReference {
    const merged: ShipmentReference = { ...extracted };
    if (!hint) {
      return merged;
    }
    if (hint.shipmentId) merged.shipmentId = hint.shipmentId;
    if (hint.trackingCode) merged.trackingCode = hint.trackingCode;
    if (hint.invoiceNumber) merged.invoiceNumber = hint.invoiceNumber;
    if (hint.document) merged.document = hint.document;
    return merged;
  }

  private coercePayload(rawPayload: unknown): JsonObject | null {
    if (isJsonObject(rawPayload) && !Buffer.isBuffer(rawPayload)) {
      return rawPayload;
    }

    let text: string | null = null;
    if (Buffer.isBuffer(rawPayload)) {
      text = rawPayload.toString('utf8');
    } else if (typeof rawPayload === 'string') {
      text = rawPayload;
    }
    if (text === null) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return isJsonObject(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private describeReference(ref: ShipmentReference): string {
    return Object.entries(ref)
      .filter(([, value]) => Boolean(value))
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(', ');
  }

  private reject(
    reason: RejectionReason,
    message: string,
    source: string,
    rawPayload: unknown,
    shipmentRef: ShipmentReference | null,
    receivedAt: Date,
  ): NormalizationResult {
    const rejection: RejectedEvent = {
      reason,
      source,
      rawPayload,
      shipmentRef,
      receivedAt,
      message,
    };
    return { kind: 'rejected', rejection };
  }
}
