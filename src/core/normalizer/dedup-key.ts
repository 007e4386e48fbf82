import { createHash } from 'crypto';
import { stableStringify } from '../utils';

export interface DedupKeyInput {
  shipmentId: string;
  source: string;
  carrierEventId: string | null;
  occurrenceCode: string | null;
  description: string | null;
  occurredAt: Date;
  occurredAtEstimated: boolean;
  payload: unknown;
}

/**
 * Deterministic deduplication key.
 *
 * - carrier event id present: (source, carrier event id)
 * - otherwise: (shipment, source, code, occurredAt)
 * - occurredAt estimated from arrival time: the arrival time differs between
 *   retries, so the canonical payload stands in for it
 */
export function computeDedupKey(input: DedupKeyInput): string {
  let parts: string[];

  if (input.carrierEventId) {
    parts = ['event', input.source, input.carrierEventId];
  } else if (input.occurredAtEstimated) {
    parts = [
      'payload',
      input.shipmentId,
      input.source,
      stableStringify(input.payload),
    ];
  } else {
    parts = [
      'occurrence',
      input.shipmentId,
      input.source,
      input.occurrenceCode ?? `desc:${input.description ?? ''}`,
      input.occurredAt.toISOString(),
    ];
  }

  return createHash('sha256').update(parts.join('|')).digest('hex');
}
