import { CanonicalStatus } from '../domain/enums';

/**
 * Mirror of a stored tracking event together with its raw carrier payload
 */
export interface ArchivedEventRecord {
  kind: 'event';
  shipmentId: string;
  eventId: string;
  source: string;
  occurrenceCode: string | null;
  canonicalStatus: CanonicalStatus;
  occurredAt: Date;
  receivedAt: Date;
  rawPayload: unknown;
}

/**
 * Snapshot of one applied status transition
 */
export interface ArchivedTransitionRecord {
  kind: 'transition';
  shipmentId: string;
  eventId: string | null;
  fromStatus: CanonicalStatus;
  toStatus: CanonicalStatus;
  statusVersion: number;
  transitionedAt: Date;
}

export type ArchiveRecord = ArchivedEventRecord | ArchivedTransitionRecord;

/**
 * Idempotency key of an archive record; writes are upserts on it
 */
export function archiveRecordKey(record: ArchiveRecord): string {
  switch (record.kind) {
    case 'event':
      return `event:${record.shipmentId}:${record.eventId}`;
    case 'transition':
      return `transition:${record.shipmentId}:${record.statusVersion}`;
  }
}

/**
 * Archive adapter interface - secondary, write-only mirror
 * Never read for status derivation
 */
export interface ArchiveAdapter {
  upsert(record: ArchiveRecord): Promise<void>;
  isHealthy(): Promise<boolean>;
  close?(): Promise<void>;
}
