import { AnomalyKind, CanonicalStatus } from '../domain/enums';
import { TrackingEvent, UnresolvedEvent } from '../domain/models';
import { StorageStatistics } from '../interfaces';
import { FoldOutcome } from '../state-machine';
import { TimelineGap } from '../timeline';

export interface CurrentStatusView {
  shipmentId: string;
  trackingCode: string;
  status: CanonicalStatus;
  label: string;
  description: string;
  statusVersion: number;
  lastEventId: string | null;
  isTerminal: boolean;
  updatedAt: Date;
}

export interface TimelineEntry {
  event: TrackingEvent;
  outcome: FoldOutcome;
  anomaly: AnomalyKind | null;
  statusAfter: CanonicalStatus;
}

/**
 * Ordered timeline annotated with what each event did to the status
 */
export interface TimelineView {
  shipmentId: string;
  currentStatus: CanonicalStatus;
  statusVersion: number;

  /**
   * Status the fold arrives at; differs from currentStatus only while a
   * transition is in flight or was lost (see reconcileShipment)
   */
  derivedStatus: CanonicalStatus;
  consistent: boolean;
  entries: TimelineEntry[];
  gaps: TimelineGap[];
}

export interface ReviewQueue {
  /**
   * Parked events that ran out of retries or could not be read
   */
  unresolved: UnresolvedEvent[];

  /**
   * Stored events with an occurrence code unknown to the registry
   */
  unclassified: TrackingEvent[];
}

export interface EngineStatistics extends StorageStatistics {
  registry: {
    source: string;
    generation: number;
    entries: number;
  };
  archive: {
    pending: number;
    written: number;
    dropped: number;
  } | null;
}
