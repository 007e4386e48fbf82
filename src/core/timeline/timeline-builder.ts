import {
  CanonicalStatus,
  PROGRESS_SEQUENCE,
  progressRank,
} from '../domain/enums';
import { TrackingEvent } from '../domain/models';
import { StorageAdapter, TimelineTieBreak } from '../interfaces';

export type TimelineGap =
  | {
      kind: 'skipped-stage';
      afterEventId: string | null;
      beforeEventId: string;
      missing: CanonicalStatus[];
    }
  | {
      kind: 'silence';
      afterEventId: string;
      beforeEventId: string;
      durationMs: number;
    };

export interface TimelineOptions {
  tieBreak: TimelineTieBreak;
  gapThresholdHours: number;
}

// Exception/unclassified sort after ranked statuses under the status-rank tie-break
const UNRANKED = Number.MAX_SAFE_INTEGER;

/**
 * Builds the ordered, gap-aware event sequence of a shipment
 *
 * Always recomputed from stored events; the order is total
 * (occurredAt, tie-break, receivedAt, id) so the same events always
 * produce the same timeline.
 */
export class TimelineBuilder {
  private readonly options: TimelineOptions;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    options: Partial<TimelineOptions> = {},
  ) {
    this.options = {
      tieBreak: 'received-at',
      gapThresholdHours: 72,
      ...options,
    };
  }

  async build(shipmentId: string): Promise<TrackingEvent[]> {
    const events = await this.storageAdapter.listTrackingEvents(shipmentId);
    return this.order(events);
  }

  /**
   * Sorted copy; the input is left untouched
   */
  order(events: readonly TrackingEvent[]): TrackingEvent[] {
    return [...events].sort((a, b) => this.compare(a, b));
  }

  compare(a: TrackingEvent, b: TrackingEvent): number {
    const byOccurrence = a.occurredAt.getTime() - b.occurredAt.getTime();
    if (byOccurrence !== 0) {
      return byOccurrence;
    }

    if (this.options.tieBreak === 'status-rank') {
      const byRank = this.rankOf(a) - this.rankOf(b);
      if (byRank !== 0) {
        return byRank;
      }
    }

    const byArrival = a.receivedAt.getTime() - b.receivedAt.getTime();
    if (byArrival !== 0) {
      return byArrival;
    }

    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  }

  /**
   * Skipped progress stages and long silences in an ordered timeline
   */
  gaps(events: readonly TrackingEvent[]): TimelineGap[] {
    const gaps: TimelineGap[] = [];
    const thresholdMs = this.options.gapThresholdHours * 60 * 60 * 1000;

    let reachedRank = 0;
    let lastProgressEventId: string | null = null;

    events.forEach((event, index) => {
      const previous = index > 0 ? events[index - 1] : undefined;
      if (previous) {
        const silenceMs =
          event.occurredAt.getTime() - previous.occurredAt.getTime();
        if (silenceMs > thresholdMs) {
          gaps.push({
            kind: 'silence',
            afterEventId: previous.id,
            beforeEventId: event.id,
            durationMs: silenceMs,
          });
        }
      }

      const sequenceIndex = PROGRESS_SEQUENCE.indexOf(event.canonicalStatus);
      if (sequenceIndex < 0) {
        return;
      }

      if (sequenceIndex > reachedRank + 1) {
        gaps.push({
          kind: 'skipped-stage',
          afterEventId: lastProgressEventId,
          beforeEventId: event.id,
          missing: PROGRESS_SEQUENCE.slice(reachedRank + 1, sequenceIndex),
        });
      }

      if (sequenceIndex >= reachedRank) {
        reachedRank = sequenceIndex;
        lastProgressEventId = event.id;
      }
    });

    return gaps;
  }

  private rankOf(event: TrackingEvent): number {
    return progressRank(event.canonicalStatus) ?? UNRANKED;
  }
}
