import { Logger } from '@nestjs/common';
import { IngestionOutcome, ReplayStatus } from '../domain/enums';
import { Shipment, UnresolvedEvent } from '../domain/models';
import { toError } from '../errors';
import { EngineEventBus } from '../events';
import { StorageAdapter } from '../interfaces';
import { IngestOptions, IngestionResult } from '../pipeline';
import { assertNever, backoffDelay } from '../utils';

/**
 * The part of the ingestion processor the replay queue drives
 */
export interface ReplayIngestor {
  ingestRawEvent(
    payload: unknown,
    source: string,
    options: IngestOptions,
  ): Promise<IngestionResult>;
}

export interface ReplayQueueOptions {
  windowMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  batchSize: number;
}

export interface ReplaySummary {
  attempted: number;
  resolved: number;
  pending: number;
  expired: number;
}

/**
 * Retries events parked because their shipment was unknown
 *
 * Triggered when a shipment is registered (replayFor) and periodically
 * (replayDue). Entries past the retry window move to manual review.
 */
export class ReplayQueue {
  private readonly logger = new Logger(ReplayQueue.name);
  private readonly options: ReplayQueueOptions;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly ingestor: ReplayIngestor,
    private readonly eventBus?: EngineEventBus,
    options: Partial<ReplayQueueOptions> = {},
  ) {
    this.options = {
      windowMs: 24 * 60 * 60 * 1000,
      baseDelayMs: 60 * 1000,
      maxDelayMs: 30 * 60 * 1000,
      batchSize: 100,
      ...options,
    };
  }

  /**
   * Retry every pending entry that points at the given shipment,
   * regardless of its schedule
   */
  async replayFor(shipment: Shipment, now: Date = new Date()): Promise<ReplaySummary> {
    const pending = await this.storageAdapter.listUnresolved({
      status: ReplayStatus.PENDING,
    });
    const matching = pending.filter(
      (entry) => entry.shipmentRef !== null && shipment.matches(entry.shipmentRef),
    );

    if (matching.length > 0) {
      this.logger.log(
        `Replaying ${matching.length} parked event(s) for shipment ${shipment.trackingCode}`,
      );
    }

    return this.process(matching, now);
  }

  /**
   * Retry entries whose next attempt is due; expire the ones past the window
   */
  async replayDue(now: Date = new Date()): Promise<ReplaySummary> {
    const due = await this.storageAdapter.listUnresolved({
      status: ReplayStatus.PENDING,
      dueBefore: now,
      limit: this.options.batchSize,
    });

    return this.process(due, now);
  }

  private async process(
    entries: UnresolvedEvent[],
    now: Date,
  ): Promise<ReplaySummary> {
    const summary: ReplaySummary = { attempted: 0, resolved: 0, pending: 0, expired: 0 };

    // Oldest first, so per-shipment arrival order is preserved
    const ordered = [...entries].sort(
      (a, b) => a.receivedAt.getTime() - b.receivedAt.getTime(),
    );

    for (const entry of ordered) {
      if (entry.isExpired(now, this.options.windowMs)) {
        await this.expire(entry, 'Replay window exhausted');
        summary.expired++;
        continue;
      }

      summary.attempted++;
      const resolved = await this.attempt(entry, now);
      if (resolved) {
        summary.resolved++;
      } else {
        summary.pending++;
      }
    }

    return summary;
  }

  private async attempt(entry: UnresolvedEvent, now: Date): Promise<boolean> {
    const attempts = entry.attempts + 1;

    let result: IngestionResult;
    try {
      result = await this.ingestor.ingestRawEvent(entry.rawPayload, entry.source, {
        receivedAt: entry.receivedAt,
        shipmentHint: entry.shipmentRef ?? undefined,
        replayOf: entry.id,
      });
    } catch (error) {
      await this.reschedule(entry, attempts, now, toError(error).message);
      return false;
    }

    switch (result.outcome) {
      case IngestionOutcome.ACCEPTED:
      case IngestionOutcome.DUPLICATE:
        await this.storageAdapter.updateUnresolved(entry.id, {
          status: ReplayStatus.RESOLVED,
          attempts,
          nextAttemptAt: null,
          lastError: null,
          resolvedEventId: result.eventId ?? null,
        });
        this.logger.log(`Parked event ${entry.id} resolved (${result.outcome})`);
        return true;

      case IngestionOutcome.MANUAL_REVIEW:
        await this.expire(
          entry,
          result.rejection?.message ?? 'Payload could not be read',
          attempts,
        );
        return false;

      case IngestionOutcome.UNRESOLVED:
      case IngestionOutcome.FAILED:
        await this.reschedule(
          entry,
          attempts,
          now,
          result.rejection?.message ?? result.error?.message ?? null,
        );
        return false;

      default:
        return assertNever(result.outcome, 'Unknown ingestion outcome');
    }
  }

  private async reschedule(
    entry: UnresolvedEvent,
    attempts: number,
    now: Date,
    lastError: string | null,
  ): Promise<void> {
    const delay = backoffDelay(
      attempts + 1,
      this.options.baseDelayMs,
      this.options.maxDelayMs,
    );

    await this.storageAdapter.updateUnresolved(entry.id, {
      attempts,
      nextAttemptAt: new Date(now.getTime() + delay),
      lastError,
    });
  }

  private async expire(
    entry: UnresolvedEvent,
    message: string,
    attempts: number = entry.attempts,
  ): Promise<void> {
    await this.storageAdapter.updateUnresolved(entry.id, {
      status: ReplayStatus.MANUAL_REVIEW,
      attempts,
      nextAttemptAt: null,
      lastError: message,
    });

    this.logger.warn(
      `Parked ${entry.source} event ${entry.id} moved to manual review: ${message}`,
    );

    await this.eventBus?.emit({
      type: 'event.manual-review',
      payload: {
        unresolvedId: entry.id,
        source: entry.source,
        shipmentRef: entry.shipmentRef,
        reason: entry.reason,
        attempts,
        message,
      },
    });
  }
}
