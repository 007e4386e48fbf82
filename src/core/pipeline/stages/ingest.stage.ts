import { Logger } from '@nestjs/common';
import { IngestionOutcome } from '../../domain/enums';
import { TrackingEvent } from '../../domain/models';
import { ArchivalSink } from '../../archival';
import { DuplicateEventError } from '../../errors';
import { EngineEventBus } from '../../events';
import { StorageAdapter } from '../../interfaces';
import { IngestionContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 2: Ingest
 * Inserts the canonical event under its dedup key. A uniqueness
 * violation means the event was seen before and ends the run.
 */
export class IngestStage implements PipelineStage {
  name = 'ingest';
  exclusive = true;
  private readonly logger = new Logger(IngestStage.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly eventBus?: EngineEventBus,
    private readonly archivalSink?: ArchivalSink,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const startTime = Date.now();

    if (!context.canonicalEvent) {
      throw new Error('Ingest stage reached without a canonical event');
    }

    const { carrier, occurrence, ...eventDto } = context.canonicalEvent;

    let event: TrackingEvent;
    try {
      event = await this.storageAdapter.insertTrackingEvent(eventDto);
    } catch (error) {
      if (!(error instanceof DuplicateEventError)) {
        throw error;
      }

      context.outcome = IngestionOutcome.DUPLICATE;
      this.logger.debug(
        `Duplicate ${context.source} event for shipment ${eventDto.shipmentId}`,
      );
      await this.eventBus?.emit({
        type: 'event.duplicate',
        payload: {
          shipmentId: eventDto.shipmentId,
          source: eventDto.source,
          dedupKey: error.dedupKey,
        },
      });

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { duplicate: true, durationMs: Date.now() - startTime },
      };
    }

    context.trackingEvent = event;
    context.outcome = IngestionOutcome.ACCEPTED;

    this.archivalSink?.enqueue({
      kind: 'event',
      shipmentId: event.shipmentId,
      eventId: event.id,
      source: event.source,
      occurrenceCode: event.occurrenceCode,
      canonicalStatus: event.canonicalStatus,
      occurredAt: event.occurredAt,
      receivedAt: event.receivedAt,
      rawPayload: event.rawPayload,
    });

    await this.eventBus?.emit({
      type: 'event.accepted',
      payload: {
        shipmentId: event.shipmentId,
        eventId: event.id,
        source: event.source,
        occurrenceCode: event.occurrenceCode,
        canonicalStatus: event.canonicalStatus,
      },
    });

    if (!event.isClassified()) {
      this.logger.warn(
        `Unknown ${carrier} occurrence ${event.occurrenceCode ?? '(none)'} on shipment ${event.shipmentId}, flagged for review`,
      );
      await this.eventBus?.emit({
        type: 'event.unclassified',
        payload: {
          shipmentId: event.shipmentId,
          eventId: event.id,
          source: event.source,
          occurrenceCode: event.occurrenceCode,
        },
      });
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        eventId: event.id,
        registryEntry: occurrence?.key ?? null,
        durationMs: Date.now() - startTime,
      },
    };
  }
}
