import { Logger } from '@nestjs/common';
import {
  IngestionOutcome,
  RejectionReason,
  ReplayStatus,
} from '../../domain/enums';
import { EngineEventBus } from '../../events';
import { StorageAdapter } from '../../interfaces';
import { EventNormalizer, RejectedEvent } from '../../normalizer';
import { IngestionContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 1: Normalization
 * Maps the carrier payload to a canonical event, or parks it
 */
export class NormalizationStage implements PipelineStage {
  name = 'normalization';
  private readonly logger = new Logger(NormalizationStage.name);

  constructor(
    private readonly normalizer: EventNormalizer,
    private readonly storageAdapter: StorageAdapter,
    private readonly eventBus?: EngineEventBus,
    private readonly replayBaseDelayMs = 60 * 1000,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const startTime = Date.now();

    const result = await this.normalizer.normalize(
      context.rawPayload,
      context.source,
      context.receivedAt,
      context.shipmentHint,
    );

    if (result.kind === 'canonical') {
      context.canonicalEvent = result.event;
      context.shipment = result.shipment;

      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: {
          canonicalStatus: result.event.canonicalStatus,
          durationMs: Date.now() - startTime,
        },
      };
    }

    const rejection = result.rejection;
    context.rejection = rejection;
    context.outcome =
      rejection.reason === RejectionReason.MALFORMED_PAYLOAD
        ? IngestionOutcome.MANUAL_REVIEW
        : IngestionOutcome.UNRESOLVED;

    // A replay run reports back to the replay queue, which owns the entry
    if (!context.replayOf) {
      await this.park(context, rejection);
    }

    return {
      success: true,
      context,
      shouldContinue: false,
      metadata: {
        rejected: rejection.reason,
        durationMs: Date.now() - startTime,
      },
    };
  }

  private async park(
    context: IngestionContext,
    rejection: RejectedEvent,
  ): Promise<void> {
    const malformed = rejection.reason === RejectionReason.MALFORMED_PAYLOAD;

    const entry = await this.storageAdapter.enqueueUnresolved({
      source: rejection.source,
      rawPayload: rejection.rawPayload,
      shipmentRef: rejection.shipmentRef,
      reason: rejection.reason,
      receivedAt: rejection.receivedAt,
      status: malformed ? ReplayStatus.MANUAL_REVIEW : ReplayStatus.PENDING,
      nextAttemptAt: malformed
        ? null
        : new Date(rejection.receivedAt.getTime() + this.replayBaseDelayMs),
      lastError: rejection.message,
    });
    context.unresolvedEntry = entry;

    if (malformed) {
      this.logger.warn(
        `Malformed ${rejection.source} payload sent to manual review: ${rejection.message}`,
      );
      await this.eventBus?.emit({
        type: 'event.manual-review',
        payload: {
          unresolvedId: entry.id,
          source: entry.source,
          shipmentRef: entry.shipmentRef,
          reason: entry.reason,
          attempts: entry.attempts,
          message: rejection.message,
        },
      });
      return;
    }

    this.logger.log(`Parked unresolved ${rejection.source} event: ${rejection.message}`);
    await this.eventBus?.emit({
      type: 'event.unresolved',
      payload: {
        unresolvedId: entry.id,
        source: entry.source,
        shipmentRef: entry.shipmentRef,
        reason: entry.reason,
        message: rejection.message,
      },
    });
  }
}
