import { ArchivalSink } from '../../archival';
import { AutomationDispatcher } from '../../automation';
import { IngestionContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 4: Dispatch
 * Runs automations for a committed transition and mirrors it to the archive
 */
export class DispatchStage implements PipelineStage {
  name = 'dispatch';

  constructor(
    private readonly dispatcher?: AutomationDispatcher,
    private readonly archivalSink?: ArchivalSink,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const startTime = Date.now();
    const transition = context.transition;

    if (!transition || transition.kind !== 'applied') {
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { skipped: true },
      };
    }

    this.archivalSink?.enqueue({
      kind: 'transition',
      shipmentId: transition.shipment.id,
      eventId: transition.triggeringEventId,
      fromStatus: transition.fromStatus,
      toStatus: transition.toStatus,
      statusVersion: transition.statusVersion,
      transitionedAt: transition.shipment.updatedAt,
    });

    if (this.dispatcher) {
      context.dispatch = await this.dispatcher.dispatch({
        shipment: transition.shipment,
        fromStatus: transition.fromStatus,
        toStatus: transition.toStatus,
        statusVersion: transition.statusVersion,
        triggeringEventId: transition.triggeringEventId,
      });
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: {
        matchedRules: context.dispatch?.matchedRules ?? 0,
        durationMs: Date.now() - startTime,
      },
    };
  }
}
