import { Logger } from '@nestjs/common';
import { EngineEventBus } from '../../events';
import { LifecycleHooks } from '../../interfaces';
import { StatusEngine } from '../../state-machine';
import { invokeHook } from '../../utils';
import { IngestionContext, PipelineStage, StageResult } from '../types';

/**
 * Stage 3: State Engine
 * Re-derives the shipment status from its timeline and commits a change
 */
export class StateEngineStage implements PipelineStage {
  name = 'state-engine';
  exclusive = true;
  private readonly logger = new Logger(StateEngineStage.name);

  constructor(
    private readonly statusEngine: StatusEngine,
    private readonly eventBus?: EngineEventBus,
    private readonly hooks: LifecycleHooks = {},
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const startTime = Date.now();
    const event = context.trackingEvent;

    if (!event) {
      throw new Error('State engine stage reached without a stored event');
    }

    const transition = await this.statusEngine.apply(event.shipmentId, event);
    context.transition = transition;
    context.shipment = transition.shipment;

    if (transition.anomaly) {
      await this.eventBus?.emit({
        type: 'transition.anomaly',
        payload: {
          shipmentId: event.shipmentId,
          eventId: event.id,
          anomaly: transition.anomaly,
          currentStatus: transition.shipment.currentStatus,
          eventStatus: event.canonicalStatus,
        },
      });
    }

    if (transition.kind === 'applied') {
      if (transition.late) {
        this.logger.log(
          `Late event ${event.id} re-ordered the timeline of shipment ${event.shipmentId}`,
        );
      }

      await this.eventBus?.emit({
        type: 'transition.applied',
        payload: {
          shipmentId: event.shipmentId,
          fromStatus: transition.fromStatus,
          toStatus: transition.toStatus,
          statusVersion: transition.statusVersion,
          triggeringEventId: transition.triggeringEventId,
          late: transition.late,
        },
      });

      await invokeHook(this.logger, 'onTransition', this.hooks.onTransition, {
        shipmentId: event.shipmentId,
        fromStatus: transition.fromStatus,
        toStatus: transition.toStatus,
        statusVersion: transition.statusVersion,
        eventId: transition.triggeringEventId,
      });
    }

    return {
      success: true,
      context,
      shouldContinue: transition.kind === 'applied',
      metadata: {
        transition: transition.kind,
        anomaly: transition.anomaly,
        durationMs: Date.now() - startTime,
      },
    };
  }
}
