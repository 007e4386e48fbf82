import { Logger } from '@nestjs/common';
import { StatusAuditKind } from '../domain/enums';
import { Shipment, TrackingEvent } from '../domain/models';
import { ShipmentNotFoundError, StorageConflictError } from '../errors';
import { StorageAdapter } from '../interfaces';
import { TimelineBuilder } from '../timeline';
import { backoffDelay, sleep } from '../utils';
import { ShipmentStateMachine } from './shipment-state-machine';
import { FoldStep, TransitionOutcome } from './types';

export interface StatusEngineOptions {
  maxConflictRetries: number;
  conflictBackoffMs: number;
}

/**
 * Keeps a shipment's stored status equal to the fold of its timeline
 *
 * The status is always re-derived from every stored event, so a late
 * event lands where its occurredAt puts it; one that arrived after a
 * higher-ranked, later event is folded as a regression. Callers hold the
 * shipment's exclusive section. The write is a compare-and-set on
 * currentStatusVersion; a lost race re-reads and re-derives.
 */
export class StatusEngine {
  private readonly logger = new Logger(StatusEngine.name);
  private readonly options: StatusEngineOptions;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly stateMachine: ShipmentStateMachine,
    private readonly timelineBuilder: TimelineBuilder,
    options: Partial<StatusEngineOptions> = {},
  ) {
    this.options = {
      maxConflictRetries: 5,
      conflictBackoffMs: 10,
      ...options,
    };
  }

  /**
   * Re-derive after a newly persisted event
   */
  async apply(
    shipmentId: string,
    triggeringEvent: TrackingEvent,
  ): Promise<TransitionOutcome> {
    return this.converge(shipmentId, triggeringEvent);
  }

  /**
   * Re-derive without a new event, e.g. after a registry reload
   */
  async reconcile(shipmentId: string): Promise<TransitionOutcome> {
    return this.converge(shipmentId, null);
  }

  private async converge(
    shipmentId: string,
    triggeringEvent: TrackingEvent | null,
  ): Promise<TransitionOutcome> {
    for (let attempt = 0; ; attempt++) {
      const shipment = await this.storageAdapter.findShipment({ shipmentId });
      if (!shipment) {
        throw new ShipmentNotFoundError(
          `Shipment ${shipmentId} not found`,
          shipmentId,
        );
      }

      const events = await this.timelineBuilder.build(shipmentId);
      const derivation = this.stateMachine.derive(events);

      const triggerStep = triggeringEvent
        ? derivation.steps.find((step) => step.event.id === triggeringEvent.id)
        : undefined;
      const anomaly =
        triggerStep && triggerStep.outcome === 'anomaly'
          ? triggerStep.anomaly
          : null;
      const latest = events.length > 0 ? events[events.length - 1] : undefined;
      const late =
        triggeringEvent !== null &&
        latest !== undefined &&
        latest.id !== triggeringEvent.id;

      if (derivation.status === shipment.currentStatus) {
        if (triggerStep && anomaly) {
          await this.recordAnomaly(shipment, triggerStep);
        }
        return { kind: 'unchanged', shipment, anomaly, late };
      }

      try {
        const updated = await this.storageAdapter.applyTransition(shipment.id, {
          expectedVersion: shipment.currentStatusVersion,
          status: derivation.status,
          lastEventId: derivation.lastAppliedEventId,
          reason: triggeringEvent
            ? `event ${triggeringEvent.id}`
            : 'reconciliation',
        });

        this.logger.log(
          `Shipment ${shipment.id}: ${shipment.currentStatus} -> ${derivation.status} (v${updated.currentStatusVersion})`,
        );

        if (triggerStep && anomaly) {
          await this.recordAnomaly(updated, triggerStep);
        }

        return {
          kind: 'applied',
          shipment: updated,
          fromStatus: shipment.currentStatus,
          toStatus: derivation.status,
          statusVersion: updated.currentStatusVersion,
          triggeringEventId: triggeringEvent
            ? triggeringEvent.id
            : derivation.lastAppliedEventId,
          anomaly,
          late,
        };
      } catch (error) {
        if (
          !(error instanceof StorageConflictError) ||
          attempt >= this.options.maxConflictRetries
        ) {
          throw error;
        }

        const delay = backoffDelay(
          attempt + 1,
          this.options.conflictBackoffMs,
          this.options.conflictBackoffMs * 32,
        );
        this.logger.debug(
          `Version conflict on shipment ${shipmentId}, retry ${attempt + 1} in ${delay}ms`,
        );
        await sleep(delay);
      }
    }
  }

  private async recordAnomaly(shipment: Shipment, step: FoldStep): Promise<void> {
    this.logger.warn(
      `Shipment ${shipment.id}: event ${step.event.id} (${step.event.canonicalStatus}) flagged as ${step.anomaly}`,
    );

    await this.storageAdapter.createStatusAuditEntry({
      shipmentId: shipment.id,
      kind: StatusAuditKind.ANOMALY,
      fromStatus: shipment.currentStatus,
      toStatus: step.event.canonicalStatus,
      statusVersion: shipment.currentStatusVersion,
      eventId: step.event.id,
      anomaly: step.anomaly,
      reason: step.reason ?? null,
    });
  }
}
