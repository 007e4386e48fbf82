import { Logger } from '@nestjs/common';
import { ReplayStatus, STATUS_METADATA } from '../domain/enums';
import {
  AutomationRule,
  Shipment,
  ShipmentReference,
  StatusAuditEntry,
} from '../domain/models';
import { ArchivalSink } from '../archival';
import { AutomationDispatcher } from '../automation';
import { ShipmentNotFoundError } from '../errors';
import { EngineEventBus } from '../events';
import {
  AutomationRuleQuery,
  CreateAutomationRuleDto,
  CreateShipmentDto,
  StorageAdapter,
} from '../interfaces';
import { OccurrenceCodeRegistry, OccurrenceCodeSource } from '../registry';
import { ReplayQueue, ReplaySummary } from '../replay';
import {
  ShipmentStateMachine,
  StatusEngine,
  TransitionOutcome,
} from '../state-machine';
import { TimelineBuilder } from '../timeline';
import {
  CurrentStatusView,
  EngineStatistics,
  ReviewQueue,
  TimelineView,
} from './types';

export interface TrackingServiceDeps {
  storageAdapter: StorageAdapter;
  registry: OccurrenceCodeRegistry;
  stateMachine: ShipmentStateMachine;
  timelineBuilder: TimelineBuilder;
  statusEngine: StatusEngine;
  replayQueue: ReplayQueue;
  dispatcher?: AutomationDispatcher;
  eventBus?: EngineEventBus;
  archivalSink?: ArchivalSink;
}

/**
 * Query-first tracking service
 *
 * Shipment registration, read models over the timeline, reconciliation
 * and automation rule management. Queries never write.
 */
export class TrackingService {
  private readonly logger = new Logger(TrackingService.name);

  constructor(private readonly deps: TrackingServiceDeps) {}

  /**
   * Create a shipment and replay events that arrived before it existed
   */
  async registerShipment(
    dto: CreateShipmentDto,
  ): Promise<{ shipment: Shipment; replay: ReplaySummary }> {
    const created = await this.deps.storageAdapter.createShipment(dto);
    this.logger.log(`Registered shipment ${created.trackingCode} (${created.id})`);

    const replay = await this.deps.replayQueue.replayFor(created);

    // Replayed events may have moved the status already
    const shipment =
      replay.resolved > 0
        ? ((await this.deps.storageAdapter.findShipment({ shipmentId: created.id })) ??
          created)
        : created;

    return { shipment, replay };
  }

  async getShipment(ref: ShipmentReference): Promise<Shipment | null> {
    return this.deps.storageAdapter.findShipment(ref);
  }

  async getCurrentStatus(shipmentId: string): Promise<CurrentStatusView> {
    const shipment = await this.requireShipment(shipmentId);
    const metadata = STATUS_METADATA[shipment.currentStatus];

    return {
      shipmentId: shipment.id,
      trackingCode: shipment.trackingCode,
      status: shipment.currentStatus,
      label: metadata.label,
      description: metadata.description,
      statusVersion: shipment.currentStatusVersion,
      lastEventId: shipment.lastEventId,
      isTerminal: shipment.isTerminal(),
      updatedAt: shipment.updatedAt,
    };
  }

  async getTimeline(shipmentId: string): Promise<TimelineView> {
    const shipment = await this.requireShipment(shipmentId);
    const events = await this.deps.timelineBuilder.build(shipmentId);
    const derivation = this.deps.stateMachine.derive(events);

    return {
      shipmentId,
      currentStatus: shipment.currentStatus,
      statusVersion: shipment.currentStatusVersion,
      derivedStatus: derivation.status,
      consistent: derivation.status === shipment.currentStatus,
      entries: derivation.steps.map((step) => ({
        event: step.event,
        outcome: step.outcome,
        anomaly: step.anomaly,
        statusAfter: step.statusAfter,
      })),
      gaps: this.deps.timelineBuilder.gaps(events),
    };
  }

  /**
   * Re-derive the status and commit it if the stored one drifted, e.g.
   * after a crash between event insert and transition. Automations for a
   * repaired transition fire as they would have.
   */
  async reconcileShipment(shipmentId: string): Promise<TransitionOutcome> {
    const outcome = await this.deps.storageAdapter.runExclusive(shipmentId, () =>
      this.deps.statusEngine.reconcile(shipmentId),
    );

    if (outcome.kind === 'applied') {
      this.logger.warn(
        `Reconciled shipment ${shipmentId}: ${outcome.fromStatus} -> ${outcome.toStatus}`,
      );

      await this.deps.eventBus?.emit({
        type: 'transition.applied',
        payload: {
          shipmentId,
          fromStatus: outcome.fromStatus,
          toStatus: outcome.toStatus,
          statusVersion: outcome.statusVersion,
          triggeringEventId: outcome.triggeringEventId,
          late: false,
        },
      });

      this.deps.archivalSink?.enqueue({
        kind: 'transition',
        shipmentId,
        eventId: outcome.triggeringEventId,
        fromStatus: outcome.fromStatus,
        toStatus: outcome.toStatus,
        statusVersion: outcome.statusVersion,
        transitionedAt: outcome.shipment.updatedAt,
      });

      await this.deps.dispatcher?.dispatch({
        shipment: outcome.shipment,
        fromStatus: outcome.fromStatus,
        toStatus: outcome.toStatus,
        statusVersion: outcome.statusVersion,
        triggeringEventId: outcome.triggeringEventId,
      });
    }

    return outcome;
  }

  async getAuditTrail(shipmentId: string): Promise<StatusAuditEntry[]> {
    await this.requireShipment(shipmentId);
    return this.deps.storageAdapter.getAuditTrail(shipmentId);
  }

  async listForReview(limit = 100): Promise<ReviewQueue> {
    const [unresolved, unclassified] = await Promise.all([
      this.deps.storageAdapter.listUnresolved({
        status: ReplayStatus.MANUAL_REVIEW,
        limit,
      }),
      this.deps.storageAdapter.listEventsNeedingReview(limit),
    ]);

    return { unresolved, unclassified };
  }

  async createAutomationRule(dto: CreateAutomationRuleDto): Promise<AutomationRule> {
    const rule = await this.deps.storageAdapter.createAutomationRule(dto);
    this.logger.log(
      `Automation rule ${rule.name} (${rule.id}) on ${rule.triggerStatuses.join(', ')}`,
    );
    return rule;
  }

  async setAutomationRuleEnabled(id: string, enabled: boolean): Promise<AutomationRule> {
    return this.deps.storageAdapter.setAutomationRuleEnabled(id, enabled);
  }

  async listAutomationRules(query?: AutomationRuleQuery): Promise<AutomationRule[]> {
    return this.deps.storageAdapter.listAutomationRules(query);
  }

  /**
   * Swap the occurrence code table. Stored events keep the status they
   * were normalized with.
   */
  async reloadRegistry(source: OccurrenceCodeSource): Promise<void> {
    await this.deps.registry.reload(source);
  }

  async getStatistics(): Promise<EngineStatistics> {
    const storage = await this.deps.storageAdapter.getStatistics();
    const registry = this.deps.registry.describe();
    const archive = this.deps.archivalSink?.getStats();

    return {
      ...storage,
      registry: {
        source: registry.source,
        generation: registry.generation,
        entries: registry.size,
      },
      archive: archive
        ? { pending: archive.pending, written: archive.written, dropped: archive.dropped }
        : null,
    };
  }

  private async requireShipment(shipmentId: string): Promise<Shipment> {
    const shipment = await this.deps.storageAdapter.findShipment({ shipmentId });
    if (!shipment) {
      throw new ShipmentNotFoundError(`Shipment ${shipmentId} not found`, shipmentId);
    }
    return shipment;
  }
}
