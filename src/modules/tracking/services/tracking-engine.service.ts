import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import type {
  AutomationRule,
  AutomationRuleQuery,
  BatchItem,
  CurrentStatusView,
  EngineStatistics,
  IngestOptions,
  IngestionResult,
  PipelineStatistics,
  ReplaySummary,
  ReviewQueue,
  Shipment,
  ShipmentReference,
  StatusAuditEntry,
  TimelineView,
  TrackingEngine,
  TransitionOutcome,
} from '../../../core';
import { BundledCodeSource, JsonFileCodeSource } from '../../../core';
import {
  AutomationRuleDto,
  IngestRawEventDto,
  RegisterShipmentDto,
  assertValid,
  toAutomationAction,
  toRuleCondition,
  validateInput,
} from '../../../_shared/dto';
import { TRACKING_ENGINE } from '../constants';

/**
 * TrackingEngineService
 *
 * Entry point for hosts: validates inbound input, then delegates to the
 * ingestion processor and the tracking service
 */
@Injectable()
export class TrackingEngineService implements OnApplicationShutdown {
  private readonly logger = new Logger(TrackingEngineService.name);

  constructor(
    @Inject(TRACKING_ENGINE)
    private readonly engine: TrackingEngine,
  ) {}

  /**
   * Ingest one raw carrier payload. The envelope is validated; the
   * payload itself is the normalizer's business.
   */
  async ingestRawEvent(
    payload: unknown,
    source: string,
    options: IngestOptions = {},
  ): Promise<IngestionResult> {
    const envelope = plainToInstance(IngestRawEventDto, {
      source,
      receivedAt: options.receivedAt,
      shipmentHint: options.shipmentHint,
    });
    envelope.payload = payload;
    await assertValid(envelope);

    return this.engine.processor.ingestRawEvent(payload, source, {
      receivedAt: envelope.receivedAt,
      shipmentHint: options.shipmentHint,
    });
  }

  async ingestBatch(items: BatchItem[]): Promise<IngestionResult[]> {
    const results = await this.engine.processor.ingestBatch(items);
    const failed = results.filter((result) => !result.success).length;
    if (failed > 0) {
      this.logger.warn(`Batch of ${items.length}: ${failed} item(s) failed`);
    }
    return results;
  }

  async registerShipment(
    input: unknown,
  ): Promise<{ shipment: Shipment; replay: ReplaySummary }> {
    const dto = await validateInput(RegisterShipmentDto, input);
    return this.engine.service.registerShipment({
      trackingCode: dto.trackingCode,
      carrier: dto.carrier,
      invoiceNumber: dto.invoiceNumber,
      document: dto.document,
      attributes: dto.attributes,
    });
  }

  async getShipment(ref: ShipmentReference): Promise<Shipment | null> {
    return this.engine.service.getShipment(ref);
  }

  async getCurrentStatus(shipmentId: string): Promise<CurrentStatusView> {
    return this.engine.service.getCurrentStatus(shipmentId);
  }

  async getTimeline(shipmentId: string): Promise<TimelineView> {
    return this.engine.service.getTimeline(shipmentId);
  }

  async getAuditTrail(shipmentId: string): Promise<StatusAuditEntry[]> {
    return this.engine.service.getAuditTrail(shipmentId);
  }

  async reconcileShipment(shipmentId: string): Promise<TransitionOutcome> {
    return this.engine.service.reconcileShipment(shipmentId);
  }

  async listForReview(limit?: number): Promise<ReviewQueue> {
    return this.engine.service.listForReview(limit);
  }

  async createAutomationRule(input: unknown): Promise<AutomationRule> {
    const dto = await validateInput(AutomationRuleDto, input);
    return this.engine.service.createAutomationRule({
      name: dto.name,
      triggerStatuses: [...dto.triggerStatuses],
      conditions: (dto.conditions ?? []).map(toRuleCondition),
      actions: dto.actions.map(toAutomationAction),
      enabled: dto.enabled,
    });
  }

  async setAutomationRuleEnabled(id: string, enabled: boolean): Promise<AutomationRule> {
    return this.engine.service.setAutomationRuleEnabled(id, enabled);
  }

  async listAutomationRules(query?: AutomationRuleQuery): Promise<AutomationRule[]> {
    return this.engine.service.listAutomationRules(query);
  }

  /**
   * Reload occurrence codes from a JSON file, or from the bundled seed
   */
  async reloadRegistry(codesFile?: string): Promise<void> {
    const source = codesFile ? new JsonFileCodeSource(codesFile) : new BundledCodeSource();
    await this.engine.service.reloadRegistry(source);
    this.logger.log(`Occurrence codes reloaded from ${source.name}`);
  }

  async getStatistics(): Promise<EngineStatistics & { pipeline: PipelineStatistics }> {
    const statistics = await this.engine.service.getStatistics();
    return { ...statistics, pipeline: this.engine.processor.getStatistics() };
  }

  async isHealthy(): Promise<boolean> {
    return this.engine.storageAdapter.isHealthy();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.engine.storageAdapter.close?.();
  }
}
