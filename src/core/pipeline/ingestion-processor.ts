import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { IngestionOutcome } from '../domain/enums';
import { toError } from '../errors';
import { LifecycleHooks } from '../interfaces';
import { invokeHook } from '../utils';
import {
  BatchItem,
  IngestOptions,
  IngestionContext,
  IngestionMetrics,
  IngestionResult,
  PipelineConfig,
  PipelineError,
  PipelineStage,
  PipelineStatistics,
} from './types';
import { NormalizationStage } from './stages/normalization.stage';
import { IngestStage } from './stages/ingest.stage';
import { StateEngineStage } from './stages/state-engine.stage';
import { DispatchStage } from './stages/dispatch.stage';

/**
 * IngestionProcessor runs every raw carrier event through the pipeline
 *
 * Pipeline stages:
 * 1. Normalization - map to a canonical event, or park it
 * 2. Ingest - insert under the dedup key; duplicates stop here
 * 3. State Engine - re-derive and commit the shipment status
 * 4. Dispatch - automations and archive mirror for a committed transition
 *
 * Stages 2 and 3 run inside the shipment's exclusive section.
 */
export class IngestionProcessor {
  private readonly logger = new Logger(IngestionProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly hooks: LifecycleHooks;
  private readonly throwOnError: boolean;
  private readonly logErrors: boolean;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks ?? {};
    this.throwOnError = config.throwOnError ?? false;
    this.logErrors = config.logErrors ?? true;
    this.stages = this.initializeStages();
  }

  /**
   * Process one raw carrier event
   */
  async ingestRawEvent(
    payload: unknown,
    source: string,
    options: IngestOptions = {},
  ): Promise<IngestionResult> {
    const startTime = Date.now();

    const context: IngestionContext = {
      source,
      rawPayload: payload,
      receivedAt: options.receivedAt ?? new Date(),
      shipmentHint: options.shipmentHint,
      replayOf: options.replayOf,
      processingId: uuidv4(),
      startTime: new Date(startTime),
      metadata: {},
    };

    const metrics: IngestionMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      normalized: false,
      persisted: false,
      transitionApplied: false,
      dispatched: false,
    };

    try {
      await this.executePipeline(context, metrics);
    } catch (error) {
      context.error = toError(error);

      if (this.logErrors) {
        this.logger.error(
          `Ingestion failed for ${source} event ${context.processingId}: ${context.error.message}`,
        );
      }

      await invokeHook(this.logger, 'onError', this.hooks.onError, context.error, {
        operation: 'ingestion',
        source,
        shipmentId: context.shipment?.id,
        metadata: { processingId: context.processingId, ...context.metadata },
      });
    }

    context.processingDurationMs = Date.now() - startTime;
    metrics.totalDurationMs = context.processingDurationMs;

    // An event that made it into the store keeps its accepted fate even if
    // a later stage failed; reconciliation repairs the status
    const outcome = context.outcome ?? IngestionOutcome.FAILED;

    const result: IngestionResult = {
      success: !context.error,
      outcome,
      eventId: context.trackingEvent?.id,
      shipmentId: context.shipment?.id,
      rejection: context.rejection,
      transition: context.transition,
      dispatch: context.dispatch,
      error: context.error,
      context,
      metrics,
    };

    await invokeHook(this.logger, 'onIngestionFate', this.hooks.onIngestionFate, {
      source,
      outcome,
      shipmentId: result.shipmentId,
      eventId: result.eventId,
      canonicalStatus: context.trackingEvent?.canonicalStatus,
      latencyMs: context.processingDurationMs,
      error: context.error,
    });

    if (context.error && this.throwOnError) {
      throw context.error instanceof PipelineError
        ? context.error
        : new PipelineError(
            `Pipeline failed: ${context.error.message}`,
            'pipeline',
            context,
            context.error,
          );
    }

    return result;
  }

  /**
   * Process a carrier batch. Items pointing at the same shipment run in
   * order; different shipments run concurrently. Results keep input order.
   */
  async ingestBatch(items: BatchItem[]): Promise<IngestionResult[]> {
    const results = new Array<IngestionResult>(items.length);
    const groups = new Map<string, number[]>();

    items.forEach((item, index) => {
      const key = this.groupKey(item, index);
      const group = groups.get(key);
      if (group) {
        group.push(index);
      } else {
        groups.set(key, [index]);
      }
    });

    await Promise.all(
      Array.from(groups.values()).map(async (indexes) => {
        for (const index of indexes) {
          const item = items[index];
          results[index] = await this.ingestRawEvent(item.payload, item.source, {
            receivedAt: item.receivedAt,
            shipmentHint: item.shipmentHint,
            replayOf: item.replayOf,
          });
        }
      }),
    );

    return results;
  }

  getStatistics(): PipelineStatistics {
    return {
      stages: this.stages.map((stage) => stage.name),
      configuration: {
        throwOnError: this.throwOnError,
        automations: Boolean(this.config.dispatcher),
        archival: Boolean(this.config.archivalSink),
      },
    };
  }

  /**
   * Execute the pipeline stages sequentially. Runs of exclusive stages
   * hold the shipment's exclusive section; dispatch runs after it is
   * released.
   */
  private async executePipeline(
    context: IngestionContext,
    metrics: IngestionMetrics,
  ): Promise<void> {
    let index = 0;

    while (index < this.stages.length) {
      const shipmentId = context.shipment?.id;

      if (this.stages[index].exclusive && shipmentId) {
        const section = this.exclusiveRun(index);
        const proceed = await this.config.storageAdapter.runExclusive(
          shipmentId,
          () => this.runStages(section, context, metrics),
        );
        if (!proceed) {
          return;
        }
        index += section.length;
        continue;
      }

      if (!(await this.runStages([this.stages[index]], context, metrics))) {
        return;
      }
      index++;
    }
  }

  /**
   * The exclusive stages starting at `start`
   */
  private exclusiveRun(start: number): PipelineStage[] {
    let end = start;
    while (end < this.stages.length && this.stages[end].exclusive) {
      end++;
    }
    return this.stages.slice(start, end);
  }

  /**
   * False when a stage ended the run
   */
  private async runStages(
    stages: PipelineStage[],
    context: IngestionContext,
    metrics: IngestionMetrics,
  ): Promise<boolean> {
    for (const stage of stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (result.metadata) {
          context.metadata[stage.name] = result.metadata;
        }
        this.updateMetrics(stage.name, result.success, context, metrics);

        if (!result.success && result.error) {
          throw result.error;
        }
        if (!result.shouldContinue) {
          return false;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        const cause = toError(error);
        throw new PipelineError(
          `Stage '${stage.name}' failed: ${cause.message}`,
          stage.name,
          context,
          cause,
        );
      }
    }

    return true;
  }

  private initializeStages(): PipelineStage[] {
    return [
      new NormalizationStage(
        this.config.normalizer,
        this.config.storageAdapter,
        this.config.eventBus,
        this.config.replayBaseDelayMs,
      ),
      new IngestStage(
        this.config.storageAdapter,
        this.config.eventBus,
        this.config.archivalSink,
      ),
      new StateEngineStage(
        this.config.statusEngine,
        this.config.eventBus,
        this.hooks,
      ),
      new DispatchStage(this.config.dispatcher, this.config.archivalSink),
    ];
  }

  private updateMetrics(
    stageName: string,
    success: boolean,
    context: IngestionContext,
    metrics: IngestionMetrics,
  ): void {
    if (!success) return;

    switch (stageName) {
      case 'normalization':
        metrics.normalized = true;
        break;
      case 'ingest':
        metrics.persisted = true;
        break;
      case 'state-engine':
        metrics.transitionApplied = context.transition?.kind === 'applied';
        break;
      case 'dispatch':
        metrics.dispatched = true;
        break;
    }
  }

  private groupKey(item: BatchItem, index: number): string {
    const ref = this.config.normalizer.peekReference(
      item.payload,
      item.source,
      item.shipmentHint,
    );
    if (!ref) {
      return `item:${index}`;
    }
    return (
      ref.shipmentId ??
      ref.trackingCode ??
      (ref.invoiceNumber && ref.document
        ? `${ref.invoiceNumber}/${ref.document}`
        : `item:${index}`)
    );
  }
}
