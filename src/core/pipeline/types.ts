import { IngestionOutcome } from '../domain/enums';
import {
  Shipment,
  ShipmentReference,
  TrackingEvent,
  UnresolvedEvent,
} from '../domain/models';
import { ArchivalSink } from '../archival';
import { AutomationDispatcher, DispatchSummary } from '../automation';
import { EngineEventBus } from '../events';
import { LifecycleHooks, StorageAdapter } from '../interfaces';
import { CanonicalEvent, EventNormalizer, RejectedEvent } from '../normalizer';
import { StatusEngine, TransitionOutcome } from '../state-machine';

/**
 * Ingestion context passed through the pipeline
 */
export interface IngestionContext {
  // Raw input
  source: string;
  rawPayload: unknown;
  receivedAt: Date;
  shipmentHint?: ShipmentReference;

  /**
   * Id of the parked entry this run replays; replays never park again
   */
  replayOf?: string;

  // Processing metadata
  processingId: string;
  startTime: Date;

  // Normalization
  canonicalEvent?: CanonicalEvent;
  shipment?: Shipment;
  rejection?: RejectedEvent;
  unresolvedEntry?: UnresolvedEvent;

  // Persistence
  trackingEvent?: TrackingEvent;

  // State engine
  transition?: TransitionOutcome;

  // Automation
  dispatch?: DispatchSummary;

  // Outcome
  outcome?: IngestionOutcome;
  error?: Error;
  processingDurationMs?: number;

  metadata: Record<string, unknown>;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: IngestionContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, unknown>;
}

export interface PipelineStage {
  name: string;

  /**
   * Consecutive exclusive stages run inside the shipment's exclusive
   * section, so events for one shipment are stored and applied one at
   * a time
   */
  exclusive?: boolean;

  execute(context: IngestionContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  storageAdapter: StorageAdapter;
  normalizer: EventNormalizer;
  statusEngine: StatusEngine;
  dispatcher?: AutomationDispatcher;
  eventBus?: EngineEventBus;
  archivalSink?: ArchivalSink;

  /**
   * First retry delay for events parked as unresolved
   */
  replayBaseDelayMs?: number;

  hooks?: LifecycleHooks;

  throwOnError?: boolean;
  logErrors?: boolean;
}

export interface IngestOptions {
  receivedAt?: Date;
  shipmentHint?: ShipmentReference;
  replayOf?: string;
}

export interface PipelineStatistics {
  stages: string[];
  configuration: {
    throwOnError: boolean;
    automations: boolean;
    archival: boolean;
  };
}

export interface BatchItem extends IngestOptions {
  payload: unknown;
  source: string;
}

/**
 * Result returned by the pipeline for one raw event
 */
export interface IngestionResult {
  /**
   * False only when a stage hit an unexpected error (store failure)
   */
  success: boolean;
  outcome: IngestionOutcome;
  eventId?: string;
  shipmentId?: string;
  rejection?: RejectedEvent;
  transition?: TransitionOutcome;
  dispatch?: DispatchSummary;
  error?: Error;
  context: IngestionContext;
  metrics: IngestionMetrics;
}

export interface IngestionMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  normalized: boolean;
  persisted: boolean;
  transitionApplied: boolean;
  dispatched: boolean;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: IngestionContext,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
