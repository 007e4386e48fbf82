import { ArchivalSink } from '../archival';
import { ActionExecutor, AutomationDispatcher } from '../automation';
import { EngineEventBus } from '../events';
import {
  ArchiveAdapter,
  CarrierAdapter,
  EngineConfig,
  EngineConfigOverrides,
  LifecycleHooks,
  NotificationSender,
  StorageAdapter,
  resolveEngineConfig,
} from '../interfaces';
import { EventNormalizer } from '../normalizer';
import { IngestionProcessor } from '../pipeline';
import { OccurrenceCodeRegistry } from '../registry';
import { ReplayQueue } from '../replay';
import { TrackingService } from '../services';
import { ShipmentStateMachine, StatusEngine } from '../state-machine';
import { TimelineBuilder } from '../timeline';

export interface TrackingEngineOptions {
  storageAdapter: StorageAdapter;
  registry: OccurrenceCodeRegistry;
  carrierAdapters: CarrierAdapter[];
  notificationSender: NotificationSender;

  /**
   * Handles sources without a dedicated adapter
   */
  fallbackAdapter?: CarrierAdapter;

  /**
   * No archive mirror when omitted
   */
  archiveAdapter?: ArchiveAdapter;
  eventBus?: EngineEventBus;
  config?: EngineConfigOverrides;
  hooks?: LifecycleHooks;
  throwOnError?: boolean;
}

/**
 * Every engine component, wired once
 */
export interface TrackingEngine {
  config: EngineConfig;
  storageAdapter: StorageAdapter;
  registry: OccurrenceCodeRegistry;
  eventBus: EngineEventBus;
  normalizer: EventNormalizer;
  timelineBuilder: TimelineBuilder;
  stateMachine: ShipmentStateMachine;
  statusEngine: StatusEngine;
  actionExecutor: ActionExecutor;
  dispatcher: AutomationDispatcher;
  archivalSink: ArchivalSink | null;
  processor: IngestionProcessor;
  replayQueue: ReplayQueue;
  service: TrackingService;
}

/**
 * Build the engine graph. Timers (archival flush, replay, recovery) are
 * not started here; the host owns their lifecycle.
 */
export function createTrackingEngine(options: TrackingEngineOptions): TrackingEngine {
  const config = resolveEngineConfig(options.config);
  const { storageAdapter, registry } = options;
  const eventBus = options.eventBus ?? new EngineEventBus();

  const normalizer = new EventNormalizer(
    registry,
    storageAdapter,
    options.carrierAdapters,
    { fallbackAdapter: options.fallbackAdapter },
  );
  const timelineBuilder = new TimelineBuilder(storageAdapter, config.timeline);
  const stateMachine = new ShipmentStateMachine();
  const statusEngine = new StatusEngine(
    storageAdapter,
    stateMachine,
    timelineBuilder,
    config.stateMachine,
  );

  const actionExecutor = new ActionExecutor(options.notificationSender, {
    actionTimeoutMs: config.automation.actionTimeoutMs,
  });
  const dispatcher = new AutomationDispatcher(
    storageAdapter,
    actionExecutor,
    eventBus,
    {
      maxAttempts: config.automation.maxAttempts,
      recoveryAfterMs: config.automation.recoveryAfterMs,
      batchSize: config.automation.batchSize,
    },
    options.hooks,
  );

  const archivalSink = options.archiveAdapter
    ? new ArchivalSink(options.archiveAdapter, config.archival)
    : null;

  const processor = new IngestionProcessor({
    storageAdapter,
    normalizer,
    statusEngine,
    dispatcher,
    eventBus,
    archivalSink: archivalSink ?? undefined,
    replayBaseDelayMs: config.replay.baseDelayMs,
    hooks: options.hooks,
    throwOnError: options.throwOnError,
  });

  const replayQueue = new ReplayQueue(storageAdapter, processor, eventBus, config.replay);

  const service = new TrackingService({
    storageAdapter,
    registry,
    stateMachine,
    timelineBuilder,
    statusEngine,
    replayQueue,
    dispatcher,
    eventBus,
    archivalSink: archivalSink ?? undefined,
  });

  return {
    config,
    storageAdapter,
    registry,
    eventBus,
    normalizer,
    timelineBuilder,
    stateMachine,
    statusEngine,
    actionExecutor,
    dispatcher,
    archivalSink,
    processor,
    replayQueue,
    service,
  };
}
