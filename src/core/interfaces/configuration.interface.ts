import { CanonicalStatus, IngestionOutcome } from '../domain/enums';

/**
 * Tie-break for events sharing the same occurredAt
 * - received-at: earlier arrival first
 * - status-rank: lower progress rank first, then arrival
 */
export type TimelineTieBreak = 'received-at' | 'status-rank';

/**
 * Engine policy knobs. Every section has a default in defaultEngineConfig.
 */
export interface EngineConfig {
  timeline: {
    tieBreak: TimelineTieBreak;

    /**
     * Silence between consecutive events longer than this is reported as a gap
     */
    gapThresholdHours: number;
  };

  /**
   * Replay of events whose shipment was unknown at arrival
   */
  replay: {
    /**
     * Measured from first sighting; past it the event goes to manual review
     */
    windowMs: number;
    baseDelayMs: number;
    maxDelayMs: number;
    batchSize: number;
  };

  automation: {
    /**
     * Upper bound for a single action (webhook call, notification)
     */
    actionTimeoutMs: number;
    maxAttempts: number;

    /**
     * A claim older than this without completing is considered interrupted
     */
    recoveryAfterMs: number;
    batchSize: number;
  };

  stateMachine: {
    maxConflictRetries: number;
    conflictBackoffMs: number;
  };

  archival: {
    flushIntervalMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxQueueSize: number;
    batchSize: number;
  };

  carriers: {
    /**
     * UTC offset applied to carrier timestamps that carry none (SSW local time)
     */
    timezoneOffset: string;
  };
}

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

export const defaultEngineConfig: EngineConfig = {
  timeline: {
    tieBreak: 'received-at',
    gapThresholdHours: 72,
  },
  replay: {
    windowMs: 24 * 60 * 60 * 1000,
    baseDelayMs: 60 * 1000,
    maxDelayMs: 30 * 60 * 1000,
    batchSize: 100,
  },
  automation: {
    actionTimeoutMs: 10000,
    maxAttempts: 5,
    recoveryAfterMs: 5 * 60 * 1000,
    batchSize: 50,
  },
  stateMachine: {
    maxConflictRetries: 5,
    conflictBackoffMs: 10,
  },
  archival: {
    flushIntervalMs: 2000,
    maxAttempts: 5,
    baseDelayMs: 1000,
    maxQueueSize: 10000,
    batchSize: 100,
  },
  carriers: {
    timezoneOffset: '-03:00',
  },
};

/**
 * Merge overrides section by section over the defaults
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
): EngineConfig {
  return {
    timeline: { ...defaultEngineConfig.timeline, ...overrides.timeline },
    replay: { ...defaultEngineConfig.replay, ...overrides.replay },
    automation: { ...defaultEngineConfig.automation, ...overrides.automation },
    stateMachine: {
      ...defaultEngineConfig.stateMachine,
      ...overrides.stateMachine,
    },
    archival: { ...defaultEngineConfig.archival, ...overrides.archival },
    carriers: { ...defaultEngineConfig.carriers, ...overrides.carriers },
  };
}

/**
 * Lifecycle hooks for monitoring and metrics
 */
export interface LifecycleHooks {
  /**
   * Called once per raw event with its final outcome
   */
  onIngestionFate?: (info: IngestionFateInfo) => void | Promise<void>;

  /**
   * Called after a status transition commits
   */
  onTransition?: (info: TransitionInfo) => void | Promise<void>;

  /**
   * Called after each automation action, successful or not
   */
  onActionResult?: (info: ActionResultInfo) => void | Promise<void>;

  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

export interface IngestionFateInfo {
  source: string;
  outcome: IngestionOutcome;
  shipmentId?: string;
  eventId?: string;
  canonicalStatus?: CanonicalStatus;
  latencyMs: number;
  error?: Error;
}

export interface TransitionInfo {
  shipmentId: string;
  fromStatus: CanonicalStatus;
  toStatus: CanonicalStatus;
  statusVersion: number;
  eventId: string | null;
}

export interface ActionResultInfo {
  shipmentId: string;
  ruleId: string;
  invocationId: string;
  actionIndex: number;
  actionType: string;
  success: boolean;
  durationMs: number;
  error?: Error;
}

export interface ErrorContext {
  operation: string;
  source?: string;
  shipmentId?: string;
  metadata?: Record<string, unknown>;
}
