import { registerAs } from '@nestjs/config';
import {
  EngineConfig,
  EngineConfigOverrides,
  EventLogLevel,
  TimelineTieBreak,
} from '../core';
import type { TrackingModuleConfig } from '../modules/tracking/tracking.config';

const HOUR_MS = 60 * 60 * 1000;

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  return raw === undefined ? fallback : raw === 'true';
}

function isTieBreak(value: string): value is TimelineTieBreak {
  return value === 'received-at' || value === 'status-rank';
}

function isLogLevel(value: string): value is EventLogLevel {
  return value === 'verbose' || value === 'normal' || value === 'minimal';
}

function readStorageType(): TrackingModuleConfig['storage']['type'] {
  const raw = process.env.STORAGE_TYPE ?? 'mock';
  if (raw === 'mock' || raw === 'typeorm') {
    return raw;
  }
  throw new Error(`STORAGE_TYPE must be mock or typeorm, got "${raw}"`);
}

/**
 * Engine policy overrides; unset variables keep the engine defaults
 */
function readEngineOverrides(): EngineConfigOverrides {
  const timeline: Partial<EngineConfig['timeline']> = {};
  const tieBreak = process.env.TIMELINE_TIE_BREAK;
  if (tieBreak !== undefined) {
    if (!isTieBreak(tieBreak)) {
      throw new Error(`TIMELINE_TIE_BREAK must be received-at or status-rank`);
    }
    timeline.tieBreak = tieBreak;
  }
  const gapHours = readInt('GAP_THRESHOLD_HOURS');
  if (gapHours !== undefined) timeline.gapThresholdHours = gapHours;

  const replay: Partial<EngineConfig['replay']> = {};
  const windowHours = readInt('REPLAY_WINDOW_HOURS');
  if (windowHours !== undefined) replay.windowMs = windowHours * HOUR_MS;
  const replayDelay = readInt('REPLAY_BASE_DELAY_MS');
  if (replayDelay !== undefined) replay.baseDelayMs = replayDelay;

  const automation: Partial<EngineConfig['automation']> = {};
  const actionTimeout = readInt('ACTION_TIMEOUT_MS');
  if (actionTimeout !== undefined) automation.actionTimeoutMs = actionTimeout;
  const maxAttempts = readInt('AUTOMATION_MAX_ATTEMPTS');
  if (maxAttempts !== undefined) automation.maxAttempts = maxAttempts;

  const archival: Partial<EngineConfig['archival']> = {};
  const flushInterval = readInt('ARCHIVE_FLUSH_INTERVAL_MS');
  if (flushInterval !== undefined) archival.flushIntervalMs = flushInterval;

  const carriers: Partial<EngineConfig['carriers']> = {};
  if (process.env.CARRIER_TIMEZONE_OFFSET) {
    carriers.timezoneOffset = process.env.CARRIER_TIMEZONE_OFFSET;
  }

  return { timeline, replay, automation, archival, carriers };
}

/**
 * Tracking engine configuration from environment variables
 */
export const trackingConfig = registerAs('tracking', (): TrackingModuleConfig => {
  const mongoUrl = process.env.MONGO_URL;
  const logLevel = process.env.EVENT_LOG_LEVEL ?? 'normal';

  return {
    storage: { type: readStorageType() },
    archive: mongoUrl ? { type: 'mongoose', uri: mongoUrl } : { type: 'none' },
    registry: { codesFile: process.env.OCCURRENCE_CODES_FILE || undefined },
    engine: readEngineOverrides(),
    events: {
      enableLogging: readFlag('EVENT_LOGGING', true),
      logLevel: isLogLevel(logLevel) ? logLevel : 'normal',
    },
    processors: {
      replay: {
        enabled: readFlag('REPLAY_PROCESSOR_ENABLED', true),
        intervalMs: readInt('REPLAY_INTERVAL_MS'),
      },
      recovery: {
        enabled: readFlag('RECOVERY_PROCESSOR_ENABLED', true),
        intervalMs: readInt('RECOVERY_INTERVAL_MS'),
      },
      archival: { enabled: Boolean(mongoUrl) },
    },
  };
});
