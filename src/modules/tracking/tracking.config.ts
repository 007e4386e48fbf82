import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import {
  ArchiveAdapter,
  CarrierAdapter,
  EngineConfigOverrides,
  EngineEventHandler,
  EngineEventType,
  EventLogLevel,
  LifecycleHooks,
  NotificationSender,
  StorageAdapter,
} from '../../core';

/**
 * Tracking Module Configuration
 */
export interface TrackingModuleConfig {
  /**
   * Primary store
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: Partial<PostgresConnectionOptions>;
    adapter?: StorageAdapter;
  };

  /**
   * Secondary, write-only mirror
   */
  archive?: {
    type: 'none' | 'memory' | 'mongoose' | 'custom';
    uri?: string;
    adapter?: ArchiveAdapter;
  };

  /**
   * Occurrence code table; the bundled seed when no file is given
   */
  registry?: {
    codesFile?: string;
  };

  carriers?: {
    /**
     * Added to the built-in SSW adapter; same source name replaces it
     */
    adapters?: CarrierAdapter[];

    /**
     * Handle unknown sources with the generic JSON adapter
     */
    genericFallback?: boolean;
  };

  notifications?: {
    sender?: NotificationSender;
  };

  /**
   * Engine policy (timeline, replay, automation, archival, carriers)
   */
  engine?: EngineConfigOverrides;

  events?: {
    enableLogging?: boolean;
    logLevel?: EventLogLevel;
    handlers?: Array<{
      eventType: EngineEventType;
      handler: EngineEventHandler;
    }>;
  };

  hooks?: LifecycleHooks;

  /**
   * Background processors
   */
  processors?: {
    replay?: { enabled?: boolean; intervalMs?: number };
    recovery?: { enabled?: boolean; intervalMs?: number };
    archival?: { enabled?: boolean };
  };

  throwOnError?: boolean;
}

/**
 * Async configuration factory
 */
export interface TrackingModuleAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<TrackingModuleConfig>['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultTrackingConfig: Omit<TrackingModuleConfig, 'storage'> = {
  archive: { type: 'none' },
  carriers: { genericFallback: true },
  events: {
    enableLogging: true,
    logLevel: 'normal',
  },
  processors: {
    replay: { enabled: true, intervalMs: 30000 },
    recovery: { enabled: true, intervalMs: 60000 },
    archival: { enabled: true },
  },
  throwOnError: false,
};

/**
 * Merge a host configuration over the defaults, section by section
 */
export function mergeTrackingConfig(
  config: TrackingModuleConfig,
): TrackingModuleConfig {
  const processors = defaultTrackingConfig.processors ?? {};

  return {
    ...defaultTrackingConfig,
    ...config,
    carriers: { ...defaultTrackingConfig.carriers, ...config.carriers },
    events: { ...defaultTrackingConfig.events, ...config.events },
    processors: {
      replay: { ...processors.replay, ...config.processors?.replay },
      recovery: { ...processors.recovery, ...config.processors?.recovery },
      archival: { ...processors.archival, ...config.processors?.archival },
    },
  };
}
