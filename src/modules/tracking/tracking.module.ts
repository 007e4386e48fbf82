import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import {
  ArchiveAdapter,
  CarrierAdapter,
  EngineEventBus,
  JsonFileCodeSource,
  LoggingEventHandler,
  OccurrenceCodeRegistry,
  StorageAdapter,
  TrackingEngine,
  createTrackingEngine,
} from '../../core';
import { InMemoryArchiveAdapter, MongooseArchiveAdapter } from '../../adapters/archive';
import { GenericCarrierAdapter, SswCarrierAdapter } from '../../adapters/carriers';
import { LoggingNotificationSender } from '../../adapters/notifications';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import { TypeORMStorageAdapter, createDataSource } from '../../adapters/storage/typeorm';
import {
  TrackingModuleAsyncConfig,
  TrackingModuleConfig,
  mergeTrackingConfig,
} from './tracking.config';
import {
  ARCHIVE_ADAPTER,
  AUTOMATION_DISPATCHER,
  ENGINE_EVENT_BUS,
  INGESTION_PROCESSOR,
  OCCURRENCE_REGISTRY,
  REPLAY_QUEUE,
  STORAGE_ADAPTER,
  TRACKING_CONFIG,
  TRACKING_ENGINE,
  TRACKING_SERVICE,
} from './constants';
import { TrackingEngineService } from './services/tracking-engine.service';
import { ReplayProcessor } from './services/replay.processor';
import { InvocationRecoveryProcessor } from './services/invocation-recovery.processor';
import { ArchivalProcessor } from './services/archival.processor';

const EXPORTED_TOKENS = [
  TRACKING_CONFIG,
  STORAGE_ADAPTER,
  ENGINE_EVENT_BUS,
  TRACKING_ENGINE,
  INGESTION_PROCESSOR,
  TRACKING_SERVICE,
  REPLAY_QUEUE,
  AUTOMATION_DISPATCHER,
  TrackingEngineService,
];

/**
 * Tracking Module - wires the engine into a Nest application
 *
 * No controllers: hosts call TrackingEngineService (or the exported core
 * components) from their own transport.
 */
@Global()
@Module({})
export class TrackingModule {
  /**
   * Configure the engine synchronously
   */
  static forRoot(config: TrackingModuleConfig): DynamicModule {
    return {
      module: TrackingModule,
      providers: [
        {
          provide: TRACKING_CONFIG,
          useValue: mergeTrackingConfig(config),
        },
        ...this.createProviders(),
      ],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the engine asynchronously (e.g. from ConfigService)
   */
  static forRootAsync(options: TrackingModuleAsyncConfig): DynamicModule {
    return {
      module: TrackingModule,
      imports: options.imports || [],
      providers: [
        {
          provide: TRACKING_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeTrackingConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers shared by both entry points; all read TRACKING_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: (config: TrackingModuleConfig) => this.createStorageAdapter(config),
        inject: [TRACKING_CONFIG],
      },
      {
        provide: ARCHIVE_ADAPTER,
        useFactory: (config: TrackingModuleConfig) => this.createArchiveAdapter(config),
        inject: [TRACKING_CONFIG],
      },
      {
        provide: OCCURRENCE_REGISTRY,
        useFactory: async (config: TrackingModuleConfig) => {
          if (!config.registry?.codesFile) {
            return OccurrenceCodeRegistry.withBundledCodes();
          }
          const registry = new OccurrenceCodeRegistry();
          await registry.load(new JsonFileCodeSource(config.registry.codesFile));
          return registry;
        },
        inject: [TRACKING_CONFIG],
      },
      {
        provide: ENGINE_EVENT_BUS,
        useFactory: (config: TrackingModuleConfig) => {
          const eventBus = new EngineEventBus();

          if (config.events?.enableLogging) {
            const loggingHandler = new LoggingEventHandler(
              undefined,
              config.events.logLevel,
            );
            eventBus.onAll(loggingHandler.getHandler());
          }

          for (const { eventType, handler } of config.events?.handlers ?? []) {
            eventBus.on(eventType, handler);
          }

          return eventBus;
        },
        inject: [TRACKING_CONFIG],
      },
      {
        provide: TRACKING_ENGINE,
        useFactory: (
          config: TrackingModuleConfig,
          storageAdapter: StorageAdapter,
          archiveAdapter: ArchiveAdapter | null,
          registry: OccurrenceCodeRegistry,
          eventBus: EngineEventBus,
        ): TrackingEngine => {
          const timezoneOffset = config.engine?.carriers?.timezoneOffset;
          const carrierAdapters: CarrierAdapter[] = [
            new SswCarrierAdapter({ timezoneOffset }),
            ...(config.carriers?.adapters ?? []),
          ];

          return createTrackingEngine({
            storageAdapter,
            registry,
            carrierAdapters,
            fallbackAdapter: config.carriers?.genericFallback
              ? new GenericCarrierAdapter()
              : undefined,
            notificationSender:
              config.notifications?.sender ?? new LoggingNotificationSender(),
            archiveAdapter: archiveAdapter ?? undefined,
            eventBus,
            config: config.engine,
            hooks: config.hooks,
            throwOnError: config.throwOnError,
          });
        },
        inject: [
          TRACKING_CONFIG,
          STORAGE_ADAPTER,
          ARCHIVE_ADAPTER,
          OCCURRENCE_REGISTRY,
          ENGINE_EVENT_BUS,
        ],
      },
      {
        provide: INGESTION_PROCESSOR,
        useFactory: (engine: TrackingEngine) => engine.processor,
        inject: [TRACKING_ENGINE],
      },
      {
        provide: TRACKING_SERVICE,
        useFactory: (engine: TrackingEngine) => engine.service,
        inject: [TRACKING_ENGINE],
      },
      {
        provide: REPLAY_QUEUE,
        useFactory: (engine: TrackingEngine) => engine.replayQueue,
        inject: [TRACKING_ENGINE],
      },
      {
        provide: AUTOMATION_DISPATCHER,
        useFactory: (engine: TrackingEngine) => engine.dispatcher,
        inject: [TRACKING_ENGINE],
      },
      TrackingEngineService,
      ReplayProcessor,
      InvocationRecoveryProcessor,
      ArchivalProcessor,
    ];
  }

  private static async createStorageAdapter(
    config: TrackingModuleConfig,
  ): Promise<StorageAdapter> {
    switch (config.storage.type) {
      case 'mock':
        return new MockStorageAdapter();

      case 'typeorm': {
        const dataSource = createDataSource(config.storage.options);
        await dataSource.initialize();
        return new TypeORMStorageAdapter(dataSource);
      }

      case 'custom':
        if (!config.storage.adapter) {
          throw new Error('Custom storage adapter not provided');
        }
        return config.storage.adapter;
    }
  }

  private static async createArchiveAdapter(
    config: TrackingModuleConfig,
  ): Promise<ArchiveAdapter | null> {
    const archive: NonNullable<TrackingModuleConfig['archive']> = config.archive ?? {
      type: 'none',
    };

    switch (archive.type) {
      case 'none':
        return null;

      case 'memory':
        return new InMemoryArchiveAdapter();

      case 'mongoose':
        if (!archive.uri) {
          throw new Error('Mongoose archive requires a connection uri');
        }
        return MongooseArchiveAdapter.connect(archive.uri);

      case 'custom':
        if (!archive.adapter) {
          throw new Error('Custom archive adapter not provided');
        }
        return archive.adapter;
    }
  }
}
