import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import type { ArchiveAdapter, TrackingEngine } from '../../../core';
import type { TrackingModuleConfig } from '../tracking.config';
import { ARCHIVE_ADAPTER, TRACKING_CONFIG, TRACKING_ENGINE } from '../constants';

/**
 * Archival Processor
 *
 * Owns the archival sink timer: starts it with the module, drains the
 * queue once more on shutdown and closes the archive connection
 */
@Injectable()
export class ArchivalProcessor implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(ArchivalProcessor.name);

  constructor(
    @Inject(TRACKING_ENGINE)
    private readonly engine: TrackingEngine,
    @Inject(ARCHIVE_ADAPTER)
    private readonly archiveAdapter: ArchiveAdapter | null,
    @Inject(TRACKING_CONFIG)
    private readonly config: TrackingModuleConfig,
  ) {}

  onModuleInit(): void {
    const sink = this.engine.archivalSink;
    if (sink && this.config.processors?.archival?.enabled) {
      sink.start();
      this.logger.log('Archive mirror enabled');
    }
  }

  async onApplicationShutdown(): Promise<void> {
    const sink = this.engine.archivalSink;
    if (sink) {
      await sink.stop();
      const stats = sink.getStats();
      if (stats.pending > 0) {
        this.logger.warn(`${stats.pending} archive record(s) not written at shutdown`);
      }
    }
    await this.archiveAdapter?.close?.();
  }
}
