import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { TrackingEngineService } from './modules';

/**
 * Standalone worker: ingestion is driven by the host through
 * TrackingEngineService; replay, recovery and archival run on timers
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();

  const logger = new Logger('Trackline');
  const engine = app.get(TrackingEngineService);
  const statistics = await engine.getStatistics();

  logger.log(
    `Tracking engine ready: ${statistics.registry.entries} occurrence codes (${statistics.registry.source}), ${statistics.shipments} shipments`,
  );
}

bootstrap().catch((error: unknown) => {
  new Logger('Trackline').error('Failed to start tracking engine', error);
  process.exit(1);
});
