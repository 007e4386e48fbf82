import { BadRequestException, INestApplicationContext, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  CanonicalStatus,
  IngestionOutcome,
  InvocationRecoveryProcessor,
  MockCarrierPayloadFactory,
  ReplayProcessor,
  TrackingEngineService,
  TrackingModule,
} from '../../src';

@Module({
  imports: [
    TrackingModule.forRoot({
      storage: { type: 'mock' },
      archive: { type: 'memory' },
      events: { enableLogging: false },
      processors: {
        replay: { enabled: false },
        recovery: { enabled: false },
        archival: { enabled: false },
      },
    }),
  ],
})
class HostModule {}

@Module({
  imports: [
    TrackingModule.forRootAsync({
      useFactory: async () => ({
        storage: { type: 'mock' as const },
        engine: { replay: { baseDelayMs: 5000 } },
        processors: {
          replay: { enabled: false },
          recovery: { enabled: false },
        },
      }),
    }),
  ],
})
class AsyncHostModule {}

describe('TrackingModule', () => {
  let app: INestApplicationContext;
  let tracking: TrackingEngineService;

  beforeEach(async () => {
    app = await NestFactory.createApplicationContext(HostModule, { logger: false });
    tracking = app.get(TrackingEngineService);
  });

  afterEach(async () => {
    await app.close();
  });

  it('should register shipments and ingest their events', async () => {
    const { shipment } = await tracking.registerShipment({
      trackingCode: 'TRK-1',
      carrier: 'ssw',
    });

    const result = await tracking.ingestRawEvent(
      MockCarrierPayloadFactory.ssw(CanonicalStatus.COLLECTED, { trackingCode: 'TRK-1' }),
      'ssw',
    );

    expect(result.outcome).toBe(IngestionOutcome.ACCEPTED);
    expect((await tracking.getCurrentStatus(shipment.id)).status).toBe(
      CanonicalStatus.COLLECTED,
    );
    expect(await tracking.isHealthy()).toBe(true);
  });

  it('should validate registrations', async () => {
    await expect(
      tracking.registerShipment({ trackingCode: '', carrier: 'ssw' }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('should validate the ingestion envelope', async () => {
    await expect(tracking.ingestRawEvent({ tracking_code: 'TRK-1' }, '')).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('should create automation rules from plain input', async () => {
    const rule = await tracking.createAutomationRule({
      name: 'Delivered notice',
      triggerStatuses: ['delivered'],
      conditions: [{ op: 'exists', field: 'invoiceNumber' }],
      actions: [{ type: 'notify', channel: 'email', template: 'delivered' }],
    });

    expect(rule.triggerStatuses).toEqual([CanonicalStatus.DELIVERED]);
    expect(rule.conditions).toEqual([{ op: 'exists', field: 'invoiceNumber' }]);
    expect(await tracking.listAutomationRules({ enabled: true })).toHaveLength(1);
  });

  it('should report statistics across the engine', async () => {
    await tracking.registerShipment({ trackingCode: 'TRK-1', carrier: 'ssw' });

    const statistics = await tracking.getStatistics();

    expect(statistics.shipments).toBe(1);
    expect(statistics.registry.source).toBe('bundled');
    expect(statistics.archive).toEqual({ pending: 0, written: 0, dropped: 0 });
    expect(statistics.pipeline.stages).toEqual([
      'normalization',
      'ingest',
      'state-engine',
      'dispatch',
    ]);
  });

  it('should expose the background passes', async () => {
    expect(await app.get(ReplayProcessor).processDue()).toEqual({
      attempted: 0,
      resolved: 0,
      pending: 0,
      expired: 0,
    });
    expect(await app.get(InvocationRecoveryProcessor).recover()).toEqual({
      retried: 0,
      completed: 0,
      abandoned: 0,
    });
  });

  it('should build from an async factory', async () => {
    const asyncApp = await NestFactory.createApplicationContext(AsyncHostModule, {
      logger: false,
    });
    const receivedAt = new Date('2024-03-04T10:00:00.000Z');

    const result = await asyncApp
      .get(TrackingEngineService)
      .ingestRawEvent(
        MockCarrierPayloadFactory.ssw(CanonicalStatus.COLLECTED, { trackingCode: 'TRK-404' }),
        'ssw',
        { receivedAt },
      );

    expect(result.outcome).toBe(IngestionOutcome.UNRESOLVED);
    expect(result.context.unresolvedEntry?.nextAttemptAt).toEqual(
      new Date('2024-03-04T10:00:05.000Z'),
    );
    await asyncApp.close();
  });
});
