import {
  CanonicalStatus,
  EngineEvent,
  IngestionOutcome,
  MockCarrierPayloadFactory,
  ReplayStatus,
  TestEngine,
  createTestEngine,
} from '../../src';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

describe('Replay of unresolved events', () => {
  let engine: TestEngine;
  let notices: EngineEvent[];

  beforeEach(async () => {
    engine = await createTestEngine();
    notices = [];
    engine.eventBus.onAll((event) => {
      notices.push(event);
    });
  });

  const park = async (
    trackingCode: string,
    status: Exclude<CanonicalStatus, CanonicalStatus.UNCLASSIFIED>,
    occurredAt: Date,
    receivedAt?: Date,
  ) => {
    const result = await engine.processor.ingestRawEvent(
      MockCarrierPayloadFactory.ssw(status, { trackingCode, occurredAt }),
      'ssw',
      { receivedAt },
    );
    expect(result.outcome).toBe(IngestionOutcome.UNRESOLVED);
    return result;
  };

  describe('on registration', () => {
    it('should apply events that arrived before the shipment existed', async () => {
      const t0 = new Date('2024-03-04T08:00:00.000Z');
      await park('TRK-9', CanonicalStatus.COLLECTED, t0);
      await park('TRK-9', CanonicalStatus.IN_TRANSIT, new Date(t0.getTime() + HOUR));

      const { shipment, replay } = await engine.service.registerShipment({
        trackingCode: 'TRK-9',
        carrier: 'ssw',
      });

      expect(replay).toEqual({ attempted: 2, resolved: 2, pending: 0, expired: 0 });
      expect(shipment.currentStatus).toBe(CanonicalStatus.IN_TRANSIT);

      const resolved = await engine.storage.listUnresolved({ status: ReplayStatus.RESOLVED });
      expect(resolved).toHaveLength(2);
      expect(resolved.every((entry) => entry.resolvedEventId !== null)).toBe(true);
      expect(resolved.every((entry) => entry.attempts === 1)).toBe(true);
    });

    it('should leave entries for other shipments parked', async () => {
      await park('TRK-9', CanonicalStatus.COLLECTED, new Date());
      await park('TRK-OTHER', CanonicalStatus.COLLECTED, new Date());

      const { replay } = await engine.service.registerShipment({
        trackingCode: 'TRK-9',
        carrier: 'ssw',
      });

      expect(replay.resolved).toBe(1);
      const pending = await engine.storage.listUnresolved({ status: ReplayStatus.PENDING });
      expect(pending.map((entry) => entry.shipmentRef?.trackingCode)).toEqual(['TRK-OTHER']);
    });

    it('should report a clean registration when nothing is parked', async () => {
      const { shipment, replay } = await engine.service.registerShipment({
        trackingCode: 'TRK-9',
        carrier: 'ssw',
      });

      expect(replay).toEqual({ attempted: 0, resolved: 0, pending: 0, expired: 0 });
      expect(shipment.currentStatus).toBe(CanonicalStatus.CREATED);
    });
  });

  describe('scheduled passes', () => {
    it('should leave entries alone before they are due', async () => {
      const now = Date.now();
      await park('TRK-9', CanonicalStatus.COLLECTED, new Date(now), new Date(now));

      expect(await engine.replayQueue.replayDue(new Date(now + 30 * 1000))).toEqual({
        attempted: 0,
        resolved: 0,
        pending: 0,
        expired: 0,
      });
    });

    it('should back off while the shipment is still unknown', async () => {
      const now = Date.now();
      await park('TRK-9', CanonicalStatus.COLLECTED, new Date(now), new Date(now));

      const summary = await engine.replayQueue.replayDue(new Date(now + 2 * MINUTE));

      expect(summary).toEqual({ attempted: 1, resolved: 0, pending: 1, expired: 0 });
      const [entry] = await engine.storage.listUnresolved({ status: ReplayStatus.PENDING });
      expect(entry.attempts).toBe(1);
      expect(entry.nextAttemptAt).toEqual(new Date(now + 4 * MINUTE));
      expect(entry.lastError).toBe('No shipment matches trackingCode=TRK-9');
    });

    it('should resolve an entry once its shipment shows up', async () => {
      const now = Date.now();
      await park('TRK-9', CanonicalStatus.COLLECTED, new Date(now), new Date(now));
      const shipment = await engine.storage.createShipment({ trackingCode: 'TRK-9', carrier: 'ssw' });

      const summary = await engine.replayQueue.replayDue(new Date(now + 2 * MINUTE));

      expect(summary).toEqual({ attempted: 1, resolved: 1, pending: 0, expired: 0 });
      expect((await engine.service.getCurrentStatus(shipment.id)).status).toBe(
        CanonicalStatus.COLLECTED,
      );
    });

    it('should send entries past the window to manual review', async () => {
      await park('TRK-9', CanonicalStatus.COLLECTED, new Date());

      const summary = await engine.replayQueue.replayDue(new Date(Date.now() + 25 * HOUR));

      expect(summary).toEqual({ attempted: 0, resolved: 0, pending: 0, expired: 1 });

      const review = await engine.service.listForReview();
      expect(review.unresolved).toHaveLength(1);
      expect(review.unresolved[0].status).toBe(ReplayStatus.MANUAL_REVIEW);
      expect(review.unresolved[0].lastError).toBe('Replay window exhausted');
      expect(notices.map((notice) => notice.type)).toContain('event.manual-review');
    });
  });
});
