import {
  CanonicalStatus,
  MockStorageAdapter,
  TimelineBuilder,
  TrackingEvent,
} from '../../src';

function event(
  id: string,
  status: CanonicalStatus,
  occurredAt: string,
  receivedAt: string = occurredAt,
): TrackingEvent {
  return new TrackingEvent(
    id,
    'shp-1',
    null,
    status,
    'ssw',
    new Date(occurredAt),
    new Date(receivedAt),
    `key-${id}`,
  );
}

describe('TimelineBuilder', () => {
  const storageAdapter = new MockStorageAdapter();

  describe('Ordering', () => {
    const builder = new TimelineBuilder(storageAdapter);

    it('should order by occurrence time, not arrival', () => {
      const late = event('a', CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z', '2024-03-05T12:00:00Z');
      const early = event('b', CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z', '2024-03-05T10:01:00Z');

      expect(builder.order([early, late]).map((e) => e.id)).toEqual(['a', 'b']);
    });

    it('should break occurrence ties by arrival, then by id', () => {
      const events = [
        event('c', CanonicalStatus.DELIVERED, '2024-03-05T10:00:00Z', '2024-03-05T10:05:00Z'),
        event('b', CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-05T10:00:00Z', '2024-03-05T10:01:00Z'),
        event('a', CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-05T10:00:00Z', '2024-03-05T10:01:00Z'),
      ];

      expect(builder.order(events).map((e) => e.id)).toEqual(['a', 'b', 'c']);
    });

    it('should leave the input untouched', () => {
      const events = [
        event('b', CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'),
        event('a', CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z'),
      ];

      builder.order(events);

      expect(events.map((e) => e.id)).toEqual(['b', 'a']);
    });

    it('should put lower progress first under the status-rank tie-break', () => {
      const byRank = new TimelineBuilder(storageAdapter, { tieBreak: 'status-rank' });
      const events = [
        event('exc', CanonicalStatus.EXCEPTION, '2024-03-05T10:00:00Z', '2024-03-05T10:00:00Z'),
        event('dlv', CanonicalStatus.DELIVERED, '2024-03-05T10:00:00Z', '2024-03-05T10:01:00Z'),
        event('ofd', CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-05T10:00:00Z', '2024-03-05T10:02:00Z'),
      ];

      expect(byRank.order(events).map((e) => e.id)).toEqual(['ofd', 'dlv', 'exc']);
      expect(builder.order(events).map((e) => e.id)).toEqual(['exc', 'dlv', 'ofd']);
    });

    it('should build from stored events', async () => {
      const { id: shipmentId } = await storageAdapter.createShipment({
        trackingCode: 'TRK-TL',
        carrier: 'ssw',
      });
      for (const [status, occurredAt] of [
        [CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-06T08:00:00Z'],
        [CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z'],
        [CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'],
      ] as const) {
        await storageAdapter.insertTrackingEvent({
          shipmentId,
          occurrenceCode: null,
          canonicalStatus: status,
          source: 'ssw',
          occurredAt: new Date(occurredAt),
          occurredAtEstimated: false,
          receivedAt: new Date(),
          dedupKey: `${shipmentId}:${status}`,
          needsReview: false,
          carrierEventId: null,
          description: null,
          location: null,
          rawPayload: {},
        });
      }

      const timeline = await builder.build(shipmentId);

      expect(timeline.map((e) => e.canonicalStatus)).toEqual([
        CanonicalStatus.COLLECTED,
        CanonicalStatus.IN_TRANSIT,
        CanonicalStatus.OUT_FOR_DELIVERY,
      ]);
    });
  });

  describe('Gaps', () => {
    const builder = new TimelineBuilder(storageAdapter, { gapThresholdHours: 72 });

    it('should report skipped progress stages', () => {
      const events = [
        event('col', CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z'),
        event('dlv', CanonicalStatus.DELIVERED, '2024-03-06T08:00:00Z'),
      ];

      expect(builder.gaps(events)).toEqual([
        {
          kind: 'skipped-stage',
          afterEventId: 'col',
          beforeEventId: 'dlv',
          missing: [CanonicalStatus.IN_TRANSIT, CanonicalStatus.OUT_FOR_DELIVERY],
        },
      ]);
    });

    it('should report stages missing before the first event', () => {
      const events = [event('trn', CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z')];

      expect(builder.gaps(events)).toEqual([
        {
          kind: 'skipped-stage',
          afterEventId: null,
          beforeEventId: 'trn',
          missing: [CanonicalStatus.COLLECTED],
        },
      ]);
    });

    it('should report silences longer than the threshold', () => {
      const events = [
        event('col', CanonicalStatus.COLLECTED, '2024-03-01T00:00:00Z'),
        event('exc', CanonicalStatus.EXCEPTION, '2024-03-05T00:00:00Z'),
      ];

      expect(builder.gaps(events)).toEqual([
        {
          kind: 'silence',
          afterEventId: 'col',
          beforeEventId: 'exc',
          durationMs: 96 * 60 * 60 * 1000,
        },
      ]);
    });

    it('should find nothing in a complete, steady timeline', () => {
      const events = [
        event('col', CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z'),
        event('trn', CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'),
        event('ofd', CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-06T08:00:00Z'),
        event('dlv', CanonicalStatus.DELIVERED, '2024-03-06T11:00:00Z'),
      ];

      expect(builder.gaps(events)).toEqual([]);
    });
  });
});
