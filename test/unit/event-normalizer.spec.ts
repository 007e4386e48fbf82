import {
  CanonicalStatus,
  EventNormalizer,
  GenericCarrierAdapter,
  MockStorageAdapter,
  OccurrenceCodeRegistry,
  RejectionReason,
  Shipment,
  SswCarrierAdapter,
  computeDedupKey,
} from '../../src';

describe('EventNormalizer', () => {
  const receivedAt = new Date('2024-03-05T12:00:00.000Z');
  let storageAdapter: MockStorageAdapter;
  let registry: OccurrenceCodeRegistry;
  let normalizer: EventNormalizer;
  let shipment: Shipment;

  beforeAll(async () => {
    registry = await OccurrenceCodeRegistry.withBundledCodes();
  });

  beforeEach(async () => {
    storageAdapter = new MockStorageAdapter();
    normalizer = new EventNormalizer(
      registry,
      storageAdapter,
      [new SswCarrierAdapter()],
      { fallbackAdapter: new GenericCarrierAdapter() },
    );
    shipment = await storageAdapter.createShipment({
      trackingCode: 'TRK-1',
      carrier: 'ssw',
      invoiceNumber: 'NF-1',
      document: '00000000000100',
    });
  });

  afterEach(() => {
    storageAdapter.clear();
  });

  describe('Canonical events', () => {
    it('should map a known SSW code to its canonical status', async () => {
      const result = await normalizer.normalize(
        {
          tracking_code: 'TRK-1',
          occurrence_code: '80',
          occurred_at: '2024-03-05T10:00:00Z',
        },
        'ssw',
        receivedAt,
      );

      expect(result.kind).toBe('canonical');
      if (result.kind !== 'canonical') return;
      expect(result.shipment.id).toBe(shipment.id);
      expect(result.event.shipmentId).toBe(shipment.id);
      expect(result.event.canonicalStatus).toBe(CanonicalStatus.COLLECTED);
      expect(result.event.occurrence?.key).toBe('ssw:80');
      expect(result.event.occurredAt.toISOString()).toBe('2024-03-05T10:00:00.000Z');
      expect(result.event.occurredAtEstimated).toBe(false);
      expect(result.event.needsReview).toBe(false);
      expect(result.event.description).toBe('mercadoria recebida para transporte');
    });

    it('should record unknown codes as unclassified and flag them', async () => {
      const result = await normalizer.normalize(
        {
          tracking_code: 'TRK-1',
          occurrence_code: '999',
          occurred_at: '2024-03-05T10:00:00Z',
        },
        'ssw',
        receivedAt,
      );

      expect(result.kind).toBe('canonical');
      if (result.kind !== 'canonical') return;
      expect(result.event.canonicalStatus).toBe(CanonicalStatus.UNCLASSIFIED);
      expect(result.event.occurrenceCode).toBe('999');
      expect(result.event.occurrence).toBeNull();
      expect(result.event.needsReview).toBe(true);
    });

    it('should fall back to the arrival time when the timestamp is missing', async () => {
      const result = await normalizer.normalize(
        { tracking_code: 'TRK-1', occurrence_code: '82' },
        'ssw',
        receivedAt,
      );

      expect(result.kind).toBe('canonical');
      if (result.kind !== 'canonical') return;
      expect(result.event.occurredAt).toEqual(receivedAt);
      expect(result.event.occurredAtEstimated).toBe(true);
    });

    it('should accept JSON text', async () => {
      const result = await normalizer.normalize(
        JSON.stringify({ tracking_code: 'TRK-1', occurrence_code: '85' }),
        'ssw',
        receivedAt,
      );

      expect(result.kind === 'canonical' && result.event.canonicalStatus).toBe(
        CanonicalStatus.OUT_FOR_DELIVERY,
      );
    });

    it('should resolve a shipment by invoice number and document', async () => {
      const result = await normalizer.normalize(
        { invoice_number: 'NF-1', document: '00000000000100', occurrence_code: '1' },
        'ssw',
        receivedAt,
      );

      expect(result.kind === 'canonical' && result.shipment.id).toBe(shipment.id);
    });

    it('should let the shipment hint fill in a missing reference', async () => {
      const result = await normalizer.normalize(
        { occurrence_code: '82' },
        'ssw',
        receivedAt,
        { trackingCode: 'TRK-1' },
      );

      expect(result.kind === 'canonical' && result.shipment.id).toBe(shipment.id);
    });

    it('should route unknown sources to the fallback adapter', async () => {
      const result = await normalizer.normalize(
        { trackingCode: 'TRK-1', code: 'in_transit', occurredAt: '2024-03-05T10:00:00Z' },
        'partner-api',
        receivedAt,
      );

      expect(result.kind).toBe('canonical');
      if (result.kind !== 'canonical') return;
      expect(result.event.canonicalStatus).toBe(CanonicalStatus.IN_TRANSIT);
      expect(result.event.source).toBe('partner-api');
      expect(result.event.carrier).toBe('generic');
    });
  });

  describe('Rejections', () => {
    it('should reject events for unknown shipments as unresolved', async () => {
      const result = await normalizer.normalize(
        { tracking_code: 'NOPE', occurrence_code: '80' },
        'ssw',
        receivedAt,
      );

      expect(result.kind).toBe('rejected');
      if (result.kind !== 'rejected') return;
      expect(result.rejection.reason).toBe(RejectionReason.UNRESOLVED_SHIPMENT);
      expect(result.rejection.shipmentRef).toEqual({ trackingCode: 'NOPE' });
      expect(result.rejection.message).toBe('No shipment matches trackingCode=NOPE');
      expect(result.rejection.receivedAt).toBe(receivedAt);
    });

    it('should reject payloads that are not JSON objects', async () => {
      const result = await normalizer.normalize(
        Buffer.from('<html>maintenance</html>'),
        'ssw',
        receivedAt,
      );

      expect(result.kind).toBe('rejected');
      if (result.kind !== 'rejected') return;
      expect(result.rejection.reason).toBe(RejectionReason.MALFORMED_PAYLOAD);
      expect(result.rejection.message).toBe('Payload is not a JSON object');
    });

    it('should reject payloads without a usable shipment reference', async () => {
      const result = await normalizer.normalize({ occurrence_code: '80' }, 'ssw', receivedAt);

      expect(result.kind).toBe('rejected');
      if (result.kind !== 'rejected') return;
      expect(result.rejection.reason).toBe(RejectionReason.MALFORMED_PAYLOAD);
      expect(result.rejection.shipmentRef).toBeNull();
    });

    it('should reject unknown sources when no fallback is configured', async () => {
      const strict = new EventNormalizer(registry, storageAdapter, [new SswCarrierAdapter()]);

      const result = await strict.normalize({ trackingCode: 'TRK-1' }, 'acme', receivedAt);

      expect(result.kind === 'rejected' && result.rejection.message).toBe(
        'No carrier adapter registered for source acme',
      );
    });
  });

  describe('Deduplication keys', () => {
    const keyOf = async (payload: Record<string, unknown>, at: Date = receivedAt) => {
      const result = await normalizer.normalize(payload, 'ssw', at);
      if (result.kind !== 'canonical') {
        throw new Error('expected a canonical event');
      }
      return result.event.dedupKey;
    };

    it('should give a redelivered occurrence the same key', async () => {
      const payload = {
        tracking_code: 'TRK-1',
        occurrence_code: '82',
        occurred_at: '2024-03-05T10:00:00Z',
      };

      expect(await keyOf(payload)).toBe(
        await keyOf({ ...payload }, new Date('2024-03-05T13:00:00Z')),
      );
    });

    it('should key on the carrier event id when present', async () => {
      const first = await keyOf({
        tracking_code: 'TRK-1',
        occurrence_code: '82',
        occurred_at: '2024-03-05T10:00:00Z',
        event_id: 'e-1',
      });
      const corrected = await keyOf({
        tracking_code: 'TRK-1',
        occurrence_code: '82',
        occurred_at: '2024-03-05T10:05:00Z',
        event_id: 'e-1',
      });

      expect(corrected).toBe(first);
    });

    it('should key estimated timestamps on the payload, whatever the key order', async () => {
      const first = await keyOf(
        { tracking_code: 'TRK-1', occurrence_code: '82', location: 'SPO' },
        new Date('2024-03-05T12:00:00Z'),
      );
      const retry = await keyOf(
        { location: 'SPO', occurrence_code: '82', tracking_code: 'TRK-1' },
        new Date('2024-03-05T12:07:00Z'),
      );

      expect(retry).toBe(first);
    });

    it('should separate different occurrences at the same instant', async () => {
      const collected = await keyOf({
        tracking_code: 'TRK-1',
        occurrence_code: '80',
        occurred_at: '2024-03-05T10:00:00Z',
      });
      const inTransit = await keyOf({
        tracking_code: 'TRK-1',
        occurrence_code: '82',
        occurred_at: '2024-03-05T10:00:00Z',
      });

      expect(collected).not.toBe(inTransit);
    });

    it('should fall back to the description when there is no code', () => {
      const base = {
        shipmentId: 'shp-1',
        source: 'ssw',
        carrierEventId: null,
        occurrenceCode: null,
        occurredAt: new Date('2024-03-05T10:00:00Z'),
        occurredAtEstimated: false,
        payload: {},
      };

      expect(computeDedupKey({ ...base, description: 'saida de unidade' })).not.toBe(
        computeDedupKey({ ...base, description: 'chegada em unidade' }),
      );
      expect(computeDedupKey({ ...base, description: 'saida de unidade' })).toMatch(
        /^[0-9a-f]{64}$/,
      );
    });
  });

  describe('Adapters', () => {
    it('should route sources to registered adapters regardless of case', async () => {
      normalizer.registerAdapter(new GenericCarrierAdapter('partner'));

      const result = await normalizer.normalize(
        { trackingCode: 'TRK-1', code: 'delivered', occurredAt: '2024-03-05T10:00:00Z' },
        'PARTNER',
        receivedAt,
      );

      expect(normalizer.getSources()).toEqual(['ssw', 'partner']);
      expect(result.kind).toBe('canonical');
      if (result.kind !== 'canonical') return;
      expect(result.event.carrier).toBe('partner');
      expect(result.event.canonicalStatus).toBe(CanonicalStatus.DELIVERED);
    });
  });
});
