import {
  GenericCarrierAdapter,
  MalformedPayloadError,
  SswCarrierAdapter,
  parseCarrierTimestamp,
} from '../../src';

describe('Carrier adapters', () => {
  describe('parseCarrierTimestamp', () => {
    it('should read DD/MM/YY HH:mm in the default offset', () => {
      expect(parseCarrierTimestamp('05/03/24 14:30', '-03:00')?.toISOString()).toBe(
        '2024-03-05T17:30:00.000Z',
      );
    });

    it('should read four-digit years and seconds', () => {
      expect(parseCarrierTimestamp('05/03/2024 14:30:15', 'Z')?.toISOString()).toBe(
        '2024-03-05T14:30:15.000Z',
      );
    });

    it('should apply the offset to ISO values without a zone', () => {
      expect(parseCarrierTimestamp('2024-03-05T10:00:00', '-03:00')?.toISOString()).toBe(
        '2024-03-05T13:00:00.000Z',
      );
      expect(parseCarrierTimestamp('2024-03-05', '-03:00')?.toISOString()).toBe(
        '2024-03-05T03:00:00.000Z',
      );
    });

    it('should keep an explicit zone', () => {
      expect(parseCarrierTimestamp('2024-03-05T10:00:00Z', '-03:00')?.toISOString()).toBe(
        '2024-03-05T10:00:00.000Z',
      );
    });

    it('should return null for impossible or unreadable values', () => {
      expect(parseCarrierTimestamp('31/02/24 10:00')).toBeNull();
      expect(parseCarrierTimestamp('05/13/24 10:00')).toBeNull();
      expect(parseCarrierTimestamp('05/03/24 25:00')).toBeNull();
      expect(parseCarrierTimestamp('yesterday')).toBeNull();
      expect(parseCarrierTimestamp(null)).toBeNull();
    });

    it('should ignore a malformed default offset', () => {
      expect(parseCarrierTimestamp('05/03/24 14:30', 'BRT')?.toISOString()).toBe(
        '2024-03-05T14:30:00.000Z',
      );
    });
  });

  describe('SswCarrierAdapter', () => {
    const adapter = new SswCarrierAdapter();

    it('should extract the scraper payload', () => {
      const extracted = adapter.extract({
        tracking_code: 'SSW0001',
        occurrence_code: '01',
        date: '05/03/24',
        time: '14:30',
        description: 'MERCADORIA ENTREGUE',
        location: 'SAO PAULO',
        unit: 'SPO',
      });

      expect(extracted.carrier).toBe('ssw');
      expect(extracted.shipmentRef).toEqual({ trackingCode: 'SSW0001' });
      expect(extracted.occurrenceCode).toBe('1');
      expect(extracted.occurredAt?.toISOString()).toBe('2024-03-05T17:30:00.000Z');
      expect(extracted.description).toBe('MERCADORIA ENTREGUE');
      expect(extracted.location).toBe('SAO PAULO (SPO)');
      expect(extracted.carrierEventId).toBeNull();
    });

    it('should identify a shipment by invoice number and document', () => {
      const extracted = adapter.extract({
        invoice_number: 'NF-123',
        cnpj: '00000000000100',
        code: 85,
        occurred_at: '2024-03-05T08:00:00Z',
        event_id: 'ssw-evt-7',
      });

      expect(extracted.shipmentRef).toEqual({
        invoiceNumber: 'NF-123',
        document: '00000000000100',
      });
      expect(extracted.occurrenceCode).toBe('85');
      expect(extracted.occurredAt?.toISOString()).toBe('2024-03-05T08:00:00.000Z');
      expect(extracted.carrierEventId).toBe('ssw-evt-7');
    });

    it('should leave occurredAt null when the timestamp cannot be read', () => {
      const extracted = adapter.extract({
        tracking_code: 'SSW0001',
        occurrence_code: '80',
        occurred_at: 'sometime',
      });

      expect(extracted.occurredAt).toBeNull();
    });

    it('should honour a configured offset', () => {
      const utc = new SswCarrierAdapter({ timezoneOffset: 'Z' });
      const extracted = utc.extract({
        tracking_code: 'SSW0001',
        occurrence_code: '80',
        datetime: '05/03/24 14:30',
      });

      expect(extracted.occurredAt?.toISOString()).toBe('2024-03-05T14:30:00.000Z');
    });

    it('should reject payloads with nothing to read', () => {
      expect(() => adapter.extract({ page: 'maintenance' })).toThrow(
        MalformedPayloadError,
      );
    });
  });

  describe('GenericCarrierAdapter', () => {
    it('should read the engine vocabulary', () => {
      const adapter = new GenericCarrierAdapter();
      const extracted = adapter.extract({
        shipmentId: 'shp-9',
        status: 'delivered',
        timestamp: '2024-03-05T10:00:00Z',
        id: 'partner-1',
        carrier: 'JadLog',
        message: 'left at reception',
      });

      expect(extracted).toEqual({
        carrier: 'jadlog',
        shipmentRef: { shipmentId: 'shp-9' },
        occurrenceCode: 'delivered',
        occurredAt: new Date('2024-03-05T10:00:00.000Z'),
        carrierEventId: 'partner-1',
        description: 'left at reception',
        location: null,
      });
    });

    it('should default the carrier to its source name', () => {
      const adapter = new GenericCarrierAdapter('partner-api', '-03:00');
      const extracted = adapter.extract({
        trackingCode: 'PA-1',
        code: 'in_transit',
        occurredAt: '2024-03-05T10:00:00',
      });

      expect(adapter.source).toBe('partner-api');
      expect(extracted.carrier).toBe('partner-api');
      expect(extracted.occurredAt?.toISOString()).toBe('2024-03-05T13:00:00.000Z');
    });

    it('should reject payloads without reference or code', () => {
      expect(() => new GenericCarrierAdapter().extract({ note: 'hello' })).toThrow(
        'Payload carries neither a shipment reference nor an occurrence code',
      );
    });
  });
});
