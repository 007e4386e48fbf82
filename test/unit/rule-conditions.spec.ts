import {
  CanonicalStatus,
  ConditionSubject,
  RuleCondition,
  Shipment,
  conditionsHold,
  evaluateCondition,
  isConditionField,
} from '../../src';

describe('Rule conditions', () => {
  const subject: ConditionSubject = {
    shipment: new Shipment(
      'shp-1',
      'TRK-1',
      'ssw',
      CanonicalStatus.DELIVERED,
      3,
      'evt-3',
      'NF-1',
      null,
      { customerTier: 'gold', fragile: true, weightKg: 12 },
    ),
    previousStatus: CanonicalStatus.OUT_FOR_DELIVERY,
  };

  it('should compare shipment fields', () => {
    expect(evaluateCondition({ op: 'equals', field: 'carrier', value: 'ssw' }, subject)).toBe(true);
    expect(evaluateCondition({ op: 'not-equals', field: 'carrier', value: 'ssw' }, subject)).toBe(false);
  });

  it('should read the previous status', () => {
    const condition: RuleCondition = {
      op: 'in',
      field: 'previousStatus',
      values: [CanonicalStatus.OUT_FOR_DELIVERY, CanonicalStatus.EXCEPTION],
    };

    expect(evaluateCondition(condition, subject)).toBe(true);
  });

  it('should read shipment attributes', () => {
    expect(
      evaluateCondition({ op: 'equals', field: 'attributes.fragile', value: true }, subject),
    ).toBe(true);
    expect(
      evaluateCondition({ op: 'in', field: 'attributes.weightKg', values: [10, 12] }, subject),
    ).toBe(true);
  });

  it('should treat missing and null values as absent', () => {
    expect(evaluateCondition({ op: 'exists', field: 'attributes.customerTier' }, subject)).toBe(true);
    expect(evaluateCondition({ op: 'exists', field: 'attributes.region' }, subject)).toBe(false);
    expect(evaluateCondition({ op: 'exists', field: 'document' }, subject)).toBe(false);
    expect(evaluateCondition({ op: 'in', field: 'attributes.region', values: [null] }, subject)).toBe(false);
  });

  it('should require every condition to hold', () => {
    expect(conditionsHold([], subject)).toBe(true);
    expect(
      conditionsHold(
        [
          { op: 'equals', field: 'carrier', value: 'ssw' },
          { op: 'equals', field: 'attributes.customerTier', value: 'silver' },
        ],
        subject,
      ),
    ).toBe(false);
  });

  it('should recognise condition fields', () => {
    expect(isConditionField('trackingCode')).toBe(true);
    expect(isConditionField('attributes.customerTier')).toBe(true);
    expect(isConditionField('attributes.')).toBe(false);
    expect(isConditionField('currentStatus')).toBe(false);
  });
});
