import { BadRequestException } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import {
  AutomationRuleDto,
  CanonicalStatus,
  IngestRawEventDto,
  NotifyActionDto,
  RegisterShipmentDto,
  RuleConditionDto,
  WebhookActionDto,
  toAutomationAction,
  toRuleCondition,
  validateInput,
} from '../../src';

async function validationMessages(work: Promise<unknown>): Promise<string[]> {
  try {
    await work;
  } catch (error) {
    if (error instanceof BadRequestException) {
      const response = error.getResponse();
      if (
        typeof response === 'object' &&
        'message' in response &&
        Array.isArray(response.message)
      ) {
        return response.message.map(String);
      }
    }
    throw error;
  }
  throw new Error('Expected validation to fail');
}

describe('RegisterShipmentDto', () => {
  it('should accept a complete registration', async () => {
    const dto = await validateInput(RegisterShipmentDto, {
      trackingCode: 'TRK-1',
      carrier: 'ssw',
      invoiceNumber: '12345',
      document: '11222333000181',
      attributes: { tier: 'gold', fragile: true, weight: 2.5, note: null },
    });

    expect(dto).toBeInstanceOf(RegisterShipmentDto);
    expect(dto.attributes).toEqual({ tier: 'gold', fragile: true, weight: 2.5, note: null });
  });

  it('should report every failed property', async () => {
    const messages = await validationMessages(
      validateInput(RegisterShipmentDto, { trackingCode: 'TRK-1' }),
    );

    expect(messages).toEqual(
      expect.arrayContaining([
        'carrier: carrier should not be empty',
        'carrier: carrier must be a string',
      ]),
    );
    expect(messages).toHaveLength(2);
  });

  it('should bound the tracking code length', async () => {
    const messages = await validationMessages(
      validateInput(RegisterShipmentDto, { trackingCode: 'T'.repeat(65), carrier: 'ssw' }),
    );

    expect(messages).toEqual([
      'trackingCode: trackingCode must be shorter than or equal to 64 characters',
    ]);
  });

  it('should reject nested attribute values', async () => {
    const messages = await validationMessages(
      validateInput(RegisterShipmentDto, {
        trackingCode: 'TRK-1',
        carrier: 'ssw',
        attributes: { address: { city: 'Recife' } },
      }),
    );

    expect(messages).toEqual([
      'attributes: attributes must map keys to string, number, boolean or null',
    ]);
  });

  it('should reject input that is not an object', async () => {
    await expect(validateInput(RegisterShipmentDto, 'TRK-1')).rejects.toThrow(
      'RegisterShipmentDto must be an object',
    );
  });
});

describe('IngestRawEventDto', () => {
  it('should turn receivedAt into a date', async () => {
    const dto = await validateInput(IngestRawEventDto, {
      source: 'ssw',
      payload: { tracking_code: 'TRK-1' },
      receivedAt: '2024-03-05T10:00:00.000Z',
      shipmentHint: { trackingCode: 'TRK-1' },
    });

    expect(dto.receivedAt).toEqual(new Date('2024-03-05T10:00:00.000Z'));
    expect(dto.shipmentHint?.trackingCode).toBe('TRK-1');
  });

  it('should require a payload', async () => {
    const messages = await validationMessages(
      validateInput(IngestRawEventDto, { source: 'ssw' }),
    );

    expect(messages).toEqual(['payload: payload should not be null or undefined']);
  });
});

describe('AutomationRuleDto', () => {
  const rule = {
    name: 'Notify on delivery',
    triggerStatuses: [CanonicalStatus.DELIVERED],
    conditions: [{ op: 'equals', field: 'attributes.tier', value: 'gold' }],
    actions: [
      { type: 'notify', channel: 'email', template: 'delivered' },
      { type: 'webhook', url: 'http://hooks.internal/delivered', method: 'POST' },
    ],
  };

  it('should build the action subtypes', async () => {
    const dto = await validateInput(AutomationRuleDto, rule);

    expect(dto.actions[0]).toBeInstanceOf(NotifyActionDto);
    expect(dto.actions[1]).toBeInstanceOf(WebhookActionDto);
    expect(dto.actions.map(toAutomationAction)).toEqual([
      { type: 'notify', channel: 'email', template: 'delivered', recipient: undefined },
      {
        type: 'webhook',
        url: 'http://hooks.internal/delivered',
        method: 'POST',
        headers: undefined,
        timeoutMs: undefined,
      },
    ]);
  });

  it('should reject an unknown trigger status', async () => {
    const messages = await validationMessages(
      validateInput(AutomationRuleDto, { ...rule, triggerStatuses: ['lost'] }),
    );

    expect(messages).toHaveLength(1);
    expect(messages[0]).toMatch(/^triggerStatuses: each value in triggerStatuses must be one of the following values/);
  });

  it('should reject a webhook without a valid url', async () => {
    const messages = await validationMessages(
      validateInput(AutomationRuleDto, {
        ...rule,
        actions: [{ type: 'webhook', url: 'not a url' }],
      }),
    );

    expect(messages).toEqual(['actions.0.url: url must be a URL address']);
  });

  it('should reject an empty action list', async () => {
    const messages = await validationMessages(
      validateInput(AutomationRuleDto, { ...rule, actions: [] }),
    );

    expect(messages).toEqual(['actions: actions should not be empty']);
  });
});

describe('toRuleCondition', () => {
  const condition = (plain: object): RuleConditionDto =>
    plainToInstance(RuleConditionDto, plain);

  it('should map each operator', () => {
    expect(toRuleCondition(condition({ op: 'equals', field: 'carrier', value: 'ssw' }))).toEqual({
      op: 'equals',
      field: 'carrier',
      value: 'ssw',
    });
    expect(
      toRuleCondition(condition({ op: 'in', field: 'attributes.tier', values: ['gold', 'silver'] })),
    ).toEqual({ op: 'in', field: 'attributes.tier', values: ['gold', 'silver'] });
    expect(toRuleCondition(condition({ op: 'exists', field: 'invoiceNumber' }))).toEqual({
      op: 'exists',
      field: 'invoiceNumber',
    });
  });

  it('should reject fields it cannot evaluate', () => {
    expect(() => toRuleCondition(condition({ op: 'exists', field: 'password' }))).toThrow(
      'Unknown condition field: password',
    );
  });

  it('should require a value for equality', () => {
    expect(() => toRuleCondition(condition({ op: 'equals', field: 'carrier' }))).toThrow(
      BadRequestException,
    );
    expect(() => toRuleCondition(condition({ op: 'in', field: 'carrier', values: [{}] }))).toThrow(
      'Condition in on carrier needs a list of scalar values',
    );
  });
});
