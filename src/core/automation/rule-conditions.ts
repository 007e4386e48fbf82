import { CanonicalStatus } from '../domain/enums';
import {
  ConditionField,
  RuleCondition,
  ScalarValue,
  Shipment,
} from '../domain/models';
import { assertNever } from '../utils';

/**
 * What a rule condition is evaluated against
 */
export interface ConditionSubject {
  shipment: Shipment;
  previousStatus: CanonicalStatus;
}

export function readConditionField(
  subject: ConditionSubject,
  field: ConditionField,
): ScalarValue | undefined {
  switch (field) {
    case 'carrier':
      return subject.shipment.carrier;
    case 'trackingCode':
      return subject.shipment.trackingCode;
    case 'invoiceNumber':
      return subject.shipment.invoiceNumber;
    case 'document':
      return subject.shipment.document;
    case 'previousStatus':
      return subject.previousStatus;
    default: {
      const key = field.slice('attributes.'.length);
      return Object.prototype.hasOwnProperty.call(subject.shipment.attributes, key)
        ? subject.shipment.attributes[key]
        : undefined;
    }
  }
}

export function evaluateCondition(
  condition: RuleCondition,
  subject: ConditionSubject,
): boolean {
  const actual = readConditionField(subject, condition.field);

  switch (condition.op) {
    case 'equals':
      return actual === condition.value;
    case 'not-equals':
      return actual !== condition.value;
    case 'in':
      return actual !== undefined && condition.values.includes(actual);
    case 'exists':
      return actual !== undefined && actual !== null;
    default:
      return assertNever(condition, 'Unknown rule condition');
  }
}

/**
 * All conditions must hold; an empty list always holds
 */
export function conditionsHold(
  conditions: readonly RuleCondition[],
  subject: ConditionSubject,
): boolean {
  return conditions.every((condition) => evaluateCondition(condition, subject));
}
