import { CanonicalStatus } from '../enums';
import { ScalarValue } from './shared.types';

/**
 * Shipment fields a rule condition can inspect
 */
export type ConditionField =
  | 'carrier'
  | 'trackingCode'
  | 'invoiceNumber'
  | 'document'
  | 'previousStatus'
  | `attributes.${string}`;

const SHIPMENT_FIELDS = [
  'carrier',
  'trackingCode',
  'invoiceNumber',
  'document',
  'previousStatus',
] as const;

const ATTRIBUTE_PREFIX = 'attributes.';

export function isConditionField(value: string): value is ConditionField {
  if (value.startsWith(ATTRIBUTE_PREFIX)) {
    return value.length > ATTRIBUTE_PREFIX.length;
  }
  return SHIPMENT_FIELDS.some((field) => field === value);
}

/**
 * Closed set of predicates a rule may require
 */
export type RuleCondition =
  | { op: 'equals'; field: ConditionField; value: ScalarValue }
  | { op: 'not-equals'; field: ConditionField; value: ScalarValue }
  | { op: 'in'; field: ConditionField; values: ScalarValue[] }
  | { op: 'exists'; field: ConditionField };

export interface NotifyAction {
  type: 'notify';
  channel: string;
  template: string;
  recipient?: string;
}

export interface WebhookAction {
  type: 'webhook';
  url: string;
  method?: 'POST' | 'PUT';
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Tagged action variants; executors switch on `type` exhaustively
 */
export type AutomationAction = NotifyAction | WebhookAction;

/**
 * AutomationRule domain model
 * Fires its actions, in order, when a shipment enters one of triggerStatuses
 */
export class AutomationRule {
  constructor(
    public readonly id: string,
    public readonly name: string,
    public readonly triggerStatuses: CanonicalStatus[],
    public readonly conditions: RuleCondition[] = [],
    public readonly actions: AutomationAction[] = [],
    public enabled: boolean = true,
    public readonly createdAt: Date = new Date(),
  ) {}

  triggersOn(status: CanonicalStatus): boolean {
    return this.enabled && this.triggerStatuses.includes(status);
  }
}
