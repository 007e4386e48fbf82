import {
  AnomalyKind,
  CanonicalStatus,
  InvocationStatus,
  RejectionReason,
  ReplayStatus,
  StatusAuditKind,
} from '../domain/enums';
import {
  AutomationAction,
  JsonObject,
  RuleCondition,
  ScalarValue,
  ShipmentReference,
} from '../domain/models';

/**
 * Common types used across adapters
 */

export interface CreateShipmentDto {
  trackingCode: string;
  carrier: string;
  invoiceNumber?: string;
  document?: string;
  attributes?: Record<string, ScalarValue>;
}

export interface CreateTrackingEventDto {
  shipmentId: string;
  occurrenceCode: string | null;
  canonicalStatus: CanonicalStatus;
  source: string;
  occurredAt: Date;
  occurredAtEstimated: boolean;
  receivedAt: Date;
  dedupKey: string;
  needsReview: boolean;
  carrierEventId: string | null;
  description: string | null;
  location: string | null;
  rawPayload: JsonObject;
}

export interface CreateStatusAuditDto {
  shipmentId: string;
  kind: StatusAuditKind;
  fromStatus: CanonicalStatus;
  toStatus: CanonicalStatus;
  statusVersion: number;
  eventId?: string | null;
  anomaly?: AnomalyKind | null;
  reason?: string | null;
}

/**
 * Compare-and-set status update. Applied only while the stored
 * currentStatusVersion still equals expectedVersion.
 */
export interface ApplyTransitionDto {
  expectedVersion: number;
  status: CanonicalStatus;
  lastEventId: string | null;
  reason?: string;
  anomaly?: AnomalyKind | null;
}

export interface CreateAutomationRuleDto {
  name: string;
  triggerStatuses: CanonicalStatus[];
  conditions?: RuleCondition[];
  actions: AutomationAction[];
  enabled?: boolean;
}

export interface AutomationRuleQuery {
  enabled?: boolean;
  triggerStatus?: CanonicalStatus;
}

export interface ClaimInvocationDto {
  shipmentId: string;
  ruleId: string;
  statusVersion: number;
  newStatus: CanonicalStatus;
  previousStatus: CanonicalStatus;
  triggeringEventId: string | null;
}

export interface UpdateInvocationDto {
  status: InvocationStatus;
  completedActions?: number[];
  lastError?: string | null;
  completedAt?: Date | null;
}

export interface InvocationQuery {
  statuses?: InvocationStatus[];
  shipmentId?: string;
  updatedBefore?: Date;
  limit?: number;
}

export interface CreateUnresolvedEventDto {
  source: string;
  rawPayload: unknown;
  shipmentRef: ShipmentReference | null;
  reason: RejectionReason;
  receivedAt: Date;
  status: ReplayStatus;
  nextAttemptAt: Date | null;
  lastError?: string | null;
}

export interface UpdateUnresolvedEventDto {
  status?: ReplayStatus;
  attempts?: number;
  nextAttemptAt?: Date | null;
  lastError?: string | null;
  resolvedEventId?: string | null;
}

export interface UnresolvedEventQuery {
  status?: ReplayStatus;
  dueBefore?: Date;
  limit?: number;
}

export interface StorageStatistics {
  shipments: number;
  trackingEvents: number;
  eventsNeedingReview: number;
  pendingUnresolved: number;
  manualReview: number;
  invocationsByStatus: Record<InvocationStatus, number>;
}
