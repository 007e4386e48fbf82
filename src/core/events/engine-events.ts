import {
  AnomalyKind,
  CanonicalStatus,
  RejectionReason,
} from '../domain/enums';
import { ShipmentReference } from '../domain/models';

/**
 * Payload of every notice the engine emits, keyed by notice type
 */
export interface EngineEventMap {
  'event.accepted': {
    shipmentId: string;
    eventId: string;
    source: string;
    occurrenceCode: string | null;
    canonicalStatus: CanonicalStatus;
  };
  'event.duplicate': {
    shipmentId: string;
    source: string;
    dedupKey: string;
  };
  'event.unclassified': {
    shipmentId: string;
    eventId: string;
    source: string;
    occurrenceCode: string | null;
  };
  'event.unresolved': {
    unresolvedId: string;
    source: string;
    shipmentRef: ShipmentReference | null;
    reason: RejectionReason;
    message: string;
  };
  'event.manual-review': {
    unresolvedId: string;
    source: string;
    shipmentRef: ShipmentReference | null;
    reason: RejectionReason;
    attempts: number;
    message: string;
  };
  'transition.applied': {
    shipmentId: string;
    fromStatus: CanonicalStatus;
    toStatus: CanonicalStatus;
    statusVersion: number;
    triggeringEventId: string | null;
    late: boolean;
  };
  'transition.anomaly': {
    shipmentId: string;
    eventId: string;
    anomaly: AnomalyKind;
    currentStatus: CanonicalStatus;
    eventStatus: CanonicalStatus;
  };
  'automation.action-failed': {
    shipmentId: string;
    ruleId: string;
    invocationId: string;
    actionIndex: number;
    actionType: string;
    attempt: number;
    error: string;
  };
  'automation.completed': {
    shipmentId: string;
    ruleId: string;
    invocationId: string;
    statusVersion: number;
    attempts: number;
  };
  'automation.abandoned': {
    shipmentId: string;
    ruleId: string;
    invocationId: string;
    statusVersion: number;
    attempts: number;
    lastError: string | null;
  };
}

export type EngineEventType = keyof EngineEventMap;

export type EngineEvent = {
  [K in EngineEventType]: { type: K; payload: EngineEventMap[K] };
}[EngineEventType];

export type EngineEventOf<K extends EngineEventType> = Extract<
  EngineEvent,
  { type: K }
>;

export type EngineEventHandler = (event: EngineEvent) => void | Promise<void>;

export interface EventSubscription {
  id: string;
  unsubscribe: () => void;
}
