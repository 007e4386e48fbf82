import {
  Shipment,
  TrackingEvent,
  AutomationRule,
  AutomationInvocation,
  StatusAuditEntry,
  UnresolvedEvent,
  ShipmentReference,
} from '../domain/models';
import {
  ApplyTransitionDto,
  AutomationRuleQuery,
  ClaimInvocationDto,
  CreateAutomationRuleDto,
  CreateShipmentDto,
  CreateStatusAuditDto,
  CreateTrackingEventDto,
  CreateUnresolvedEventDto,
  InvocationQuery,
  StorageStatistics,
  UnresolvedEventQuery,
  UpdateInvocationDto,
  UpdateUnresolvedEventDto,
} from './common.types';

/**
 * Storage adapter interface - abstracts the primary store
 * Implementations must enforce the uniqueness constraints named below,
 * and provide the per-shipment exclusive section the pipeline runs
 * ingest and status application in
 */
export interface StorageAdapter {
  // ==================== Concurrency ====================

  /**
   * Run `work` while no other section for the same shipment runs.
   * Sections for different shipments never wait on each other.
   */
  runExclusive<T>(shipmentId: string, work: () => Promise<T>): Promise<T>;

  // ==================== Shipments ====================

  /**
   * Create a shipment in `created` at status version 0.
   * Throws ShipmentAlreadyExistsError on a taken tracking code.
   */
  createShipment(dto: CreateShipmentDto): Promise<Shipment>;

  /**
   * Resolve by id, tracking code, or invoice number + document (in that order)
   */
  findShipment(ref: ShipmentReference): Promise<Shipment | null>;

  /**
   * Atomically set status, bump currentStatusVersion and append a
   * transition audit entry.
   * MUST fail with StorageConflictError when the stored version differs
   * from dto.expectedVersion.
   */
  applyTransition(shipmentId: string, dto: ApplyTransitionDto): Promise<Shipment>;

  // ==================== Tracking events ====================

  /**
   * Insert under the dedupKey uniqueness constraint.
   * Throws DuplicateEventError when the key already exists.
   */
  insertTrackingEvent(dto: CreateTrackingEventDto): Promise<TrackingEvent>;

  /**
   * All events of a shipment, in no particular order
   */
  listTrackingEvents(shipmentId: string): Promise<TrackingEvent[]>;

  listEventsNeedingReview(limit?: number): Promise<TrackingEvent[]>;

  // ==================== Status audit ====================

  createStatusAuditEntry(dto: CreateStatusAuditDto): Promise<StatusAuditEntry>;

  getAuditTrail(shipmentId: string): Promise<StatusAuditEntry[]>;

  // ==================== Automation ====================

  createAutomationRule(dto: CreateAutomationRuleDto): Promise<AutomationRule>;

  findAutomationRule(id: string): Promise<AutomationRule | null>;

  listAutomationRules(query?: AutomationRuleQuery): Promise<AutomationRule[]>;

  setAutomationRuleEnabled(id: string, enabled: boolean): Promise<AutomationRule>;

  /**
   * Insert the idempotency claim under the (shipmentId, ruleId,
   * statusVersion) uniqueness constraint.
   * Throws InvocationAlreadyClaimedError when it exists.
   */
  claimInvocation(dto: ClaimInvocationDto): Promise<AutomationInvocation>;

  /**
   * Take over an existing invocation for another attempt. Succeeds only
   * while attempts still equals expectedAttempts; returns null otherwise.
   */
  reclaimInvocation(
    id: string,
    expectedAttempts: number,
  ): Promise<AutomationInvocation | null>;

  updateInvocation(
    id: string,
    dto: UpdateInvocationDto,
  ): Promise<AutomationInvocation>;

  findInvocation(
    shipmentId: string,
    ruleId: string,
    statusVersion: number,
  ): Promise<AutomationInvocation | null>;

  listInvocations(query: InvocationQuery): Promise<AutomationInvocation[]>;

  // ==================== Replay queue ====================

  enqueueUnresolved(dto: CreateUnresolvedEventDto): Promise<UnresolvedEvent>;

  updateUnresolved(
    id: string,
    dto: UpdateUnresolvedEventDto,
  ): Promise<UnresolvedEvent>;

  listUnresolved(query: UnresolvedEventQuery): Promise<UnresolvedEvent[]>;

  // ==================== Health ====================

  isHealthy(): Promise<boolean>;

  getStatistics(): Promise<StorageStatistics>;

  /**
   * Release connections on shutdown
   */
  close?(): Promise<void>;
}
