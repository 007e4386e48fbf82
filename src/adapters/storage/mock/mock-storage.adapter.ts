import {
  ApplyTransitionDto,
  AutomationInvocation,
  AutomationRule,
  AutomationRuleQuery,
  CanonicalStatus,
  ClaimInvocationDto,
  CreateAutomationRuleDto,
  CreateShipmentDto,
  CreateStatusAuditDto,
  CreateTrackingEventDto,
  CreateUnresolvedEventDto,
  DuplicateEventError,
  InvocationAlreadyClaimedError,
  InvocationQuery,
  InvocationStatus,
  KeyedMutex,
  ReplayStatus,
  Shipment,
  ShipmentAlreadyExistsError,
  ShipmentNotFoundError,
  ShipmentReference,
  StatusAuditEntry,
  StatusAuditKind,
  StorageAdapter,
  StorageConflictError,
  StorageStatistics,
  TrackingEvent,
  UnresolvedEvent,
  UnresolvedEventQuery,
  UpdateInvocationDto,
  UpdateUnresolvedEventDto,
} from '../../../core';

export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}

/**
 * Mock storage adapter for testing
 * In-memory storage enforcing the same uniqueness and compare-and-set
 * rules as the database adapter. Every check-and-write runs without an
 * await in between, which makes it atomic on the event loop.
 */
export class MockStorageAdapter implements StorageAdapter {
  private shipments: Map<string, Shipment> = new Map();
  private trackingEvents: Map<string, TrackingEvent> = new Map();
  private auditEntries: StatusAuditEntry[] = [];
  private rules: Map<string, AutomationRule> = new Map();
  private invocations: Map<string, AutomationInvocation> = new Map();
  private unresolved: Map<string, UnresolvedEvent> = new Map();

  // Uniqueness indexes
  private shipmentsByTrackingCode: Map<string, string> = new Map();
  private eventsByDedupKey: Map<string, string> = new Map();
  private invocationsByKey: Map<string, string> = new Map();

  private readonly sections = new KeyedMutex();

  private idCounter = 0;
  private eventSequence = 0;
  private failure: Error | null = null;
  private readonly options: Required<MockStorageOptions>;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 5,
      ...options,
    };
  }

  /**
   * Make every following operation fail with the given error (null to heal)
   */
  setFailure(error: Error | null): void {
    this.failure = error;
  }

  private generateId(prefix: string): string {
    return `${prefix}-${++this.idCounter}`;
  }

  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
    }
    if (this.failure) {
      throw this.failure;
    }
  }

  // ==================== Concurrency ====================

  async runExclusive<T>(shipmentId: string, work: () => Promise<T>): Promise<T> {
    return this.sections.run(shipmentId, work);
  }

  // ==================== Shipments ====================

  async createShipment(dto: CreateShipmentDto): Promise<Shipment> {
    await this.simulateLatency();

    if (this.shipmentsByTrackingCode.has(dto.trackingCode)) {
      throw new ShipmentAlreadyExistsError(
        `Shipment with tracking code ${dto.trackingCode} already exists`,
        dto.trackingCode,
      );
    }

    const now = new Date();
    const shipment = new Shipment(
      this.generateId('shp'),
      dto.trackingCode,
      dto.carrier.toLowerCase(),
      CanonicalStatus.CREATED,
      0,
      null,
      dto.invoiceNumber ?? null,
      dto.document ?? null,
      { ...dto.attributes },
      now,
      now,
    );

    this.shipments.set(shipment.id, shipment);
    this.shipmentsByTrackingCode.set(shipment.trackingCode, shipment.id);

    return shipment.clone();
  }

  async findShipment(ref: ShipmentReference): Promise<Shipment | null> {
    await this.simulateLatency();

    let found: Shipment | undefined;
    if (ref.shipmentId) {
      found = this.shipments.get(ref.shipmentId);
    } else if (ref.trackingCode) {
      const id = this.shipmentsByTrackingCode.get(ref.trackingCode);
      found = id ? this.shipments.get(id) : undefined;
    } else if (ref.invoiceNumber && ref.document) {
      found = Array.from(this.shipments.values()).find(
        (shipment) =>
          shipment.invoiceNumber === ref.invoiceNumber &&
          shipment.document === ref.document,
      );
    }

    return found ? found.clone() : null;
  }

  async applyTransition(
    shipmentId: string,
    dto: ApplyTransitionDto,
  ): Promise<Shipment> {
    await this.simulateLatency();

    const shipment = this.shipments.get(shipmentId);
    if (!shipment) {
      throw new ShipmentNotFoundError(`Shipment not found: ${shipmentId}`, shipmentId);
    }

    if (shipment.currentStatusVersion !== dto.expectedVersion) {
      throw new StorageConflictError(
        `Shipment ${shipmentId} is at version ${shipment.currentStatusVersion}, expected ${dto.expectedVersion}`,
        shipmentId,
        dto.expectedVersion,
        shipment.currentStatusVersion,
      );
    }

    const fromStatus = shipment.currentStatus;
    shipment.currentStatus = dto.status;
    shipment.currentStatusVersion = dto.expectedVersion + 1;
    shipment.lastEventId = dto.lastEventId;
    shipment.updatedAt = new Date();

    this.appendAudit({
      shipmentId,
      kind: StatusAuditKind.TRANSITION,
      fromStatus,
      toStatus: dto.status,
      statusVersion: shipment.currentStatusVersion,
      eventId: dto.lastEventId,
      anomaly: dto.anomaly ?? null,
      reason: dto.reason ?? null,
    });

    return shipment.clone();
  }

  // ==================== Tracking events ====================

  async insertTrackingEvent(dto: CreateTrackingEventDto): Promise<TrackingEvent> {
    await this.simulateLatency();

    if (this.eventsByDedupKey.has(dto.dedupKey)) {
      throw new DuplicateEventError(
        `Event with dedup key ${dto.dedupKey} already stored`,
        dto.dedupKey,
      );
    }

    const event = new TrackingEvent(
      this.generateId('evt'),
      dto.shipmentId,
      dto.occurrenceCode,
      dto.canonicalStatus,
      dto.source,
      dto.occurredAt,
      dto.receivedAt,
      dto.dedupKey,
      dto.occurredAtEstimated,
      dto.needsReview,
      dto.carrierEventId,
      dto.description,
      dto.location,
      dto.rawPayload,
      ++this.eventSequence,
    );

    this.trackingEvents.set(event.id, event);
    this.eventsByDedupKey.set(event.dedupKey, event.id);

    return event;
  }

  async listTrackingEvents(shipmentId: string): Promise<TrackingEvent[]> {
    await this.simulateLatency();
    return Array.from(this.trackingEvents.values()).filter(
      (event) => event.shipmentId === shipmentId,
    );
  }

  async listEventsNeedingReview(limit = 100): Promise<TrackingEvent[]> {
    await this.simulateLatency();
    return Array.from(this.trackingEvents.values())
      .filter((event) => event.needsReview)
      .sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime())
      .slice(0, limit);
  }

  // ==================== Status audit ====================

  async createStatusAuditEntry(dto: CreateStatusAuditDto): Promise<StatusAuditEntry> {
    await this.simulateLatency();
    return this.appendAudit(dto);
  }

  async getAuditTrail(shipmentId: string): Promise<StatusAuditEntry[]> {
    await this.simulateLatency();
    return this.auditEntries.filter((entry) => entry.shipmentId === shipmentId);
  }

  private appendAudit(dto: CreateStatusAuditDto): StatusAuditEntry {
    const entry = new StatusAuditEntry(
      this.generateId('aud'),
      dto.shipmentId,
      dto.kind,
      dto.fromStatus,
      dto.toStatus,
      dto.statusVersion,
      dto.eventId ?? null,
      dto.anomaly ?? null,
      dto.reason ?? null,
    );
    this.auditEntries.push(entry);
    return entry;
  }

  // ==================== Automation ====================

  async createAutomationRule(dto: CreateAutomationRuleDto): Promise<AutomationRule> {
    await this.simulateLatency();

    const rule = new AutomationRule(
      this.generateId('rule'),
      dto.name,
      [...dto.triggerStatuses],
      [...(dto.conditions ?? [])],
      [...dto.actions],
      dto.enabled ?? true,
    );
    this.rules.set(rule.id, rule);

    return this.copyRule(rule);
  }

  async findAutomationRule(id: string): Promise<AutomationRule | null> {
    await this.simulateLatency();
    const rule = this.rules.get(id);
    return rule ? this.copyRule(rule) : null;
  }

  async listAutomationRules(query: AutomationRuleQuery = {}): Promise<AutomationRule[]> {
    await this.simulateLatency();

    const { enabled, triggerStatus } = query;
    return Array.from(this.rules.values())
      .filter((rule) => enabled === undefined || rule.enabled === enabled)
      .filter(
        (rule) =>
          triggerStatus === undefined || rule.triggerStatuses.includes(triggerStatus),
      )
      .map((rule) => this.copyRule(rule));
  }

  async setAutomationRuleEnabled(id: string, enabled: boolean): Promise<AutomationRule> {
    await this.simulateLatency();

    const rule = this.rules.get(id);
    if (!rule) {
      throw new Error(`Automation rule not found: ${id}`);
    }
    rule.enabled = enabled;
    return this.copyRule(rule);
  }

  async claimInvocation(dto: ClaimInvocationDto): Promise<AutomationInvocation> {
    await this.simulateLatency();

    const key = AutomationInvocation.keyOf(dto.shipmentId, dto.ruleId, dto.statusVersion);
    if (this.invocationsByKey.has(key)) {
      throw new InvocationAlreadyClaimedError(
        `Invocation ${key} already claimed`,
        key,
      );
    }

    const now = new Date();
    const invocation = new AutomationInvocation(
      this.generateId('inv'),
      dto.shipmentId,
      dto.ruleId,
      dto.statusVersion,
      dto.newStatus,
      dto.previousStatus,
      dto.triggeringEventId,
      InvocationStatus.CLAIMED,
      1,
      [],
      now,
      now,
    );

    this.invocations.set(invocation.id, invocation);
    this.invocationsByKey.set(key, invocation.id);

    return invocation.clone();
  }

  async reclaimInvocation(
    id: string,
    expectedAttempts: number,
  ): Promise<AutomationInvocation | null> {
    await this.simulateLatency();

    const invocation = this.invocations.get(id);
    if (!invocation || invocation.attempts !== expectedAttempts || invocation.isSettled()) {
      return null;
    }

    invocation.attempts = expectedAttempts + 1;
    invocation.status = InvocationStatus.CLAIMED;
    invocation.updatedAt = new Date();

    return invocation.clone();
  }

  async updateInvocation(
    id: string,
    dto: UpdateInvocationDto,
  ): Promise<AutomationInvocation> {
    await this.simulateLatency();

    const invocation = this.invocations.get(id);
    if (!invocation) {
      throw new Error(`Automation invocation not found: ${id}`);
    }

    invocation.status = dto.status;
    if (dto.completedActions !== undefined) {
      invocation.completedActions = [...dto.completedActions];
    }
    if (dto.lastError !== undefined) {
      invocation.lastError = dto.lastError;
    }
    if (dto.completedAt !== undefined) {
      invocation.completedAt = dto.completedAt;
    }
    invocation.updatedAt = new Date();

    return invocation.clone();
  }

  async findInvocation(
    shipmentId: string,
    ruleId: string,
    statusVersion: number,
  ): Promise<AutomationInvocation | null> {
    await this.simulateLatency();

    const id = this.invocationsByKey.get(
      AutomationInvocation.keyOf(shipmentId, ruleId, statusVersion),
    );
    const invocation = id ? this.invocations.get(id) : undefined;
    return invocation ? invocation.clone() : null;
  }

  async listInvocations(query: InvocationQuery): Promise<AutomationInvocation[]> {
    await this.simulateLatency();

    const { statuses, shipmentId, updatedBefore, limit } = query;
    const matches = Array.from(this.invocations.values())
      .filter((inv) => !statuses || statuses.includes(inv.status))
      .filter((inv) => !shipmentId || inv.shipmentId === shipmentId)
      .filter((inv) => !updatedBefore || inv.updatedAt < updatedBefore)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .map((inv) => inv.clone());

    return limit === undefined ? matches : matches.slice(0, limit);
  }

  // ==================== Replay queue ====================

  async enqueueUnresolved(dto: CreateUnresolvedEventDto): Promise<UnresolvedEvent> {
    await this.simulateLatency();

    const now = new Date();
    const entry = new UnresolvedEvent(
      this.generateId('unr'),
      dto.source,
      dto.rawPayload,
      dto.shipmentRef ? { ...dto.shipmentRef } : null,
      dto.reason,
      dto.receivedAt,
      dto.status,
      0,
      dto.nextAttemptAt,
      dto.lastError ?? null,
      null,
      now,
      now,
    );
    this.unresolved.set(entry.id, entry);

    return entry.clone();
  }

  async updateUnresolved(
    id: string,
    dto: UpdateUnresolvedEventDto,
  ): Promise<UnresolvedEvent> {
    await this.simulateLatency();

    const entry = this.unresolved.get(id);
    if (!entry) {
      throw new Error(`Unresolved event not found: ${id}`);
    }

    if (dto.status !== undefined) entry.status = dto.status;
    if (dto.attempts !== undefined) entry.attempts = dto.attempts;
    if (dto.nextAttemptAt !== undefined) entry.nextAttemptAt = dto.nextAttemptAt;
    if (dto.lastError !== undefined) entry.lastError = dto.lastError;
    if (dto.resolvedEventId !== undefined) entry.resolvedEventId = dto.resolvedEventId;
    entry.updatedAt = new Date();

    return entry.clone();
  }

  async listUnresolved(query: UnresolvedEventQuery): Promise<UnresolvedEvent[]> {
    await this.simulateLatency();

    const { status, dueBefore, limit } = query;
    const matches = Array.from(this.unresolved.values())
      .filter((entry) => !status || entry.status === status)
      .filter(
        (entry) =>
          !dueBefore ||
          (entry.nextAttemptAt !== null && entry.nextAttemptAt <= dueBefore),
      )
      .sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime())
      .map((entry) => entry.clone());

    return limit === undefined ? matches : matches.slice(0, limit);
  }

  // ==================== Health ====================

  async isHealthy(): Promise<boolean> {
    return this.failure === null;
  }

  async getStatistics(): Promise<StorageStatistics> {
    await this.simulateLatency();

    const invocationsByStatus: Record<InvocationStatus, number> = {
      [InvocationStatus.CLAIMED]: 0,
      [InvocationStatus.COMPLETED]: 0,
      [InvocationStatus.FAILED]: 0,
      [InvocationStatus.ABANDONED]: 0,
    };
    for (const invocation of this.invocations.values()) {
      invocationsByStatus[invocation.status]++;
    }

    const entries = Array.from(this.unresolved.values());
    return {
      shipments: this.shipments.size,
      trackingEvents: this.trackingEvents.size,
      eventsNeedingReview: Array.from(this.trackingEvents.values()).filter(
        (event) => event.needsReview,
      ).length,
      pendingUnresolved: entries.filter((e) => e.status === ReplayStatus.PENDING).length,
      manualReview: entries.filter((e) => e.status === ReplayStatus.MANUAL_REVIEW).length,
      invocationsByStatus,
    };
  }

  // ==================== Testing Utilities ====================

  /**
   * Clear all data
   */
  clear(): void {
    this.shipments.clear();
    this.trackingEvents.clear();
    this.auditEntries = [];
    this.rules.clear();
    this.invocations.clear();
    this.unresolved.clear();
    this.shipmentsByTrackingCode.clear();
    this.eventsByDedupKey.clear();
    this.invocationsByKey.clear();
    this.idCounter = 0;
    this.eventSequence = 0;
    this.failure = null;
  }

  /**
   * Backdate an invocation, e.g. to make a claim look stale
   */
  touchInvocation(id: string, updatedAt: Date): void {
    const invocation = this.invocations.get(id);
    if (invocation) {
      invocation.updatedAt = updatedAt;
    }
  }

  private copyRule(rule: AutomationRule): AutomationRule {
    return new AutomationRule(
      rule.id,
      rule.name,
      [...rule.triggerStatuses],
      [...rule.conditions],
      [...rule.actions],
      rule.enabled,
      rule.createdAt,
    );
  }
}
