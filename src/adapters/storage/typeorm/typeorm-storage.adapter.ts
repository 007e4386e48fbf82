import { AsyncLocalStorage } from 'async_hooks';
import {
  ArrayContains,
  DataSource,
  EntityManager,
  EntityTarget,
  ObjectLiteral,
  FindOptionsWhere,
  In,
  LessThan,
  LessThanOrEqual,
  QueryFailedError,
  Repository,
} from 'typeorm';
import {
  ApplyTransitionDto,
  AutomationInvocation,
  AutomationRule,
  AutomationRuleQuery,
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
import {
  AutomationInvocationEntity,
  AutomationRuleEntity,
  ShipmentEntity,
  StatusAuditEntity,
  TrackingEventEntity,
  UnresolvedEventEntity,
} from './entities';

const PG_UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    'code' in error.driverError &&
    error.driverError.code === PG_UNIQUE_VIOLATION
  );
}

/**
 * TypeORM implementation of StorageAdapter for PostgreSQL
 * Uniqueness constraints (dedup key, tracking code, invocation key) are
 * enforced by unique indexes; status writes lock the shipment row.
 *
 * A per-shipment section holds a session advisory lock on one pooled
 * connection, and every query issued inside the section runs on that
 * connection.
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private readonly sections = new KeyedMutex();
  private readonly sectionScope = new AsyncLocalStorage<EntityManager>();

  constructor(private readonly dataSource: DataSource) {}

  private get manager(): EntityManager {
    const scoped = this.sectionScope.getStore();
    if (scoped && scoped.queryRunner && !scoped.queryRunner.isReleased) {
      return scoped;
    }
    return this.dataSource.manager;
  }

  private repository<E extends ObjectLiteral>(target: EntityTarget<E>): Repository<E> {
    return this.manager.getRepository(target);
  }

  private get shipmentRepo(): Repository<ShipmentEntity> {
    return this.repository(ShipmentEntity);
  }

  private get trackingEventRepo(): Repository<TrackingEventEntity> {
    return this.repository(TrackingEventEntity);
  }

  private get auditRepo(): Repository<StatusAuditEntity> {
    return this.repository(StatusAuditEntity);
  }

  private get ruleRepo(): Repository<AutomationRuleEntity> {
    return this.repository(AutomationRuleEntity);
  }

  private get invocationRepo(): Repository<AutomationInvocationEntity> {
    return this.repository(AutomationInvocationEntity);
  }

  private get unresolvedRepo(): Repository<UnresolvedEventEntity> {
    return this.repository(UnresolvedEventEntity);
  }

  /**
   * Concurrency
   */

  async runExclusive<T>(shipmentId: string, work: () => Promise<T>): Promise<T> {
    // The in-process mutex keeps waiters of this worker off the pool
    return this.sections.run(shipmentId, async () => {
      const queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();

      try {
        await queryRunner.query('SELECT pg_advisory_lock(hashtext($1))', [
          shipmentId,
        ]);
        try {
          return await this.sectionScope.run(queryRunner.manager, work);
        } finally {
          await queryRunner.query('SELECT pg_advisory_unlock(hashtext($1))', [
            shipmentId,
          ]);
        }
      } finally {
        await queryRunner.release();
      }
    });
  }

  /**
   * Shipments
   */

  async createShipment(dto: CreateShipmentDto): Promise<Shipment> {
    const entity = this.shipmentRepo.create({
      trackingCode: dto.trackingCode,
      carrier: dto.carrier.toLowerCase(),
      invoiceNumber: dto.invoiceNumber ?? null,
      document: dto.document ?? null,
      attributes: dto.attributes ?? {},
    });

    try {
      const saved = await this.shipmentRepo.save(entity);
      return this.mapShipmentEntityToDomain(saved);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ShipmentAlreadyExistsError(
          `Shipment with tracking code ${dto.trackingCode} already exists`,
          dto.trackingCode,
        );
      }
      throw error;
    }
  }

  async findShipment(ref: ShipmentReference): Promise<Shipment | null> {
    let where: FindOptionsWhere<ShipmentEntity> | null = null;
    if (ref.shipmentId) {
      where = { id: ref.shipmentId };
    } else if (ref.trackingCode) {
      where = { trackingCode: ref.trackingCode };
    } else if (ref.invoiceNumber && ref.document) {
      where = { invoiceNumber: ref.invoiceNumber, document: ref.document };
    }
    if (!where) {
      return null;
    }

    const entity = await this.shipmentRepo.findOne({ where });
    return entity ? this.mapShipmentEntityToDomain(entity) : null;
  }

  async applyTransition(
    shipmentId: string,
    dto: ApplyTransitionDto,
  ): Promise<Shipment> {
    return await this.withTransaction(async (manager) => {
      // Lock the row so the version check and the write are atomic
      const entity = await manager.findOne(ShipmentEntity, {
        where: { id: shipmentId },
        lock: { mode: 'pessimistic_write' },
      });

      if (!entity) {
        throw new ShipmentNotFoundError(
          `Shipment not found: ${shipmentId}`,
          shipmentId,
        );
      }

      if (entity.currentStatusVersion !== dto.expectedVersion) {
        throw new StorageConflictError(
          `Shipment ${shipmentId} is at version ${entity.currentStatusVersion}, expected ${dto.expectedVersion}`,
          shipmentId,
          dto.expectedVersion,
          entity.currentStatusVersion,
        );
      }

      const fromStatus = entity.currentStatus;
      entity.currentStatus = dto.status;
      entity.currentStatusVersion = dto.expectedVersion + 1;
      entity.lastEventId = dto.lastEventId;
      const updated = await manager.save(entity);

      const audit = manager.create(StatusAuditEntity, {
        shipmentId,
        kind: StatusAuditKind.TRANSITION,
        fromStatus,
        toStatus: dto.status,
        statusVersion: updated.currentStatusVersion,
        eventId: dto.lastEventId,
        anomaly: dto.anomaly ?? null,
        reason: dto.reason ?? null,
      });
      await manager.save(audit);

      return this.mapShipmentEntityToDomain(updated);
    });
  }

  /**
   * Tracking events
   */

  async insertTrackingEvent(dto: CreateTrackingEventDto): Promise<TrackingEvent> {
    const entity = this.trackingEventRepo.create({ ...dto });

    try {
      const saved = await this.trackingEventRepo.save(entity);
      return this.mapTrackingEventEntityToDomain(saved);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEventError(
          `Event with dedup key ${dto.dedupKey} already stored`,
          dto.dedupKey,
        );
      }
      throw error;
    }
  }

  async listTrackingEvents(shipmentId: string): Promise<TrackingEvent[]> {
    const entities = await this.trackingEventRepo.find({
      where: { shipmentId },
    });
    return entities.map((e) => this.mapTrackingEventEntityToDomain(e));
  }

  async listEventsNeedingReview(limit = 100): Promise<TrackingEvent[]> {
    const entities = await this.trackingEventRepo.find({
      where: { needsReview: true },
      order: { receivedAt: 'ASC' },
      take: limit,
    });
    return entities.map((e) => this.mapTrackingEventEntityToDomain(e));
  }

  /**
   * Status audit
   */

  async createStatusAuditEntry(
    dto: CreateStatusAuditDto,
  ): Promise<StatusAuditEntry> {
    const entity = this.auditRepo.create({
      shipmentId: dto.shipmentId,
      kind: dto.kind,
      fromStatus: dto.fromStatus,
      toStatus: dto.toStatus,
      statusVersion: dto.statusVersion,
      eventId: dto.eventId ?? null,
      anomaly: dto.anomaly ?? null,
      reason: dto.reason ?? null,
    });
    const saved = await this.auditRepo.save(entity);
    return this.mapAuditEntityToDomain(saved);
  }

  async getAuditTrail(shipmentId: string): Promise<StatusAuditEntry[]> {
    const entities = await this.auditRepo.find({
      where: { shipmentId },
      order: { createdAt: 'ASC' },
    });
    return entities.map((e) => this.mapAuditEntityToDomain(e));
  }

  /**
   * Automation
   */

  async createAutomationRule(
    dto: CreateAutomationRuleDto,
  ): Promise<AutomationRule> {
    const entity = this.ruleRepo.create({
      name: dto.name,
      triggerStatuses: dto.triggerStatuses,
      conditions: dto.conditions ?? [],
      actions: dto.actions,
      enabled: dto.enabled ?? true,
    });
    const saved = await this.ruleRepo.save(entity);
    return this.mapRuleEntityToDomain(saved);
  }

  async findAutomationRule(id: string): Promise<AutomationRule | null> {
    const entity = await this.ruleRepo.findOne({ where: { id } });
    return entity ? this.mapRuleEntityToDomain(entity) : null;
  }

  async listAutomationRules(
    query: AutomationRuleQuery = {},
  ): Promise<AutomationRule[]> {
    const where: FindOptionsWhere<AutomationRuleEntity> = {};
    if (query.enabled !== undefined) {
      where.enabled = query.enabled;
    }
    if (query.triggerStatus !== undefined) {
      where.triggerStatuses = ArrayContains([query.triggerStatus]);
    }

    const entities = await this.ruleRepo.find({
      where,
      order: { createdAt: 'ASC' },
    });
    return entities.map((e) => this.mapRuleEntityToDomain(e));
  }

  async setAutomationRuleEnabled(
    id: string,
    enabled: boolean,
  ): Promise<AutomationRule> {
    await this.ruleRepo.update(id, { enabled });
    const entity = await this.ruleRepo.findOneOrFail({ where: { id } });
    return this.mapRuleEntityToDomain(entity);
  }

  async claimInvocation(dto: ClaimInvocationDto): Promise<AutomationInvocation> {
    const entity = this.invocationRepo.create({
      ...dto,
      status: InvocationStatus.CLAIMED,
      attempts: 1,
      completedActions: [],
    });

    try {
      const saved = await this.invocationRepo.save(entity);
      return this.mapInvocationEntityToDomain(saved);
    } catch (error) {
      if (isUniqueViolation(error)) {
        const key = AutomationInvocation.keyOf(
          dto.shipmentId,
          dto.ruleId,
          dto.statusVersion,
        );
        throw new InvocationAlreadyClaimedError(
          `Invocation ${key} already claimed`,
          key,
        );
      }
      throw error;
    }
  }

  async reclaimInvocation(
    id: string,
    expectedAttempts: number,
  ): Promise<AutomationInvocation | null> {
    // Conditional update: only one worker can move attempts forward
    const result = await this.invocationRepo.update(
      {
        id,
        attempts: expectedAttempts,
        status: In([InvocationStatus.FAILED, InvocationStatus.CLAIMED]),
      },
      {
        attempts: expectedAttempts + 1,
        status: InvocationStatus.CLAIMED,
      },
    );

    if (result.affected !== 1) {
      return null;
    }

    const entity = await this.invocationRepo.findOneOrFail({ where: { id } });
    return this.mapInvocationEntityToDomain(entity);
  }

  async updateInvocation(
    id: string,
    dto: UpdateInvocationDto,
  ): Promise<AutomationInvocation> {
    const entity = await this.invocationRepo.findOne({ where: { id } });
    if (!entity) {
      throw new Error(`Automation invocation not found: ${id}`);
    }

    entity.status = dto.status;
    if (dto.completedActions !== undefined) {
      entity.completedActions = [...dto.completedActions];
    }
    if (dto.lastError !== undefined) {
      entity.lastError = dto.lastError;
    }
    if (dto.completedAt !== undefined) {
      entity.completedAt = dto.completedAt;
    }

    const saved = await this.invocationRepo.save(entity);
    return this.mapInvocationEntityToDomain(saved);
  }

  async findInvocation(
    shipmentId: string,
    ruleId: string,
    statusVersion: number,
  ): Promise<AutomationInvocation | null> {
    const entity = await this.invocationRepo.findOne({
      where: { shipmentId, ruleId, statusVersion },
    });
    return entity ? this.mapInvocationEntityToDomain(entity) : null;
  }

  async listInvocations(query: InvocationQuery): Promise<AutomationInvocation[]> {
    const where: FindOptionsWhere<AutomationInvocationEntity> = {};
    if (query.statuses) {
      where.status = In(query.statuses);
    }
    if (query.shipmentId) {
      where.shipmentId = query.shipmentId;
    }
    if (query.updatedBefore) {
      where.updatedAt = LessThan(query.updatedBefore);
    }

    const entities = await this.invocationRepo.find({
      where,
      order: { updatedAt: 'ASC' },
      take: query.limit,
    });
    return entities.map((e) => this.mapInvocationEntityToDomain(e));
  }

  /**
   * Replay queue
   */

  async enqueueUnresolved(
    dto: CreateUnresolvedEventDto,
  ): Promise<UnresolvedEvent> {
    const entity = this.unresolvedRepo.create({
      source: dto.source,
      rawPayload: this.toJsonColumn(dto.rawPayload),
      shipmentRef: dto.shipmentRef,
      reason: dto.reason,
      receivedAt: dto.receivedAt,
      status: dto.status,
      attempts: 0,
      nextAttemptAt: dto.nextAttemptAt,
      lastError: dto.lastError ?? null,
    });
    const saved = await this.unresolvedRepo.save(entity);
    return this.mapUnresolvedEntityToDomain(saved);
  }

  async updateUnresolved(
    id: string,
    dto: UpdateUnresolvedEventDto,
  ): Promise<UnresolvedEvent> {
    const entity = await this.unresolvedRepo.findOne({ where: { id } });
    if (!entity) {
      throw new Error(`Unresolved event not found: ${id}`);
    }

    if (dto.status !== undefined) entity.status = dto.status;
    if (dto.attempts !== undefined) entity.attempts = dto.attempts;
    if (dto.nextAttemptAt !== undefined) entity.nextAttemptAt = dto.nextAttemptAt;
    if (dto.lastError !== undefined) entity.lastError = dto.lastError;
    if (dto.resolvedEventId !== undefined) {
      entity.resolvedEventId = dto.resolvedEventId;
    }

    const saved = await this.unresolvedRepo.save(entity);
    return this.mapUnresolvedEntityToDomain(saved);
  }

  async listUnresolved(query: UnresolvedEventQuery): Promise<UnresolvedEvent[]> {
    const where: FindOptionsWhere<UnresolvedEventEntity> = {};
    if (query.status) {
      where.status = query.status;
    }
    if (query.dueBefore) {
      where.nextAttemptAt = LessThanOrEqual(query.dueBefore);
    }

    const entities = await this.unresolvedRepo.find({
      where,
      order: { receivedAt: 'ASC' },
      take: query.limit,
    });
    return entities.map((e) => this.mapUnresolvedEntityToDomain(e));
  }

  /**
   * Transaction Support
   */

  async withTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const scoped = this.manager;
    if (scoped !== this.dataSource.manager) {
      return await scoped.transaction(callback);
    }

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  async getStatistics(): Promise<StorageStatistics> {
    const invocationStatuses = Object.values(InvocationStatus);

    const [
      shipments,
      trackingEvents,
      eventsNeedingReview,
      pendingUnresolved,
      manualReview,
      invocationCounts,
    ] = await Promise.all([
      this.shipmentRepo.count(),
      this.trackingEventRepo.count(),
      this.trackingEventRepo.count({ where: { needsReview: true } }),
      this.unresolvedRepo.count({ where: { status: ReplayStatus.PENDING } }),
      this.unresolvedRepo.count({
        where: { status: ReplayStatus.MANUAL_REVIEW },
      }),
      Promise.all(
        invocationStatuses.map((status) =>
          this.invocationRepo.count({ where: { status } }),
        ),
      ),
    ]);

    const invocationsByStatus: Record<InvocationStatus, number> = {
      [InvocationStatus.CLAIMED]: 0,
      [InvocationStatus.COMPLETED]: 0,
      [InvocationStatus.FAILED]: 0,
      [InvocationStatus.ABANDONED]: 0,
    };
    invocationStatuses.forEach((status, index) => {
      invocationsByStatus[status] = invocationCounts[index] ?? 0;
    });

    return {
      shipments,
      trackingEvents,
      eventsNeedingReview,
      pendingUnresolved,
      manualReview,
      invocationsByStatus,
    };
  }

  /**
   * Private Mapping Methods
   */

  private toJsonColumn(rawPayload: unknown): unknown {
    // jsonb cannot hold bytes; keep the text and let replay re-parse it
    return Buffer.isBuffer(rawPayload) ? rawPayload.toString('utf8') : rawPayload;
  }

  private mapShipmentEntityToDomain(entity: ShipmentEntity): Shipment {
    return new Shipment(
      entity.id,
      entity.trackingCode,
      entity.carrier,
      entity.currentStatus,
      entity.currentStatusVersion,
      entity.lastEventId,
      entity.invoiceNumber,
      entity.document,
      entity.attributes ?? {},
      entity.createdAt,
      entity.updatedAt,
    );
  }

  private mapTrackingEventEntityToDomain(
    entity: TrackingEventEntity,
  ): TrackingEvent {
    return new TrackingEvent(
      entity.id,
      entity.shipmentId,
      entity.occurrenceCode,
      entity.canonicalStatus,
      entity.source,
      entity.occurredAt,
      entity.receivedAt,
      entity.dedupKey,
      entity.occurredAtEstimated,
      entity.needsReview,
      entity.carrierEventId,
      entity.description,
      entity.location,
      entity.rawPayload ?? {},
      entity.sequence,
    );
  }

  private mapAuditEntityToDomain(entity: StatusAuditEntity): StatusAuditEntry {
    return new StatusAuditEntry(
      entity.id,
      entity.shipmentId,
      entity.kind,
      entity.fromStatus,
      entity.toStatus,
      entity.statusVersion,
      entity.eventId,
      entity.anomaly,
      entity.reason,
      entity.createdAt,
    );
  }

  private mapRuleEntityToDomain(entity: AutomationRuleEntity): AutomationRule {
    return new AutomationRule(
      entity.id,
      entity.name,
      entity.triggerStatuses,
      entity.conditions ?? [],
      entity.actions ?? [],
      entity.enabled,
      entity.createdAt,
    );
  }

  private mapInvocationEntityToDomain(
    entity: AutomationInvocationEntity,
  ): AutomationInvocation {
    return new AutomationInvocation(
      entity.id,
      entity.shipmentId,
      entity.ruleId,
      entity.statusVersion,
      entity.newStatus,
      entity.previousStatus,
      entity.triggeringEventId,
      entity.status,
      entity.attempts,
      entity.completedActions ?? [],
      entity.dispatchedAt,
      entity.updatedAt,
      entity.completedAt,
      entity.lastError,
    );
  }

  private mapUnresolvedEntityToDomain(
    entity: UnresolvedEventEntity,
  ): UnresolvedEvent {
    return new UnresolvedEvent(
      entity.id,
      entity.source,
      entity.rawPayload,
      entity.shipmentRef,
      entity.reason,
      entity.receivedAt,
      entity.status,
      entity.attempts,
      entity.nextAttemptAt,
      entity.lastError,
      entity.resolvedEventId,
      entity.firstSeenAt,
      entity.updatedAt,
    );
  }
}
