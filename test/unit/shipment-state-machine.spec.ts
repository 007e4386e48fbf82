import {
  AnomalyKind,
  CanonicalStatus,
  InvalidTransitionError,
  MockStorageAdapter,
  ShipmentStateMachine,
  StatusAuditKind,
  StatusEngine,
  StorageConflictError,
  TimelineBuilder,
  TrackingEvent,
  getTerminalStates,
} from '../../src';

let sequence = 0;

function event(
  status: CanonicalStatus,
  occurredAt: string,
  storedAs = 0,
): TrackingEvent {
  const id = `evt-${++sequence}`;
  return new TrackingEvent(
    id,
    'shp-1',
    null,
    status,
    'ssw',
    new Date(occurredAt),
    new Date(occurredAt),
    `key-${id}`,
    false,
    false,
    null,
    null,
    null,
    {},
    storedAs,
  );
}

describe('ShipmentStateMachine', () => {
  const stateMachine = new ShipmentStateMachine();

  describe('Transition table', () => {
    it('should allow forward progress, including skipped stages', () => {
      expect(stateMachine.canTransition(CanonicalStatus.CREATED, CanonicalStatus.COLLECTED)).toBe(true);
      expect(stateMachine.canTransition(CanonicalStatus.CREATED, CanonicalStatus.DELIVERED)).toBe(true);
      expect(stateMachine.canTransition(CanonicalStatus.IN_TRANSIT, CanonicalStatus.RETURNED)).toBe(true);
    });

    it('should refuse to leave a terminal status', () => {
      const result = stateMachine.validateTransition(
        CanonicalStatus.DELIVERED,
        CanonicalStatus.EXCEPTION,
      );

      expect(result.success).toBe(false);
      expect(result.reason).toBe('Cannot transition from terminal state: delivered');
    });

    it('should refuse backward moves', () => {
      const result = stateMachine.validateTransition(
        CanonicalStatus.IN_TRANSIT,
        CanonicalStatus.COLLECTED,
      );

      expect(result.reason).toBe('Transition from in_transit to collected is not defined');
    });

    it('should not resume below the progress reached before an exception', () => {
      const result = stateMachine.validateTransition(
        CanonicalStatus.EXCEPTION,
        CanonicalStatus.COLLECTED,
        { progressRank: 2 },
      );

      expect(result.success).toBe(false);
      expect(result.conditionFailures).toEqual([
        'Target status ranks below progress already reached',
      ]);
      expect(stateMachine.canTransition(CanonicalStatus.EXCEPTION, CanonicalStatus.IN_TRANSIT, 2)).toBe(true);
    });

    it('should throw InvalidTransitionError from assertTransition', () => {
      expect(() =>
        stateMachine.assertTransition(CanonicalStatus.RETURNED, CanonicalStatus.DELIVERED),
      ).toThrow(InvalidTransitionError);
    });

    it('should list next states', () => {
      expect(stateMachine.getNextStates(CanonicalStatus.OUT_FOR_DELIVERY)).toEqual([
        CanonicalStatus.DELIVERED,
        CanonicalStatus.EXCEPTION,
        CanonicalStatus.RETURNED,
      ]);
      expect(stateMachine.getNextStates(CanonicalStatus.DELIVERED)).toEqual([]);
      expect(getTerminalStates()).toEqual([
        CanonicalStatus.DELIVERED,
        CanonicalStatus.RETURNED,
      ]);
    });
  });

  describe('Status derivation', () => {
    it('should start at created', () => {
      expect(stateMachine.derive([])).toEqual({
        status: CanonicalStatus.CREATED,
        progressRank: 0,
        lastAppliedEventId: null,
        steps: [],
      });
    });

    it('should fold a full lifecycle', () => {
      const events = [
        event(CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z'),
        event(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'),
        event(CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-06T08:00:00Z'),
        event(CanonicalStatus.DELIVERED, '2024-03-06T11:00:00Z'),
      ];

      const derivation = stateMachine.derive(events);

      expect(derivation.status).toBe(CanonicalStatus.DELIVERED);
      expect(derivation.progressRank).toBe(4);
      expect(derivation.lastAppliedEventId).toBe(events[3].id);
      expect(derivation.steps.map((step) => step.outcome)).toEqual([
        'applied',
        'applied',
        'applied',
        'applied',
      ]);
    });

    it('should treat a repeated status as a no-op', () => {
      const derivation = stateMachine.derive([
        event(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'),
        event(CanonicalStatus.IN_TRANSIT, '2024-03-05T14:00:00Z'),
      ]);

      expect(derivation.steps[1].outcome).toBe('noop');
      expect(derivation.steps[1].anomaly).toBeNull();
    });

    it('should flag a regression without moving the status', () => {
      const derivation = stateMachine.derive([
        event(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'),
        event(CanonicalStatus.COLLECTED, '2024-03-05T11:00:00Z'),
      ]);

      expect(derivation.status).toBe(CanonicalStatus.IN_TRANSIT);
      expect(derivation.steps[1]).toMatchObject({
        outcome: 'anomaly',
        anomaly: AnomalyKind.REGRESSION,
        statusBefore: CanonicalStatus.IN_TRANSIT,
        statusAfter: CanonicalStatus.IN_TRANSIT,
      });
    });

    it('should keep terminal statuses final', () => {
      const derivation = stateMachine.derive([
        event(CanonicalStatus.DELIVERED, '2024-03-05T10:00:00Z'),
        event(CanonicalStatus.RETURNED, '2024-03-06T10:00:00Z'),
      ]);

      expect(derivation.status).toBe(CanonicalStatus.DELIVERED);
      expect(derivation.steps[1].anomaly).toBe(AnomalyKind.POST_TERMINAL);
      expect(derivation.steps[1].reason).toBe('Shipment already delivered');
    });

    it('should never adopt an unclassified status', () => {
      const derivation = stateMachine.derive([
        event(CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z'),
        event(CanonicalStatus.UNCLASSIFIED, '2024-03-05T09:00:00Z'),
      ]);

      expect(derivation.status).toBe(CanonicalStatus.COLLECTED);
      expect(derivation.steps[1].anomaly).toBe(AnomalyKind.UNCLASSIFIED);
    });

    it('should flag an event stored after a later, more advanced one', () => {
      const collected = event(CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z', 1);
      const inTransit = event(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z', 3);
      const outForDelivery = event(CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-06T08:00:00Z', 2);

      const derivation = stateMachine.derive([collected, inTransit, outForDelivery]);

      expect(derivation.status).toBe(CanonicalStatus.OUT_FOR_DELIVERY);
      expect(derivation.lastAppliedEventId).toBe(outForDelivery.id);
      expect(derivation.steps[1]).toEqual({
        event: inTransit,
        outcome: 'anomaly',
        anomaly: AnomalyKind.REGRESSION,
        statusBefore: CanonicalStatus.COLLECTED,
        statusAfter: CanonicalStatus.COLLECTED,
        reason: `Arrived after out_for_delivery event ${outForDelivery.id}, which occurred later`,
      });
      expect(derivation.steps[2]).toMatchObject({
        outcome: 'applied',
        statusBefore: CanonicalStatus.COLLECTED,
        statusAfter: CanonicalStatus.OUT_FOR_DELIVERY,
      });
    });

    it('should let an earlier event stored late slot in when nothing outranks it', () => {
      const inTransit = event(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z', 1);
      const exception = event(CanonicalStatus.EXCEPTION, '2024-03-05T09:00:00Z', 2);

      const derivation = stateMachine.derive([exception, inTransit]);

      expect(derivation.steps.map((step) => step.outcome)).toEqual(['applied', 'applied']);
      expect(derivation.status).toBe(CanonicalStatus.IN_TRANSIT);
    });

    it('should remember progress across an exception', () => {
      const events = [
        event(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z'),
        event(CanonicalStatus.EXCEPTION, '2024-03-05T12:00:00Z'),
        event(CanonicalStatus.COLLECTED, '2024-03-05T13:00:00Z'),
        event(CanonicalStatus.OUT_FOR_DELIVERY, '2024-03-06T08:00:00Z'),
      ];

      const derivation = stateMachine.derive(events);

      expect(derivation.steps[1].statusAfter).toBe(CanonicalStatus.EXCEPTION);
      expect(derivation.steps[2].anomaly).toBe(AnomalyKind.REGRESSION);
      expect(derivation.status).toBe(CanonicalStatus.OUT_FOR_DELIVERY);
      expect(derivation.progressRank).toBe(3);
    });
  });
});

describe('StatusEngine', () => {
  let storageAdapter: MockStorageAdapter;
  let statusEngine: StatusEngine;
  let shipmentId: string;

  const insert = (status: CanonicalStatus, occurredAt: string) =>
    storageAdapter.insertTrackingEvent({
      shipmentId,
      occurrenceCode: null,
      canonicalStatus: status,
      source: 'ssw',
      occurredAt: new Date(occurredAt),
      occurredAtEstimated: false,
      receivedAt: new Date(),
      dedupKey: `${status}@${occurredAt}`,
      needsReview: false,
      carrierEventId: null,
      description: null,
      location: null,
      rawPayload: {},
    });

  beforeEach(async () => {
    storageAdapter = new MockStorageAdapter();
    statusEngine = new StatusEngine(
      storageAdapter,
      new ShipmentStateMachine(),
      new TimelineBuilder(storageAdapter),
      { maxConflictRetries: 2, conflictBackoffMs: 1 },
    );
    const shipment = await storageAdapter.createShipment({
      trackingCode: 'TRK-1',
      carrier: 'ssw',
    });
    shipmentId = shipment.id;
  });

  afterEach(() => {
    jest.restoreAllMocks();
    storageAdapter.clear();
  });

  it('should commit a forward transition and audit it', async () => {
    const inTransit = await insert(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z');

    const outcome = await statusEngine.apply(shipmentId, inTransit);

    expect(outcome).toMatchObject({
      kind: 'applied',
      fromStatus: CanonicalStatus.CREATED,
      toStatus: CanonicalStatus.IN_TRANSIT,
      statusVersion: 1,
      triggeringEventId: inTransit.id,
      anomaly: null,
      late: false,
    });

    const trail = await storageAdapter.getAuditTrail(shipmentId);
    expect(trail).toHaveLength(1);
    expect(trail[0].getDescription()).toBe(
      'Transitioned from created to in_transit (v1)',
    );
  });

  it('should flag a late event that ranks below the stored status', async () => {
    const inTransit = await insert(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z');
    await statusEngine.apply(shipmentId, inTransit);

    const collected = await insert(CanonicalStatus.COLLECTED, '2024-03-05T08:00:00Z');
    const outcome = await statusEngine.apply(shipmentId, collected);

    expect(outcome.kind).toBe('unchanged');
    expect(outcome.anomaly).toBe(AnomalyKind.REGRESSION);
    expect(outcome.late).toBe(true);
    expect(outcome.shipment.currentStatus).toBe(CanonicalStatus.IN_TRANSIT);

    const trail = await storageAdapter.getAuditTrail(shipmentId);
    expect(trail.map((entry) => entry.kind)).toEqual([
      StatusAuditKind.TRANSITION,
      StatusAuditKind.ANOMALY,
    ]);
    expect(trail[1]).toMatchObject({
      fromStatus: CanonicalStatus.IN_TRANSIT,
      toStatus: CanonicalStatus.COLLECTED,
      eventId: collected.id,
      anomaly: AnomalyKind.REGRESSION,
    });
  });

  it('should record a chronological regression as an anomaly', async () => {
    const inTransit = await insert(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z');
    await statusEngine.apply(shipmentId, inTransit);

    const collected = await insert(CanonicalStatus.COLLECTED, '2024-03-05T11:00:00Z');
    const outcome = await statusEngine.apply(shipmentId, collected);

    expect(outcome.kind).toBe('unchanged');
    expect(outcome.anomaly).toBe(AnomalyKind.REGRESSION);

    const trail = await storageAdapter.getAuditTrail(shipmentId);
    expect(trail).toHaveLength(2);
    expect(trail[1]).toMatchObject({
      kind: StatusAuditKind.ANOMALY,
      fromStatus: CanonicalStatus.IN_TRANSIT,
      toStatus: CanonicalStatus.COLLECTED,
      statusVersion: 1,
      eventId: collected.id,
      anomaly: AnomalyKind.REGRESSION,
    });
  });

  it('should re-read and retry after losing a version race', async () => {
    const inTransit = await insert(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z');
    const applySpy = jest
      .spyOn(storageAdapter, 'applyTransition')
      .mockRejectedValueOnce(
        new StorageConflictError('version moved', shipmentId, 0, 1),
      );

    const outcome = await statusEngine.apply(shipmentId, inTransit);

    expect(applySpy).toHaveBeenCalledTimes(2);
    expect(outcome.kind).toBe('applied');
    expect(outcome.shipment.currentStatusVersion).toBe(1);
  });

  it('should give up after the configured number of conflicts', async () => {
    const inTransit = await insert(CanonicalStatus.IN_TRANSIT, '2024-03-05T10:00:00Z');
    const applySpy = jest
      .spyOn(storageAdapter, 'applyTransition')
      .mockRejectedValue(new StorageConflictError('version moved', shipmentId, 0, 1));

    await expect(statusEngine.apply(shipmentId, inTransit)).rejects.toThrow(
      StorageConflictError,
    );
    expect(applySpy).toHaveBeenCalledTimes(3);
  });

  it('should leave a consistent shipment alone on reconcile', async () => {
    const outcome = await statusEngine.reconcile(shipmentId);

    expect(outcome.kind).toBe('unchanged');
    expect(outcome.shipment.currentStatusVersion).toBe(0);
  });
});
