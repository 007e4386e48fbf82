import { AnomalyKind, CanonicalStatus, progressRank } from '../domain/enums';
import { TrackingEvent } from '../domain/models';
import { InvalidTransitionError } from '../errors';
import {
  Derivation,
  FoldState,
  FoldStep,
  StateMachineConfig,
  StateTransition,
  TransitionContext,
  TransitionResult,
} from './types';
import {
  TRANSITION_RULES,
  getInitialState,
  isTerminalState,
} from './transition-rules';

/**
 * Shipment state machine - enforces valid status transitions and derives
 * the current status by folding an ordered timeline
 *
 * Pure and synchronous; persistence is the status engine's job.
 */
export class ShipmentStateMachine {
  private readonly config: StateMachineConfig;
  private readonly transitions: Map<string, StateTransition>;

  constructor(config?: Partial<StateMachineConfig>) {
    this.config = {
      initialState: getInitialState(),
      transitions: TRANSITION_RULES,
      ...config,
    };

    this.transitions = new Map();
    for (const transition of this.config.transitions) {
      this.transitions.set(
        this.getTransitionKey(transition.from, transition.to),
        transition,
      );
    }
  }

  validateTransition(
    from: CanonicalStatus,
    to: CanonicalStatus,
    context: Partial<TransitionContext> = {},
  ): TransitionResult {
    const fullContext: TransitionContext = {
      currentStatus: from,
      targetStatus: to,
      progressRank: progressRank(from) ?? 0,
      ...context,
    };

    if (isTerminalState(from)) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Cannot transition from terminal state: ${from}`,
      };
    }

    const transition = this.transitions.get(this.getTransitionKey(from, to));
    if (!transition) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Transition from ${from} to ${to} is not defined`,
      };
    }

    const conditionFailures = (transition.conditions ?? [])
      .filter((condition) => !condition.evaluate(fullContext))
      .map((condition) => condition.errorMessage ?? condition.name);

    if (conditionFailures.length > 0) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        reason: `Conditions not met: ${conditionFailures.join(', ')}`,
        conditionFailures,
      };
    }

    return { success: true, fromStatus: from, toStatus: to };
  }

  canTransition(
    from: CanonicalStatus,
    to: CanonicalStatus,
    reachedRank?: number,
  ): boolean {
    const context =
      reachedRank === undefined ? {} : { progressRank: reachedRank };
    return this.validateTransition(from, to, context).success;
  }

  assertTransition(
    from: CanonicalStatus,
    to: CanonicalStatus,
    reachedRank?: number,
  ): void {
    const context =
      reachedRank === undefined ? {} : { progressRank: reachedRank };
    const result = this.validateTransition(from, to, context);
    if (!result.success) {
      throw new InvalidTransitionError(
        result.reason ?? `Invalid transition ${from} -> ${to}`,
        from,
        to,
      );
    }
  }

  getNextStates(currentStatus: CanonicalStatus): CanonicalStatus[] {
    if (isTerminalState(currentStatus)) {
      return [];
    }

    return this.config.transitions
      .filter((transition) => transition.from === currentStatus)
      .map((transition) => transition.to);
  }

  isTerminal(status: CanonicalStatus): boolean {
    return isTerminalState(status);
  }

  initialState(): FoldState {
    return {
      status: this.config.initialState,
      progressRank: progressRank(this.config.initialState) ?? 0,
      lastAppliedEventId: null,
    };
  }

  /**
   * Feed one event to the fold
   *
   * Order of checks: unclassified, same status, terminal, superseded,
   * transition table. A superseded event, and anything the table
   * rejects, is a regression.
   *
   * @param supersededBy - a higher-ranked event stored before this one
   *   that occurred after it
   */
  step(
    state: FoldState,
    event: TrackingEvent,
    supersededBy?: TrackingEvent,
  ): { state: FoldState; step: FoldStep } {
    const target = event.canonicalStatus;
    const before = state.status;

    const unchanged = (
      outcome: 'noop' | 'anomaly',
      anomaly: AnomalyKind | null,
      reason?: string,
    ) => ({
      state,
      step: {
        event,
        outcome,
        anomaly,
        statusBefore: before,
        statusAfter: before,
        reason,
      },
    });

    if (target === CanonicalStatus.UNCLASSIFIED) {
      return unchanged('anomaly', AnomalyKind.UNCLASSIFIED, 'Unknown occurrence code');
    }

    if (target === before) {
      return unchanged('noop', null);
    }

    if (isTerminalState(before)) {
      return unchanged(
        'anomaly',
        AnomalyKind.POST_TERMINAL,
        `Shipment already ${before}`,
      );
    }

    if (supersededBy) {
      return unchanged(
        'anomaly',
        AnomalyKind.REGRESSION,
        `Arrived after ${supersededBy.canonicalStatus} event ${supersededBy.id}, which occurred later`,
      );
    }

    const result = this.validateTransition(before, target, {
      progressRank: state.progressRank,
    });
    if (!result.success) {
      return unchanged('anomaly', AnomalyKind.REGRESSION, result.reason);
    }

    const next: FoldState = {
      status: target,
      progressRank: Math.max(
        state.progressRank,
        progressRank(target) ?? state.progressRank,
      ),
      lastAppliedEventId: event.id,
    };

    return {
      state: next,
      step: {
        event,
        outcome: 'applied',
        anomaly: null,
        statusBefore: before,
        statusAfter: target,
      },
    };
  }

  /**
   * Fold an ordered timeline into the derived status.
   * Callers pass events already sorted by the timeline builder.
   */
  derive(orderedEvents: readonly TrackingEvent[]): Derivation {
    const superseded = this.findSuperseded(orderedEvents);
    let state = this.initialState();
    const steps: FoldStep[] = [];

    for (const event of orderedEvents) {
      const result = this.step(state, event, superseded.get(event.id));
      state = result.state;
      steps.push(result.step);
    }

    return { ...state, steps };
  }

  /**
   * Events that would have moved the shipment backwards when they were
   * stored: a higher-ranked event that occurred later was already in.
   * Keyed by event id, valued with the earliest such event.
   */
  private findSuperseded(
    events: readonly TrackingEvent[],
  ): Map<string, TrackingEvent> {
    const superseded = new Map<string, TrackingEvent>();

    for (const event of events) {
      const rank = progressRank(event.canonicalStatus);
      if (rank === undefined) {
        continue;
      }

      const newer = events.find((other) => {
        const otherRank = progressRank(other.canonicalStatus);
        return (
          otherRank !== undefined &&
          otherRank > rank &&
          other.sequence < event.sequence &&
          other.occurredAt.getTime() > event.occurredAt.getTime()
        );
      });
      if (newer) {
        superseded.set(event.id, newer);
      }
    }

    return superseded;
  }

  private getTransitionKey(from: CanonicalStatus, to: CanonicalStatus): string {
    return `${from}->${to}`;
  }
}
