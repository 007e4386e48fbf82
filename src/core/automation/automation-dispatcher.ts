import { Logger } from '@nestjs/common';
import { CanonicalStatus, InvocationStatus } from '../domain/enums';
import {
  AutomationInvocation,
  AutomationRule,
  Shipment,
} from '../domain/models';
import { InvocationAlreadyClaimedError, toError } from '../errors';
import { EngineEventBus } from '../events';
import { LifecycleHooks, StorageAdapter } from '../interfaces';
import { invokeHook } from '../utils';
import { ActionExecutor } from './action-executor';
import { conditionsHold } from './rule-conditions';

/**
 * A committed status transition, as handed to the dispatcher
 */
export interface TransitionNotice {
  shipment: Shipment;
  fromStatus: CanonicalStatus;
  toStatus: CanonicalStatus;
  statusVersion: number;
  triggeringEventId: string | null;
}

export interface InvocationReport {
  invocationId: string;
  ruleId: string;
  status: InvocationStatus;
  failedActions: number[];
}

export interface DispatchSummary {
  matchedRules: number;
  invocations: InvocationReport[];

  /**
   * Rules whose invocation was already claimed for this status version
   */
  skippedRuleIds: string[];
}

export interface RecoverySummary {
  retried: number;
  completed: number;
  abandoned: number;
}

export interface AutomationDispatcherOptions {
  maxAttempts: number;
  recoveryAfterMs: number;
  batchSize: number;
}

/**
 * Fires automation rules on committed transitions, exactly once per
 * (shipment, rule, status version)
 *
 * The claim row is inserted before any action runs; a second dispatch for
 * the same key finds the claim and skips. Interrupted or failed
 * invocations are picked up by retryIncomplete, which re-runs only the
 * actions not yet completed.
 */
export class AutomationDispatcher {
  private readonly logger = new Logger(AutomationDispatcher.name);
  private readonly options: AutomationDispatcherOptions;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly actionExecutor: ActionExecutor,
    private readonly eventBus: EngineEventBus,
    options: Partial<AutomationDispatcherOptions> = {},
    private readonly hooks: LifecycleHooks = {},
  ) {
    this.options = {
      maxAttempts: 5,
      recoveryAfterMs: 5 * 60 * 1000,
      batchSize: 50,
      ...options,
    };
  }

  async dispatch(notice: TransitionNotice): Promise<DispatchSummary> {
    const rules = await this.storageAdapter.listAutomationRules({
      enabled: true,
      triggerStatus: notice.toStatus,
    });

    const matched = rules.filter(
      (rule) =>
        rule.triggersOn(notice.toStatus) &&
        conditionsHold(rule.conditions, {
          shipment: notice.shipment,
          previousStatus: notice.fromStatus,
        }),
    );

    const summary: DispatchSummary = {
      matchedRules: matched.length,
      invocations: [],
      skippedRuleIds: [],
    };

    await Promise.all(
      matched.map(async (rule) => {
        const invocation = await this.claim(rule, notice);
        if (!invocation) {
          summary.skippedRuleIds.push(rule.id);
          return;
        }
        summary.invocations.push(
          await this.run(invocation, rule, notice.shipment),
        );
      }),
    );

    return summary;
  }

  /**
   * Re-run failed invocations and claims stuck longer than recoveryAfterMs
   */
  async retryIncomplete(now: Date = new Date()): Promise<RecoverySummary> {
    const summary: RecoverySummary = { retried: 0, completed: 0, abandoned: 0 };

    const failed = await this.storageAdapter.listInvocations({
      statuses: [InvocationStatus.FAILED],
      limit: this.options.batchSize,
    });
    const stuck = await this.storageAdapter.listInvocations({
      statuses: [InvocationStatus.CLAIMED],
      updatedBefore: new Date(now.getTime() - this.options.recoveryAfterMs),
      limit: this.options.batchSize,
    });

    for (const invocation of [...failed, ...stuck]) {
      if (invocation.attempts >= this.options.maxAttempts) {
        await this.abandon(invocation, invocation.lastError);
        summary.abandoned++;
        continue;
      }

      const rule = await this.storageAdapter.findAutomationRule(invocation.ruleId);
      if (!rule || !rule.enabled) {
        await this.abandon(invocation, `rule ${invocation.ruleId} no longer active`);
        summary.abandoned++;
        continue;
      }

      const shipment = await this.storageAdapter.findShipment({
        shipmentId: invocation.shipmentId,
      });
      if (!shipment) {
        await this.abandon(invocation, `shipment ${invocation.shipmentId} not found`);
        summary.abandoned++;
        continue;
      }

      const reclaimed = await this.storageAdapter.reclaimInvocation(
        invocation.id,
        invocation.attempts,
      );
      if (!reclaimed) {
        // Another worker took it
        continue;
      }

      summary.retried++;
      const report = await this.run(reclaimed, rule, shipment);
      if (report.status === InvocationStatus.COMPLETED) {
        summary.completed++;
      }
    }

    if (summary.retried > 0 || summary.abandoned > 0) {
      this.logger.log(
        `Recovery: ${summary.retried} retried, ${summary.completed} completed, ${summary.abandoned} abandoned`,
      );
    }

    return summary;
  }

  private async claim(
    rule: AutomationRule,
    notice: TransitionNotice,
  ): Promise<AutomationInvocation | null> {
    try {
      return await this.storageAdapter.claimInvocation({
        shipmentId: notice.shipment.id,
        ruleId: rule.id,
        statusVersion: notice.statusVersion,
        newStatus: notice.toStatus,
        previousStatus: notice.fromStatus,
        triggeringEventId: notice.triggeringEventId,
      });
    } catch (error) {
      if (error instanceof InvocationAlreadyClaimedError) {
        this.logger.debug(`Invocation ${error.invocationKey} already claimed`);
        return null;
      }
      throw error;
    }
  }

  /**
   * Run the outstanding actions in declared order. A failure is recorded
   * and the next action still runs.
   */
  private async run(
    invocation: AutomationInvocation,
    rule: AutomationRule,
    shipment: Shipment,
  ): Promise<InvocationReport> {
    const completedActions = [...invocation.completedActions];
    const failedActions: number[] = [];
    let lastError: string | null = null;

    for (const [index, action] of rule.actions.entries()) {
      if (invocation.hasCompletedAction(index)) {
        continue;
      }

      const startTime = Date.now();
      try {
        await this.actionExecutor.execute(action, index, {
          shipment,
          rule,
          invocation,
        });
        completedActions.push(index);
        await this.storageAdapter.updateInvocation(invocation.id, {
          status: InvocationStatus.CLAIMED,
          completedActions,
        });
        await this.reportAction(invocation, index, action.type, startTime);
      } catch (error) {
        const err = toError(error);
        failedActions.push(index);
        lastError = err.message;

        this.logger.warn(err.message);
        await this.eventBus.emit({
          type: 'automation.action-failed',
          payload: {
            shipmentId: invocation.shipmentId,
            ruleId: rule.id,
            invocationId: invocation.id,
            actionIndex: index,
            actionType: action.type,
            attempt: invocation.attempts,
            error: err.message,
          },
        });
        await this.reportAction(invocation, index, action.type, startTime, err);
      }
    }

    const status =
      failedActions.length === 0
        ? InvocationStatus.COMPLETED
        : InvocationStatus.FAILED;

    await this.storageAdapter.updateInvocation(invocation.id, {
      status,
      completedActions,
      lastError,
      completedAt: status === InvocationStatus.COMPLETED ? new Date() : null,
    });

    if (status === InvocationStatus.COMPLETED) {
      await this.eventBus.emit({
        type: 'automation.completed',
        payload: {
          shipmentId: invocation.shipmentId,
          ruleId: rule.id,
          invocationId: invocation.id,
          statusVersion: invocation.statusVersion,
          attempts: invocation.attempts,
        },
      });
    }

    return {
      invocationId: invocation.id,
      ruleId: rule.id,
      status,
      failedActions,
    };
  }

  private async abandon(
    invocation: AutomationInvocation,
    lastError: string | null,
  ): Promise<void> {
    await this.storageAdapter.updateInvocation(invocation.id, {
      status: InvocationStatus.ABANDONED,
      lastError,
    });

    this.logger.error(
      `Invocation ${invocation.key} abandoned after ${invocation.attempts} attempts: ${lastError ?? 'unknown error'}`,
    );

    await this.eventBus.emit({
      type: 'automation.abandoned',
      payload: {
        shipmentId: invocation.shipmentId,
        ruleId: invocation.ruleId,
        invocationId: invocation.id,
        statusVersion: invocation.statusVersion,
        attempts: invocation.attempts,
        lastError,
      },
    });
  }

  private async reportAction(
    invocation: AutomationInvocation,
    actionIndex: number,
    actionType: string,
    startTime: number,
    error?: Error,
  ): Promise<void> {
    await invokeHook(this.logger, 'onActionResult', this.hooks.onActionResult, {
      shipmentId: invocation.shipmentId,
      ruleId: invocation.ruleId,
      invocationId: invocation.id,
      actionIndex,
      actionType,
      success: !error,
      durationMs: Date.now() - startTime,
      error,
    });
  }
}
