import { Logger } from '@nestjs/common';
import {
  AutomationAction,
  AutomationInvocation,
  AutomationRule,
  NotifyAction,
  Shipment,
  WebhookAction,
} from '../domain/models';
import { ActionFailureError, toError } from '../errors';
import { NotificationSender } from '../interfaces';
import { assertNever, withTimeout } from '../utils';

export interface ActionContext {
  shipment: Shipment;
  rule: AutomationRule;
  invocation: AutomationInvocation;
}

export interface ActionExecutorOptions {
  actionTimeoutMs: number;
}

/**
 * Runs a single automation action under a timeout
 *
 * Every failure, including a timeout or a non-2xx webhook response,
 * surfaces as ActionFailureError carrying the action index.
 */
export class ActionExecutor {
  private readonly logger = new Logger(ActionExecutor.name);
  private readonly options: ActionExecutorOptions;

  constructor(
    private readonly notificationSender: NotificationSender,
    options: Partial<ActionExecutorOptions> = {},
  ) {
    this.options = { actionTimeoutMs: 10000, ...options };
  }

  async execute(
    action: AutomationAction,
    index: number,
    context: ActionContext,
  ): Promise<void> {
    try {
      switch (action.type) {
        case 'notify':
          await this.notify(action, context);
          return;
        case 'webhook':
          await this.callWebhook(action, index, context);
          return;
        default:
          return assertNever(action, 'Unknown automation action');
      }
    } catch (error) {
      const cause = toError(error);
      throw new ActionFailureError(
        `Action ${index} (${action.type}) of rule ${context.rule.id} failed: ${cause.message}`,
        action.type,
        index,
        cause,
      );
    }
  }

  private async notify(action: NotifyAction, context: ActionContext): Promise<void> {
    await withTimeout(
      this.notificationSender.send({
        channel: action.channel,
        template: action.template,
        recipient: action.recipient,
        shipmentId: context.shipment.id,
        newStatus: context.invocation.newStatus,
        context: this.buildContext(context),
      }),
      this.options.actionTimeoutMs,
      `notify ${action.channel}`,
    );
  }

  private async callWebhook(
    action: WebhookAction,
    index: number,
    context: ActionContext,
  ): Promise<void> {
    const controller = new AbortController();
    const timeoutMs = action.timeoutMs ?? this.options.actionTimeoutMs;

    const response = await withTimeout(
      fetch(action.url, {
        method: action.method ?? 'POST',
        headers: {
          'content-type': 'application/json',
          'idempotency-key': `${context.invocation.key}:${index}`,
          ...action.headers,
        },
        body: JSON.stringify({
          shipmentId: context.shipment.id,
          newStatus: context.invocation.newStatus,
          context: this.buildContext(context),
        }),
        signal: controller.signal,
      }),
      timeoutMs,
      `webhook ${action.url}`,
      () => controller.abort(),
    );

    if (!response.ok) {
      throw new Error(`webhook responded with HTTP ${response.status}`);
    }

    this.logger.debug(`Webhook ${action.url} accepted (${response.status})`);
  }

  private buildContext(context: ActionContext): Record<string, unknown> {
    return {
      ruleId: context.rule.id,
      ruleName: context.rule.name,
      previousStatus: context.invocation.previousStatus,
      statusVersion: context.invocation.statusVersion,
      triggeringEventId: context.invocation.triggeringEventId,
      trackingCode: context.shipment.trackingCode,
      carrier: context.shipment.carrier,
      invoiceNumber: context.shipment.invoiceNumber,
      attributes: context.shipment.attributes,
    };
  }
}
