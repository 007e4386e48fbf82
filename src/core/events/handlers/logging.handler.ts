import { Logger } from '@nestjs/common';
import { EngineEvent, EngineEventHandler } from '../engine-events';

export type EventLogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logs engine notices. Problems (anomalies, failures, manual review) go
 * out as warnings whatever the level.
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Logger = new Logger('EngineEvents'),
    private readonly logLevel: EventLogLevel = 'normal',
  ) {}

  getHandler(): EngineEventHandler {
    return (event: EngineEvent) => {
      const message = `[${event.type}] ${this.describe(event)}`;

      if (this.isProblem(event)) {
        this.logger.warn(message);
      } else if (this.logLevel === 'verbose') {
        this.logger.log(`${message} ${JSON.stringify(event.payload)}`);
      } else if (this.logLevel === 'normal') {
        this.logger.log(message);
      } else {
        this.logger.debug(message);
      }
    };
  }

  private isProblem(event: EngineEvent): boolean {
    switch (event.type) {
      case 'event.manual-review':
      case 'transition.anomaly':
      case 'automation.action-failed':
      case 'automation.abandoned':
        return true;
      default:
        return false;
    }
  }

  private describe(event: EngineEvent): string {
    switch (event.type) {
      case 'event.accepted':
        return `shipment=${event.payload.shipmentId} event=${event.payload.eventId} status=${event.payload.canonicalStatus}`;
      case 'event.duplicate':
        return `shipment=${event.payload.shipmentId} source=${event.payload.source}`;
      case 'event.unclassified':
        return `shipment=${event.payload.shipmentId} code=${event.payload.occurrenceCode ?? '-'}`;
      case 'event.unresolved':
        return `source=${event.payload.source} reason=${event.payload.reason}`;
      case 'event.manual-review':
        return `entry=${event.payload.unresolvedId} reason=${event.payload.reason} attempts=${event.payload.attempts}`;
      case 'transition.applied':
        return `shipment=${event.payload.shipmentId} ${event.payload.fromStatus} -> ${event.payload.toStatus} v${event.payload.statusVersion}`;
      case 'transition.anomaly':
        return `shipment=${event.payload.shipmentId} event=${event.payload.eventId} ${event.payload.anomaly}`;
      case 'automation.action-failed':
        return `rule=${event.payload.ruleId} action=${event.payload.actionIndex}:${event.payload.actionType} ${event.payload.error}`;
      case 'automation.completed':
        return `rule=${event.payload.ruleId} shipment=${event.payload.shipmentId} v${event.payload.statusVersion}`;
      case 'automation.abandoned':
        return `rule=${event.payload.ruleId} shipment=${event.payload.shipmentId} after ${event.payload.attempts} attempts`;
    }
  }
}
