import { Logger } from '@nestjs/common';
import { NotificationRequest, NotificationSender } from '../../core';

/**
 * Default sender: writes the notification to the log instead of delivering it
 */
export class LoggingNotificationSender implements NotificationSender {
  private readonly logger = new Logger(LoggingNotificationSender.name);

  async send(request: NotificationRequest): Promise<void> {
    this.logger.log(
      `[${request.channel}] ${request.template} for shipment ${request.shipmentId} (${request.newStatus})` +
        (request.recipient ? ` to ${request.recipient}` : ''),
    );
  }
}
