import { CanonicalStatus } from '../domain/enums';

export interface NotificationRequest {
  channel: string;
  template: string;
  recipient?: string;
  shipmentId: string;
  newStatus: CanonicalStatus;
  context: Record<string, unknown>;
}

/**
 * External collaborator delivering `notify` actions (e-mail, SMS, ...)
 */
export interface NotificationSender {
  send(request: NotificationRequest): Promise<void>;
}
