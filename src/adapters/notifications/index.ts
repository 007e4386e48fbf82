export { LoggingNotificationSender } from './logging-notification.sender';
export { MockNotificationSender } from './mock-notification.sender';
