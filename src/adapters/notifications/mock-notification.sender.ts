import { NotificationRequest, NotificationSender } from '../../core';

/**
 * Records every request; can be told to fail per channel
 */
export class MockNotificationSender implements NotificationSender {
  readonly sent: NotificationRequest[] = [];
  private failingChannels: Map<string, Error> = new Map();

  failChannel(channel: string, error: Error = new Error(`${channel} down`)): void {
    this.failingChannels.set(channel, error);
  }

  healChannel(channel: string): void {
    this.failingChannels.delete(channel);
  }

  async send(request: NotificationRequest): Promise<void> {
    const error = this.failingChannels.get(request.channel);
    if (error) {
      throw error;
    }
    this.sent.push({ ...request });
  }

  clear(): void {
    this.sent.length = 0;
    this.failingChannels.clear();
  }
}
