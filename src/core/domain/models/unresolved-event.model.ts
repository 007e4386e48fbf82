import { RejectionReason, ReplayStatus } from '../enums';
import { ShipmentReference } from './shared.types';

/**
 * UnresolvedEvent domain model - a carrier event parked until its shipment
 * is known, or until a human looks at it
 */
export class UnresolvedEvent {
  constructor(
    public readonly id: string,
    public readonly source: string,
    public readonly rawPayload: unknown,
    public readonly shipmentRef: ShipmentReference | null,
    public readonly reason: RejectionReason,
    public readonly receivedAt: Date,
    public status: ReplayStatus = ReplayStatus.PENDING,
    public attempts: number = 0,
    public nextAttemptAt: Date | null = null,
    public lastError: string | null = null,
    public resolvedEventId: string | null = null,
    public readonly firstSeenAt: Date = new Date(),
    public updatedAt: Date = new Date(),
  ) {}

  /**
   * Check whether the retry window measured from first sighting has passed
   */
  isExpired(now: Date, windowMs: number): boolean {
    return now.getTime() - this.firstSeenAt.getTime() >= windowMs;
  }

  clone(): UnresolvedEvent {
    return new UnresolvedEvent(
      this.id,
      this.source,
      this.rawPayload,
      this.shipmentRef ? { ...this.shipmentRef } : null,
      this.reason,
      this.receivedAt,
      this.status,
      this.attempts,
      this.nextAttemptAt,
      this.lastError,
      this.resolvedEventId,
      this.firstSeenAt,
      this.updatedAt,
    );
  }
}
