import { CanonicalStatus, InvocationStatus } from '../enums';

/**
 * AutomationInvocation domain model - the idempotency claim for one rule
 * firing on one status version of one shipment
 */
export class AutomationInvocation {
  constructor(
    public readonly id: string,
    public readonly shipmentId: string,
    public readonly ruleId: string,
    public readonly statusVersion: number,
    public readonly newStatus: CanonicalStatus,
    public readonly previousStatus: CanonicalStatus,
    public readonly triggeringEventId: string | null,
    public status: InvocationStatus = InvocationStatus.CLAIMED,
    public attempts: number = 1,
    public completedActions: number[] = [],
    public readonly dispatchedAt: Date = new Date(),
    public updatedAt: Date = new Date(),
    public completedAt: Date | null = null,
    public lastError: string | null = null,
  ) {}

  /**
   * Idempotency key: (shipment, rule, status version)
   */
  get key(): string {
    return AutomationInvocation.keyOf(
      this.shipmentId,
      this.ruleId,
      this.statusVersion,
    );
  }

  isSettled(): boolean {
    return (
      this.status === InvocationStatus.COMPLETED ||
      this.status === InvocationStatus.ABANDONED
    );
  }

  hasCompletedAction(index: number): boolean {
    return this.completedActions.includes(index);
  }

  clone(): AutomationInvocation {
    return new AutomationInvocation(
      this.id,
      this.shipmentId,
      this.ruleId,
      this.statusVersion,
      this.newStatus,
      this.previousStatus,
      this.triggeringEventId,
      this.status,
      this.attempts,
      [...this.completedActions],
      this.dispatchedAt,
      this.updatedAt,
      this.completedAt,
      this.lastError,
    );
  }

  static keyOf(
    shipmentId: string,
    ruleId: string,
    statusVersion: number,
  ): string {
    return `${shipmentId}:${ruleId}:${statusVersion}`;
  }
}
