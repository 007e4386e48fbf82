import { AnomalyKind, CanonicalStatus, StatusAuditKind } from '../enums';

/**
 * StatusAuditEntry domain model - append-only record of every applied
 * transition and every anomaly the status engine observed
 */
export class StatusAuditEntry {
  constructor(
    public readonly id: string,
    public readonly shipmentId: string,
    public readonly kind: StatusAuditKind,
    public readonly fromStatus: CanonicalStatus,
    public readonly toStatus: CanonicalStatus,
    public readonly statusVersion: number,
    public readonly eventId: string | null = null,
    public readonly anomaly: AnomalyKind | null = null,
    public readonly reason: string | null = null,
    public readonly createdAt: Date = new Date(),
  ) {}

  getDescription(): string {
    if (this.kind === StatusAuditKind.ANOMALY) {
      return `Anomaly (${this.anomaly ?? 'unknown'}) at ${this.fromStatus}: ${this.reason ?? 'no reason recorded'}`;
    }
    return `Transitioned from ${this.fromStatus} to ${this.toStatus} (v${this.statusVersion})`;
  }
}
