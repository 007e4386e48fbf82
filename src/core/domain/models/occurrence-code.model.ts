import { CanonicalStatus, OccurrenceSeverity } from '../enums';

/**
 * OccurrenceCode domain model - one entry of the carrier code taxonomy
 * Immutable once seeded; instances are frozen by the registry
 */
export class OccurrenceCode {
  constructor(
    public readonly code: string,
    public readonly carrier: string,
    public readonly description: string,
    public readonly canonicalStatus: CanonicalStatus,
    public readonly severity: OccurrenceSeverity,
    public readonly isTerminal: boolean,
    public readonly type: string | null = null,
    public readonly process: string | null = null,
  ) {}

  /**
   * Registry key: one entry per (carrier, code)
   */
  get key(): string {
    return OccurrenceCode.keyOf(this.carrier, this.code);
  }

  /**
   * Whether an operator should look at shipments hitting this code
   */
  needsAttention(): boolean {
    return (
      this.severity === OccurrenceSeverity.WARNING ||
      this.severity === OccurrenceSeverity.EXCEPTION
    );
  }

  static keyOf(carrier: string, code: string): string {
    return `${carrier}:${code}`;
  }
}
