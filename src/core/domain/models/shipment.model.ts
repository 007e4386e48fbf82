import { CanonicalStatus, isTerminalStatus } from '../enums';
import { ScalarValue, ShipmentReference } from './shared.types';

/**
 * Shipment domain model
 * Status fields are written by the status engine only; currentStatusVersion
 * is monotonic and doubles as the automation idempotency component
 */
export class Shipment {
  constructor(
    public readonly id: string,
    public readonly trackingCode: string,
    public readonly carrier: string,
    public currentStatus: CanonicalStatus = CanonicalStatus.CREATED,
    public currentStatusVersion: number = 0,
    public lastEventId: string | null = null,
    public readonly invoiceNumber: string | null = null,
    public readonly document: string | null = null,
    public attributes: Record<string, ScalarValue> = {},
    public readonly createdAt: Date = new Date(),
    public updatedAt: Date = new Date(),
  ) {}

  isTerminal(): boolean {
    return isTerminalStatus(this.currentStatus);
  }

  /**
   * Check whether a (possibly partial) reference points at this shipment
   */
  matches(ref: ShipmentReference): boolean {
    if (ref.shipmentId) {
      return ref.shipmentId === this.id;
    }
    if (ref.trackingCode) {
      return ref.trackingCode === this.trackingCode;
    }
    if (ref.invoiceNumber && ref.document) {
      return (
        ref.invoiceNumber === this.invoiceNumber &&
        ref.document === this.document
      );
    }
    return false;
  }

  clone(): Shipment {
    return new Shipment(
      this.id,
      this.trackingCode,
      this.carrier,
      this.currentStatus,
      this.currentStatusVersion,
      this.lastEventId,
      this.invoiceNumber,
      this.document,
      { ...this.attributes },
      this.createdAt,
      this.updatedAt,
    );
  }
}
