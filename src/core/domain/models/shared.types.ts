/**
 * Plain JSON object as received from a carrier
 */
export type JsonObject = Record<string, unknown>;

/**
 * Values a shipment attribute (and a rule condition) may hold
 */
export type ScalarValue = string | number | boolean | null;

/**
 * Any of the keys a carrier payload may use to point at a shipment.
 * Resolution order: id, tracking code, invoice number + document
 */
export interface ShipmentReference {
  shipmentId?: string;
  trackingCode?: string;
  invoiceNumber?: string;
  document?: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * True when the reference carries at least one usable key
 */
export function hasShipmentKey(ref: ShipmentReference): boolean {
  return Boolean(
    ref.shipmentId ||
      ref.trackingCode ||
      (ref.invoiceNumber && ref.document),
  );
}
