/**
 * How much attention an occurrence deserves
 */
export enum OccurrenceSeverity {
  INFO = 'info',
  WARNING = 'warning',
  EXCEPTION = 'exception',

  /**
   * Ends the shipment lifecycle. Set exactly when the occurrence is terminal
   */
  TERMINAL = 'terminal',
}

export function isOccurrenceSeverity(
  value: unknown,
): value is OccurrenceSeverity {
  const values: readonly string[] = Object.values(OccurrenceSeverity);
  return typeof value === 'string' && values.includes(value);
}
