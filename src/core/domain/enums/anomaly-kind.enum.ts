/**
 * Reasons an event does not move the shipment status
 */
export enum AnomalyKind {
  /**
   * Status ranks below progress already reached
   */
  REGRESSION = 'regression',

  /**
   * Arrived (chronologically) after a terminal status
   */
  POST_TERMINAL = 'post_terminal',

  /**
   * Occurrence code unknown to the registry
   */
  UNCLASSIFIED = 'unclassified',
}
