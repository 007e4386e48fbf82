/**
 * Automation invocation lifecycle
 */
export enum InvocationStatus {
  /**
   * Claim row inserted; actions running or interrupted
   */
  CLAIMED = 'claimed',

  COMPLETED = 'completed',

  /**
   * At least one action failed; eligible for recovery
   */
  FAILED = 'failed',

  /**
   * Recovery attempts exhausted
   */
  ABANDONED = 'abandoned',
}
