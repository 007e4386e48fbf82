/**
 * State of a parked (unresolved) carrier event
 */
export enum ReplayStatus {
  PENDING = 'pending',
  RESOLVED = 'resolved',
  MANUAL_REVIEW = 'manual_review',
}
