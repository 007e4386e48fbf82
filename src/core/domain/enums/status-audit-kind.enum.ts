export enum StatusAuditKind {
  TRANSITION = 'transition',
  ANOMALY = 'anomaly',
}
