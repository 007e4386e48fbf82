export * from './canonical-status.enum';
export * from './occurrence-severity.enum';
export * from './ingestion-outcome.enum';
export * from './invocation-status.enum';
export * from './anomaly-kind.enum';
export * from './status-audit-kind.enum';
export * from './replay-status.enum';
