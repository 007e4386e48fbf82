export * from './shared.types';
export * from './occurrence-code.model';
export * from './shipment.model';
export * from './tracking-event.model';
export * from './automation-rule.model';
export * from './automation-invocation.model';
export * from './status-audit-entry.model';
export * from './unresolved-event.model';
