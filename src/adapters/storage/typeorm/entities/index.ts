export * from './shipment.entity';
export * from './tracking-event.entity';
export * from './status-audit.entity';
export * from './automation-rule.entity';
export * from './automation-invocation.entity';
export * from './unresolved-event.entity';
