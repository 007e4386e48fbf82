export * from './rule-conditions';
export * from './action-executor';
export * from './automation-dispatcher';
