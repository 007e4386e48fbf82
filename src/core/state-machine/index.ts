/**
 * Shipment state machine
 * Transition table, status fold and the CAS-guarded status engine
 */

export * from './shipment-state-machine';
export * from './types';
export * from './transition-rules';
export * from './status-engine';
