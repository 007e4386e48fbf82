/**
 * Tracking engine core
 * Storage- and carrier-agnostic business logic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Errors
export * from './errors';

// Interfaces and contracts
export * from './interfaces';

// Occurrence codes and normalization
export * from './registry';
export * from './normalizer';

// Timeline and state machine
export * from './timeline';
export * from './state-machine';

// Automations, archive mirror, replay
export * from './automation';
export * from './archival';
export * from './replay';

// Ingestion pipeline
export * from './pipeline';

// Core services
export * from './services';

// Composition
export * from './engine';

// Engine notices
export * from './events';

export * from './utils';
