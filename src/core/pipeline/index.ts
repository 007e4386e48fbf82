/**
 * Ingestion pipeline
 *
 * 1. Normalization - map carrier payloads to canonical events
 * 2. Ingest - dedup-keyed insert
 * 3. State Engine - status derivation
 * 4. Dispatch - automations and archive mirror
 */

export { IngestionProcessor } from './ingestion-processor';

export * from './types';

// Individual stages (for testing or custom pipelines)
export { NormalizationStage } from './stages/normalization.stage';
export { IngestStage } from './stages/ingest.stage';
export { StateEngineStage } from './stages/state-engine.stage';
export { DispatchStage } from './stages/dispatch.stage';
