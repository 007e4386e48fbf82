/**
 * Injection tokens for the tracking module
 */

export const TRACKING_CONFIG = Symbol('TRACKING_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const ARCHIVE_ADAPTER = Symbol('ARCHIVE_ADAPTER');
export const OCCURRENCE_REGISTRY = Symbol('OCCURRENCE_REGISTRY');
export const ENGINE_EVENT_BUS = Symbol('ENGINE_EVENT_BUS');
export const TRACKING_ENGINE = Symbol('TRACKING_ENGINE');
export const INGESTION_PROCESSOR = Symbol('INGESTION_PROCESSOR');
export const TRACKING_SERVICE = Symbol('TRACKING_SERVICE');
export const REPLAY_QUEUE = Symbol('REPLAY_QUEUE');
export const AUTOMATION_DISPATCHER = Symbol('AUTOMATION_DISPATCHER');
