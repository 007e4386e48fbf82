/**
 * Engine notices
 */

export * from './engine-events';
export { EngineEventBus } from './engine-event-bus';
export * from './handlers/logging.handler';
