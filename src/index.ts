/**
 * Trackline - Shipment Tracking Timeline Engine
 *
 * Turns raw carrier occurrences into deduplicated, ordered shipment
 * timelines with a derived canonical status, and fires automations
 * exactly once per status change.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/archive';
export * from './adapters/carriers';
export * from './adapters/notifications';

// Export input DTOs
export * from './_shared/dto';

// Export testing utilities
export {
  MockCarrierPayloadFactory,
  createTestEngine,
} from './testing';
export type {
  CarrierPayloadOptions,
  TestEngine,
  TestEngineOptions,
} from './testing';

// Export NestJS module, services and injection tokens
export * from './modules';

// Export environment-driven configuration
export { trackingConfig } from './config/tracking.config';
