/**
 * Tracking NestJS Module
 */

// Main module
export { TrackingModule } from './tracking.module';

// Configuration
export {
  defaultTrackingConfig,
  mergeTrackingConfig,
} from './tracking.config';
export type {
  TrackingModuleConfig,
  TrackingModuleAsyncConfig,
} from './tracking.config';

// Services
export * from './services';

// Injection tokens
export * from './constants';
