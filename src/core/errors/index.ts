export * from './tracking.errors';
