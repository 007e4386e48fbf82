export * from './types';
export * from './tracking.service';
