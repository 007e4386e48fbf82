export * from './tracking-engine';
