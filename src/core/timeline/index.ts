export * from './timeline-builder';
