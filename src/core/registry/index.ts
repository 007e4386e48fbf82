export * from './occurrence-code.registry';
export * from './occurrence-code.source';
