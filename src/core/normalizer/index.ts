export * from './event-normalizer';
export * from './dedup-key';
export * from './types';
