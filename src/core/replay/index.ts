export * from './replay-queue';
