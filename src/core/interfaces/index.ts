// Interface and type exports
export * from './common.types';
export * from './storage.adapter';
export * from './archive.adapter';
export * from './carrier.adapter';
export * from './notification-sender.interface';
export * from './configuration.interface';
