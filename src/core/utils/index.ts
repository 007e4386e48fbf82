export * from './assert-never';
export * from './async';
export * from './hooks';
export * from './stable-stringify';
export * from './keyed-mutex';
