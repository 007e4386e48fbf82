export * from './archival-sink';
