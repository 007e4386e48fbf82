export { SswCarrierAdapter } from './ssw/ssw-carrier.adapter';
export type { SswCarrierAdapterOptions } from './ssw/ssw-carrier.adapter';
export { GenericCarrierAdapter } from './generic/generic-carrier.adapter';
export { parseCarrierTimestamp, readString } from './payload-readers';
