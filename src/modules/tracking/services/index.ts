export { TrackingEngineService } from './tracking-engine.service';
export { ReplayProcessor } from './replay.processor';
export { InvocationRecoveryProcessor } from './invocation-recovery.processor';
export { ArchivalProcessor } from './archival.processor';
