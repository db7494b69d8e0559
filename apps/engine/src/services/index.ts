export { RedisBroadcaster, DEFAULT_EVENTS_CHANNEL } from './broadcaster';
export type { BroadcastEnvelope } from './broadcaster';
export { DialogRecovery } from './recovery';
export type { RecoveredDialog, RecoveryOptions } from './recovery';
