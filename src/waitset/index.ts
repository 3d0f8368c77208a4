export { WaitSetError, type AcquireResult, type WaitSetErrorCode } from './errors.js';
export type { TriggerHandle } from './handle.js';
export { DEFAULT_WAITSET_CAPACITY, MAX_WAITSET_CAPACITY } from './schema.js';
export { TriggerLatch, type TriggerLatchAttachOptions } from './trigger-latch.js';
export { TriggerState } from './trigger-state.js';
export {
  WaitSet,
  type DispatchCallback,
  type InvalidationHook,
  type TimedWaitResult,
  type TriggerListing,
  type TriggerPredicate,
  type WaitOptions,
  type WaitSetOptions
} from './wait-set.js';
export { WakeSignal, type WakeOutcome, type WakeWaitOptions } from './wake-signal.js';
export { runDispatchLoop, type DispatchLoopOptions, type DispatchLoopSummary } from '../dispatch/dispatch-loop.js';
export { AuditLogger, type AuditEvent, type AuditLoggerOptions, type AuditSink } from '../audit/logger.js';
