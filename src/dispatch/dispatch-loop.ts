import type { AuditSink } from '../audit/logger.js';
import type { TriggerState } from '../waitset/trigger-state.js';
import type { TimedWaitResult, WaitSet } from '../waitset/wait-set.js';

export interface DispatchLoopOptions {
  reset: (state: TriggerState) => void;
  signal?: AbortSignal;
  pollIntervalMs?: number;
  auditLogger?: AuditSink;
  onError?: 'stop' | 'continue';
}

export interface DispatchLoopSummary {
  batches: number;
  dispatched: number;
  failed: number;
}

export async function runDispatchLoop(
  waitSet: WaitSet,
  options: DispatchLoopOptions
): Promise<DispatchLoopSummary> {
  const summary: DispatchLoopSummary = { batches: 0, dispatched: 0, failed: 0 };
  const signal = options.signal;

  while (!signal?.aborted && !waitSet.isClosed) {
    const outcome = await nextBatch(waitSet, options.pollIntervalMs, signal);
    if (outcome.status === 'timeout') {
      continue;
    }
    if (outcome.status === 'cancelled') {
      break;
    }

    summary.batches += 1;
    for (const state of outcome.states) {
      // An earlier callback in this batch may have detached the trigger.
      if (!waitSet.isRegistered(state.handle)) {
        continue;
      }

      try {
        if (state.invoke()) {
          summary.dispatched += 1;
        }
      } catch (error) {
        summary.failed += 1;
        await recordFailure(options.auditLogger, state, error);

        if (options.onError !== 'continue') {
          throw error;
        }
      } finally {
        options.reset(state);
      }
    }
  }

  return summary;
}

async function nextBatch(
  waitSet: WaitSet,
  pollIntervalMs: number | undefined,
  signal: AbortSignal | undefined
): Promise<TimedWaitResult> {
  if (pollIntervalMs !== undefined) {
    return waitSet.timedWait(pollIntervalMs, { signal });
  }

  const states = await waitSet.wait({ signal });
  return states.length > 0 ? { status: 'triggered', states } : { status: 'cancelled' };
}

async function recordFailure(
  auditLogger: AuditSink | undefined,
  state: TriggerState,
  error: unknown
): Promise<void> {
  if (!auditLogger) {
    return;
  }

  try {
    await auditLogger.log({
      action: 'waitset.dispatch',
      target: state.handle.toString(),
      result: 'error',
      details: {
        groupId: state.groupId,
        message: error instanceof Error ? error.message : String(error)
      }
    });
  } catch (auditError) {
    console.error('[trigger-waitset] audit write failed:', auditError);
  }
}
