import type { AuditSink } from '../audit/logger.js';
import { runDispatchLoop, type DispatchLoopSummary } from '../dispatch/dispatch-loop.js';
import { sleep } from '../lib/sleep.js';
import { WaitSet } from '../waitset/wait-set.js';
import { ActivitySource } from './activity-source.js';

export const ACTIVATE_GROUP_ID = 0;
export const ACTION_GROUP_ID = 1;

export interface ActivityDemoOptions {
  capacity: number;
  activationIntervalMs: number;
  actionDelayMs: number;
  pollIntervalMs: number;
  // 0 runs until aborted.
  iterations: number;
  auditLogger?: AuditSink;
  write?: (line: string) => void;
}

export interface ActivityDemoContext {
  waitSet: WaitSet;
  source: ActivitySource;
  controller: AbortController;
}

export function createActivityDemo(options: ActivityDemoOptions): ActivityDemoContext {
  const write = options.write ?? ((line: string) => console.log(line));
  const waitSet = new WaitSet({ capacity: options.capacity, audit: options.auditLogger });
  const source = new ActivitySource();

  const attached = [
    source.attachTo(waitSet, 'activate', ACTIVATE_GROUP_ID, (origin) => {
      write(`activated with code: ${origin.getActivationCode()}`);
    }),
    source.attachTo(waitSet, 'performAction', ACTION_GROUP_ID, () => {
      write('action performed');
    })
  ];

  for (const result of attached) {
    if (!result.ok) {
      source.dispose();
      waitSet.close();
      throw result.error;
    }
  }

  return { waitSet, source, controller: new AbortController() };
}

export async function runActivityDemo(
  context: ActivityDemoContext,
  options: ActivityDemoOptions
): Promise<DispatchLoopSummary> {
  const { waitSet, source, controller } = context;
  const expectedResets = options.iterations > 0 ? options.iterations * 2 : Number.POSITIVE_INFINITY;
  let resets = 0;

  const consumer = runDispatchLoop(waitSet, {
    signal: controller.signal,
    pollIntervalMs: options.pollIntervalMs,
    auditLogger: options.auditLogger,
    reset: (state) => {
      state
        .originAs(ActivitySource)
        ?.reset(state.groupId === ACTIVATE_GROUP_ID ? 'activate' : 'performAction');

      resets += 1;
      if (resets >= expectedResets) {
        controller.abort();
      }
    }
  }).catch((error: unknown) => {
    controller.abort();
    throw error;
  });

  const [summary] = await Promise.all([consumer, produce(source, options, controller.signal)]);
  return summary;
}

// Origins detach before the wait-set closes.
export function disposeActivityDemo(context: ActivityDemoContext): void {
  context.controller.abort();
  context.source.dispose();
  context.waitSet.close();
}

async function produce(
  source: ActivitySource,
  options: ActivityDemoOptions,
  signal: AbortSignal
): Promise<void> {
  for (let round = 1; options.iterations === 0 || round <= options.iterations; round += 1) {
    if (!(await sleep(options.activationIntervalMs, signal))) {
      return;
    }
    source.activate(round);

    if (!(await sleep(options.actionDelayMs, signal))) {
      return;
    }
    source.performAction();
  }
}
