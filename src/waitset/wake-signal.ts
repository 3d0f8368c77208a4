export type WakeOutcome = 'notified' | 'timeout' | 'aborted';

export interface WakeWaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

// setTimeout clamps anything above this to 1ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

// Wakes are not remembered: a waiter must re-check its condition after each one.
export class WakeSignal {
  private readonly waiters = new Set<(outcome: WakeOutcome) => void>();

  get waiting(): number {
    return this.waiters.size;
  }

  notify(): void {
    const current = [...this.waiters];
    this.waiters.clear();
    for (const wake of current) {
      wake('notified');
    }
  }

  wait(options: WakeWaitOptions = {}): Promise<WakeOutcome> {
    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      return Promise.resolve('aborted');
    }

    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve('timeout');
    }

    return new Promise<WakeOutcome>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        settle('aborted');
      };

      const settle = (outcome: WakeOutcome): void => {
        if (settled) {
          return;
        }
        settled = true;

        this.waiters.delete(settle);
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      this.waiters.add(settle);

      if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          settle('timeout');
        }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
      }

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
