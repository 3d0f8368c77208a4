import { describe, expect, it } from 'vitest';

import { WakeSignal } from '../src/waitset/wake-signal.js';

describe('WakeSignal', () => {
  it('wakes every current waiter', async () => {
    const wake = new WakeSignal();
    const first = wake.wait();
    const second = wake.wait();
    expect(wake.waiting).toBe(2);

    wake.notify();

    await expect(Promise.all([first, second])).resolves.toEqual(['notified', 'notified']);
    expect(wake.waiting).toBe(0);
  });

  it('does not remember a notify without waiters', async () => {
    const wake = new WakeSignal();
    wake.notify();

    await expect(wake.wait({ timeoutMs: 10 })).resolves.toBe('timeout');
    expect(wake.waiting).toBe(0);
  });

  it('resolves timeout immediately for non-positive timeouts', async () => {
    const wake = new WakeSignal();
    await expect(wake.wait({ timeoutMs: 0 })).resolves.toBe('timeout');
    expect(wake.waiting).toBe(0);
  });

  it('resolves aborted when the signal aborts', async () => {
    const wake = new WakeSignal();
    const controller = new AbortController();
    const pending = wake.wait({ signal: controller.signal, timeoutMs: 1_000 });

    controller.abort();

    await expect(pending).resolves.toBe('aborted');
    expect(wake.waiting).toBe(0);
  });

  it('resolves aborted for an already aborted signal', async () => {
    const wake = new WakeSignal();
    await expect(wake.wait({ signal: AbortSignal.abort() })).resolves.toBe('aborted');
  });

  it('settles each waiter only once', async () => {
    const wake = new WakeSignal();
    const controller = new AbortController();
    const pending = wake.wait({ signal: controller.signal });

    wake.notify();
    controller.abort();

    await expect(pending).resolves.toBe('notified');
  });
});
