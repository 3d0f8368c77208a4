import { describe, expect, it } from 'vitest';

import { sleep } from '../src/lib/sleep.js';

describe('sleep', () => {
  it('resolves true after the delay', async () => {
    await expect(sleep(1)).resolves.toBe(true);
  });

  it('resolves false when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBe(false);
  });

  it('resolves false for an already aborted signal', async () => {
    await expect(sleep(0, AbortSignal.abort())).resolves.toBe(false);
  });
});
