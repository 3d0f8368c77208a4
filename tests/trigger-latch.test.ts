import { describe, expect, it } from 'vitest';

import { TriggerLatch } from '../src/waitset/trigger-latch.js';
import { WaitSet } from '../src/waitset/wait-set.js';

describe('TriggerLatch', () => {
  it('sets the latch and wakes the waiter on trigger', async () => {
    const waitSet = new WaitSet({ capacity: 1 });
    const latch = new TriggerLatch();
    const attached = latch.attach(waitSet, { origin: latch, groupId: 5 });
    expect(attached.ok).toBe(true);

    const pending = waitSet.wait();
    latch.trigger();

    const states = await pending;
    expect(latch.isSet()).toBe(true);
    expect(states.map((state) => state.groupId)).toEqual([5]);
    expect(states[0]?.originAs(TriggerLatch)).toBe(latch);
  });

  it('stops reporting once reset', async () => {
    const waitSet = new WaitSet({ capacity: 1 });
    const latch = new TriggerLatch();
    latch.attach(waitSet, { origin: latch, groupId: 0 });

    latch.trigger();
    latch.reset();

    expect(latch.isSet()).toBe(false);
    await expect(waitSet.timedWait(10)).resolves.toEqual({ status: 'timeout' });
  });

  it('clears its handle on detach', () => {
    const waitSet = new WaitSet({ capacity: 1 });
    const latch = new TriggerLatch();
    latch.attach(waitSet, { origin: latch, groupId: 0 });
    const handle = latch.handle;

    expect(latch.detach()).toBe(true);
    expect(latch.isAttached).toBe(false);
    expect(latch.handle).toBeNull();
    expect(latch.detach()).toBe(false);
    expect(handle && waitSet.isRegistered(handle)).toBe(false);
    expect(waitSet.size).toBe(0);
  });

  it('clears its handle when the wait-set closes first', () => {
    const waitSet = new WaitSet({ capacity: 1 });
    const latch = new TriggerLatch();
    latch.attach(waitSet, { origin: latch, groupId: 0 });

    waitSet.close();

    expect(latch.isAttached).toBe(false);
    expect(latch.detach()).toBe(false);
    expect(() => latch.trigger()).not.toThrow();
    expect(latch.isSet()).toBe(true);
  });

  it('refuses a second attach while attached', () => {
    const waitSet = new WaitSet({ capacity: 2 });
    const latch = new TriggerLatch();
    latch.attach(waitSet, { origin: latch, groupId: 0 });

    expect(() => latch.attach(waitSet, { origin: latch, groupId: 1 })).toThrow(
      /already attached/
    );
    expect(waitSet.size).toBe(1);
  });

  it('stays detached when the wait-set is full', () => {
    const waitSet = new WaitSet({ capacity: 1 });
    const first = new TriggerLatch();
    const second = new TriggerLatch();
    first.attach(waitSet, { origin: first, groupId: 0 });

    const result = second.attach(waitSet, { origin: second, groupId: 1 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('CAPACITY_EXCEEDED');
    }
    expect(second.isAttached).toBe(false);
  });

  it('can reattach after detaching', () => {
    const waitSet = new WaitSet({ capacity: 1 });
    const latch = new TriggerLatch();
    latch.attach(waitSet, { origin: latch, groupId: 0 });
    latch.detach();

    const result = latch.attach(waitSet, { origin: latch, groupId: 3 });

    expect(result.ok).toBe(true);
    expect(waitSet.list()).toEqual([{ index: 0, groupId: 3 }]);
  });
});
