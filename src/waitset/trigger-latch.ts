import type { AcquireResult } from './errors.js';
import type { TriggerHandle } from './handle.js';
import type { DispatchCallback, WaitSet } from './wait-set.js';

export interface TriggerLatchAttachOptions<T extends object> {
  origin: T;
  groupId: number;
  dispatch?: DispatchCallback<T>;
}

export class TriggerLatch {
  private latched = false;
  private attachment: { waitSet: WaitSet; handle: TriggerHandle } | null = null;

  get isAttached(): boolean {
    return this.attachment !== null;
  }

  get handle(): TriggerHandle | null {
    return this.attachment?.handle ?? null;
  }

  isSet(): boolean {
    return this.latched;
  }

  attach<T extends object>(waitSet: WaitSet, options: TriggerLatchAttachOptions<T>): AcquireResult {
    if (this.attachment) {
      throw new Error(`Trigger latch is already attached (${this.attachment.handle.toString()}).`);
    }

    const result = waitSet.acquire(
      options.origin,
      () => this.latched,
      (handle) => this.invalidate(handle),
      options.groupId,
      options.dispatch
    );
    if (result.ok) {
      this.attachment = { waitSet, handle: result.handle };
    }

    return result;
  }

  trigger(): void {
    this.latched = true;
    if (this.attachment) {
      this.attachment.waitSet.signal(this.attachment.handle);
    }
  }

  reset(): void {
    this.latched = false;
  }

  detach(): boolean {
    if (!this.attachment) {
      return false;
    }

    return this.attachment.waitSet.release(this.attachment.handle);
  }

  private invalidate(handle: TriggerHandle): void {
    if (this.attachment?.handle.equals(handle)) {
      this.attachment = null;
    }
  }
}
