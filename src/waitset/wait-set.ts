import type { AuditEvent, AuditSink } from '../audit/logger.js';
import { capacityExceeded, waitSetClosed, type AcquireResult } from './errors.js';
import { isIssuedHandle, issueTriggerHandle, type TriggerHandle } from './handle.js';
import { TriggerGroupIdSchema, WaitSetOptionsSchema, WaitTimeoutSchema } from './schema.js';
import { TriggerState } from './trigger-state.js';
import { WakeSignal } from './wake-signal.js';

export type TriggerPredicate = () => boolean;
export type InvalidationHook = (handle: TriggerHandle) => void;
export type DispatchCallback<T extends object> = (origin: T) => void;

export interface WaitSetOptions {
  capacity?: number;
  audit?: AuditSink;
}

export interface WaitOptions {
  signal?: AbortSignal;
}

export type TimedWaitResult =
  | { status: 'triggered'; states: TriggerState[] }
  | { status: 'timeout' }
  | { status: 'cancelled' };

export interface TriggerListing {
  index: number;
  groupId: number;
}

interface TriggerRecord {
  handle: TriggerHandle;
  origin: object;
  predicate: TriggerPredicate;
  invalidationHook: InvalidationHook;
  groupId: number;
  dispatch?: () => void;
}

interface TriggerSlot {
  generation: number;
  record: TriggerRecord | null;
}

let nextWaitSetId = 1;

export class WaitSet {
  readonly capacity: number;
  private readonly id = nextWaitSetId++;
  private readonly slots: TriggerSlot[];
  private readonly wakeSignal = new WakeSignal();
  private readonly audit: AuditSink | undefined;
  private validCount = 0;
  private interruptEpoch = 0;
  private closed = false;

  constructor(options: WaitSetOptions = {}) {
    const settings = WaitSetOptionsSchema.parse({ capacity: options.capacity });
    this.capacity = settings.capacity;
    this.audit = options.audit;
    this.slots = Array.from({ length: this.capacity }, () => ({ generation: 0, record: null }));
  }

  get size(): number {
    return this.validCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  acquire<T extends object>(
    origin: T,
    predicate: TriggerPredicate,
    invalidationHook: InvalidationHook,
    groupId: number,
    dispatch?: DispatchCallback<T>
  ): AcquireResult {
    TriggerGroupIdSchema.parse(groupId);

    if (this.closed) {
      return { ok: false, error: waitSetClosed() };
    }

    const index = this.slots.findIndex((slot) => slot.record === null);
    const slot = index === -1 ? undefined : this.slots[index];
    if (!slot) {
      this.emit({
        action: 'waitset.acquire',
        result: 'denied',
        details: { groupId, capacity: this.capacity }
      });
      return { ok: false, error: capacityExceeded(this.capacity) };
    }

    const handle = issueTriggerHandle(this.id, index, slot.generation);
    slot.record = {
      handle,
      origin,
      predicate,
      invalidationHook,
      groupId,
      ...(dispatch ? { dispatch: () => dispatch(origin) } : {})
    };
    this.validCount += 1;

    this.emit({
      action: 'waitset.acquire',
      target: handle.toString(),
      result: 'success',
      details: { groupId }
    });
    return { ok: true, handle };
  }

  // Frees the slot before the hook runs. Stale or foreign handles return false.
  release(handle: TriggerHandle): boolean {
    const slot = this.lookupSlot(handle);
    const record = slot?.record;
    if (!slot || !record) {
      return false;
    }

    slot.record = null;
    slot.generation += 1;
    this.validCount -= 1;

    this.emit({
      action: 'waitset.release',
      target: handle.toString(),
      result: 'success',
      details: { groupId: record.groupId }
    });

    record.invalidationHook(handle);
    return true;
  }

  signal(handle: TriggerHandle): boolean {
    if (this.closed || !this.lookupSlot(handle)) {
      return false;
    }

    this.wakeSignal.notify();
    return true;
  }

  isRegistered(handle: TriggerHandle): boolean {
    return this.lookupSlot(handle) !== null;
  }

  list(): TriggerListing[] {
    const listing: TriggerListing[] = [];
    this.slots.forEach((slot, index) => {
      if (slot.record) {
        listing.push({ index, groupId: slot.record.groupId });
      }
    });
    return listing;
  }

  /**
   * Resolves the satisfied triggers in slot order. An empty array means the
   * wait was cancelled by `interrupt()`, `close()` or the abort signal.
   */
  async wait(options: WaitOptions = {}): Promise<TriggerState[]> {
    const outcome = await this.waitUntil(undefined, options.signal);
    return outcome.status === 'triggered' ? outcome.states : [];
  }

  async timedWait(timeoutMs: number, options: WaitOptions = {}): Promise<TimedWaitResult> {
    WaitTimeoutSchema.parse(timeoutMs);
    return this.waitUntil(performance.now() + timeoutMs, options.signal);
  }

  interrupt(): void {
    this.interruptEpoch += 1;
    this.wakeSignal.notify();
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.interrupt();

    let released = 0;
    const failures: unknown[] = [];
    for (const slot of this.slots) {
      const record = slot.record;
      if (!record) {
        continue;
      }

      try {
        this.release(record.handle);
      } catch (error) {
        failures.push(error);
      }
      released += 1;
    }

    this.emit({
      action: 'waitset.close',
      result: failures.length > 0 ? 'error' : 'success',
      details: { released, failedHooks: failures.length }
    });

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} invalidation hooks failed during close.`);
    }
  }

  private async waitUntil(
    deadline: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<TimedWaitResult> {
    const epoch = this.interruptEpoch;

    while (true) {
      if (this.closed || epoch !== this.interruptEpoch || signal?.aborted) {
        return { status: 'cancelled' };
      }

      const states = this.collectSatisfied();
      if (states.length > 0) {
        return { status: 'triggered', states };
      }

      let timeoutMs: number | undefined;
      if (deadline !== undefined) {
        timeoutMs = deadline - performance.now();
        if (timeoutMs <= 0) {
          return { status: 'timeout' };
        }
      }

      await this.wakeSignal.wait({ timeoutMs, signal });
    }
  }

  private collectSatisfied(): TriggerState[] {
    const states: TriggerState[] = [];
    for (const slot of this.slots) {
      const record = slot.record;
      if (record && record.predicate()) {
        states.push(new TriggerState(record));
      }
    }

    // A predicate may release a trigger that was already collected.
    return states.filter((state) => this.isRegistered(state.handle));
  }

  private lookupSlot(handle: TriggerHandle): TriggerSlot | null {
    if (!isIssuedHandle(handle) || handle.waitSetId !== this.id) {
      return null;
    }

    const slot = this.slots.at(handle.index);
    if (!slot?.record || slot.generation !== handle.generation) {
      return null;
    }

    return slot;
  }

  private emit(event: AuditEvent): void {
    if (!this.audit) {
      return;
    }

    this.audit.log(event).catch((error: unknown) => {
      console.error('[trigger-waitset] audit write failed:', error);
    });
  }
}
