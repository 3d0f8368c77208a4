import type { AcquireResult } from '../waitset/errors.js';
import { TriggerLatch } from '../waitset/trigger-latch.js';
import type { DispatchCallback, WaitSet } from '../waitset/wait-set.js';

export type ActivityEvent = 'activate' | 'performAction';

export class ActivitySource {
  private activationCode = 0;
  private readonly latches: Record<ActivityEvent, TriggerLatch> = {
    activate: new TriggerLatch(),
    performAction: new TriggerLatch()
  };

  activate(activationCode: number): void {
    this.activationCode = activationCode;
    this.latches.activate.trigger();
  }

  performAction(): void {
    this.latches.performAction.trigger();
  }

  getActivationCode(): number {
    return this.activationCode;
  }

  isActivated(): boolean {
    return this.latches.activate.isSet();
  }

  hasPerformedAction(): boolean {
    return this.latches.performAction.isSet();
  }

  isAttached(event: ActivityEvent): boolean {
    return this.latches[event].isAttached;
  }

  reset(event?: ActivityEvent): void {
    if (event) {
      this.latches[event].reset();
      return;
    }

    this.latches.activate.reset();
    this.latches.performAction.reset();
  }

  attachTo(
    waitSet: WaitSet,
    event: ActivityEvent,
    groupId: number,
    callback?: DispatchCallback<ActivitySource>
  ): AcquireResult {
    return this.latches[event].attach(waitSet, { origin: this, groupId, dispatch: callback });
  }

  detach(event: ActivityEvent): boolean {
    return this.latches[event].detach();
  }

  dispose(): void {
    this.detach('activate');
    this.detach('performAction');
  }
}
