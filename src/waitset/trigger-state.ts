import type { TriggerHandle } from './handle.js';

export interface TriggerSnapshot {
  handle: TriggerHandle;
  groupId: number;
  origin: object;
  dispatch?: () => void;
}

type OriginType<T> = new (...args: never[]) => T;

export class TriggerState {
  readonly handle: TriggerHandle;
  readonly groupId: number;
  readonly origin: object;
  private readonly dispatch: (() => void) | undefined;

  constructor(snapshot: TriggerSnapshot) {
    this.handle = snapshot.handle;
    this.groupId = snapshot.groupId;
    this.origin = snapshot.origin;
    this.dispatch = snapshot.dispatch;
  }

  get hasCallback(): boolean {
    return this.dispatch !== undefined;
  }

  originAs<T extends object>(type: OriginType<T>): T | undefined {
    const origin = this.origin;
    if (origin instanceof type) {
      return origin;
    }

    return undefined;
  }

  doesOriginateFrom(candidate: object): boolean {
    return this.origin === candidate;
  }

  invoke(): boolean {
    if (!this.dispatch) {
      return false;
    }

    this.dispatch();
    return true;
  }
}
