import type { TriggerHandle } from './handle.js';

export type WaitSetErrorCode = 'CAPACITY_EXCEEDED' | 'WAITSET_CLOSED';

export class WaitSetError extends Error {
  readonly code: WaitSetErrorCode;

  constructor(code: WaitSetErrorCode, message: string) {
    super(message);
    this.name = 'WaitSetError';
    this.code = code;
  }
}

export type AcquireResult =
  | { ok: true; handle: TriggerHandle }
  | { ok: false; error: WaitSetError };

export function capacityExceeded(capacity: number): WaitSetError {
  return new WaitSetError('CAPACITY_EXCEEDED', `Wait-set capacity reached (${capacity}).`);
}

export function waitSetClosed(): WaitSetError {
  return new WaitSetError('WAITSET_CLOSED', 'Wait-set is closed.');
}
