// A handle names a slot plus the generation that slot had at acquire. A
// release bumps the generation, so every copy of an older handle goes stale.
export interface TriggerHandle {
  readonly waitSetId: number;
  readonly index: number;
  readonly generation: number;
  equals(other: TriggerHandle | null | undefined): boolean;
  toString(): string;
}

const issuedHandles = new WeakSet<TriggerHandle>();

class IssuedTriggerHandle implements TriggerHandle {
  readonly waitSetId: number;
  readonly index: number;
  readonly generation: number;

  constructor(waitSetId: number, index: number, generation: number) {
    this.waitSetId = waitSetId;
    this.index = index;
    this.generation = generation;
    Object.freeze(this);
  }

  equals(other: TriggerHandle | null | undefined): boolean {
    if (!other) {
      return false;
    }

    return (
      other.waitSetId === this.waitSetId &&
      other.index === this.index &&
      other.generation === this.generation
    );
  }

  toString(): string {
    return `trigger#${this.waitSetId}.${this.index}@${this.generation}`;
  }
}

export function issueTriggerHandle(waitSetId: number, index: number, generation: number): TriggerHandle {
  const handle = new IssuedTriggerHandle(waitSetId, index, generation);
  issuedHandles.add(handle);
  return handle;
}

export function isIssuedHandle(handle: TriggerHandle): boolean {
  return issuedHandles.has(handle);
}
