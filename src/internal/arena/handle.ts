/**
 * Reference to one slot of one arena generation.
 *
 * An arena hands out exactly one handle object per slot, so two handles name the
 * same node iff they are `===`. The handle owns nothing; resolving it after the
 * arena was reset fails with `InvalidHandleError`.
 */
export class NodeHandle {
  readonly arenaId: number;
  readonly generation: number;
  readonly slot: number;

  constructor(arenaId: number, generation: number, slot: number) {
    this.arenaId = arenaId;
    this.generation = generation;
    this.slot = slot;
    Object.freeze(this);
  }

  toString(): string {
    return `${String(this.arenaId)}.${String(this.generation)}#${String(this.slot)}`;
  }
}

export function isNodeHandle(value: unknown): value is NodeHandle {
  return value instanceof NodeHandle;
}
