import { PoolError } from "../errors.js";
import { TraceSink } from "../trace.js";
import type { ArenaOptions, PoolOptions } from "../../public/types.js";
import { Arena } from "./arena.js";

const DEFAULT_MAX_IDLE = 16;
const DEFAULT_MAX_GENERATIONS = 20;

/**
 * Hands out reset arenas and takes them back. All arenas created by one pool share its
 * options and trace sink. An arena that has been reset `maxGenerations` times is dropped
 * on release instead of being kept.
 */
export class ArenaPool {
  readonly #arenaOptions: ArenaOptions;
  readonly #maxIdle: number;
  readonly #maxGenerations: number;
  readonly #sink: TraceSink;
  readonly #idle: Arena[] = [];
  readonly #leased = new Set<Arena>();

  constructor(options: PoolOptions = {}) {
    const { maxIdle, maxGenerations, ...arenaOptions } = options;
    this.#arenaOptions = arenaOptions;
    this.#maxIdle = maxIdle ?? DEFAULT_MAX_IDLE;
    this.#maxGenerations = maxGenerations ?? DEFAULT_MAX_GENERATIONS;
    this.#sink = new TraceSink(options.onTrace);
  }

  get idleCount(): number {
    return this.#idle.length;
  }

  get leasedCount(): number {
    return this.#leased.size;
  }

  acquire(): Arena {
    const reused = this.#idle.pop();
    const arena = reused ?? new Arena(this.#arenaOptions, this.#sink);
    this.#leased.add(arena);
    this.#sink.emit({ kind: "pool-acquire", arenaId: arena.id, reused: reused !== undefined });
    return arena;
  }

  release(arena: Arena): void {
    if (!this.#leased.delete(arena)) {
      throw new PoolError({ code: "ARENA_NOT_LEASED", arenaId: arena.id });
    }

    arena.reset();

    if (arena.generation >= this.#maxGenerations) {
      this.#sink.emit({
        kind: "pool-release",
        arenaId: arena.id,
        pooled: false,
        reason: "generation-limit"
      });
      return;
    }

    if (this.#idle.length >= this.#maxIdle) {
      this.#sink.emit({ kind: "pool-release", arenaId: arena.id, pooled: false, reason: "pool-full" });
      return;
    }

    this.#idle.push(arena);
    this.#sink.emit({ kind: "pool-release", arenaId: arena.id, pooled: true, reason: "pooled" });
  }

  /** Runs `work` with a leased arena and releases it afterwards, also when `work` throws. */
  withArena<T>(work: (arena: Arena) => T): T {
    const arena = this.acquire();
    try {
      return work(arena);
    } finally {
      this.release(arena);
    }
  }

  async withArenaAsync<T>(work: (arena: Arena) => Promise<T>): Promise<T> {
    const arena = this.acquire();
    try {
      return await work(arena);
    } finally {
      this.release(arena);
    }
  }
}
