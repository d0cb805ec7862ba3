import type { FragmentCacheOptions, SerializedFragment } from "../../public/types.js";

const DEFAULT_MAX_ENTRIES = 256;

/**
 * Keeps rendered fragments by key so that a subtree shared by many pages is built and
 * serialized once. Fragments are immutable and carry no handles, so one cache can serve
 * every arena. The least recently used entry is evicted past `maxEntries`.
 */
export class FragmentCache {
  readonly maxEntries: number;
  readonly #entries = new Map<string, SerializedFragment>();
  #hits = 0;
  #misses = 0;

  constructor(options: FragmentCacheOptions = {}) {
    const requested = options.maxEntries;
    this.maxEntries =
      requested !== undefined && Number.isFinite(requested) ? Math.max(1, Math.floor(requested)) : DEFAULT_MAX_ENTRIES;
  }

  get size(): number {
    return this.#entries.size;
  }

  get stats(): { readonly hits: number; readonly misses: number } {
    return { hits: this.#hits, misses: this.#misses };
  }

  get(key: string): SerializedFragment | undefined {
    const fragment = this.#entries.get(key);
    if (fragment === undefined) {
      return undefined;
    }
    this.#entries.delete(key);
    this.#entries.set(key, fragment);
    return fragment;
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  set(key: string, fragment: SerializedFragment): void {
    this.#entries.delete(key);
    this.#entries.set(key, fragment);
    while (this.#entries.size > this.maxEntries) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.#entries.delete(oldest.value);
    }
  }

  getOrRender(key: string, render: () => SerializedFragment): SerializedFragment {
    const cached = this.get(key);
    if (cached !== undefined) {
      this.#hits += 1;
      return cached;
    }
    this.#misses += 1;
    const fragment = render();
    this.set(key, fragment);
    return fragment;
  }

  delete(key: string): boolean {
    return this.#entries.delete(key);
  }

  clear(): void {
    this.#entries.clear();
  }
}
