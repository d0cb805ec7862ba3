import { BudgetExceededError, InvalidHandleError } from "../errors.js";
import { defaultSchema } from "../schema/load.js";
import { TraceSink } from "../trace.js";
import type { SchemaDatabase } from "../schema/database.js";
import type { ArenaNode } from "../tree/types.js";
import type { ArenaBudgets, ArenaOptions, InvalidHandleReason } from "../../public/types.js";
import { NodeHandle } from "./handle.js";

let lastArenaId = 0;

// Never wraps: a reused id would let a stale handle resolve in an unrelated arena.
function nextArenaId(): number {
  lastArenaId += 1;
  return lastArenaId;
}

/** Copies `node` so later changes to the caller's arrays cannot reach the stored node. */
function freezeNode(node: ArenaNode): ArenaNode {
  switch (node.kind) {
    case "element":
      return Object.freeze({
        ...node,
        attributes: Object.freeze(node.attributes.map((attribute) => Object.freeze({ ...attribute }))),
        children: Object.freeze([...node.children])
      });
    case "fragment":
      return Object.freeze({ ...node, children: Object.freeze([...node.children]) });
    case "text":
      return Object.freeze({ ...node });
    case "preserialized": {
      const { html, content } = node.fragment;
      return Object.freeze({
        ...node,
        fragment: Object.freeze({
          html,
          content: Object.freeze({ ...content, tagNames: Object.freeze([...content.tagNames]) })
        })
      });
    }
  }
}

/**
 * Append-only node store. Nodes are never freed one by one: `reset()` drops them all
 * and bumps the generation so every handle issued before becomes stale.
 *
 * Handles from another arena resolve only after that arena was registered with
 * `link()`. The link keeps the source alive for as long as this arena holds it and is
 * dropped on reset.
 */
export class Arena {
  readonly id: number;
  readonly schema: SchemaDatabase;
  readonly validate: boolean;
  readonly traceConstruction: boolean;
  readonly trace: TraceSink;
  readonly #budgets: ArenaBudgets | undefined;
  readonly #nodes: ArenaNode[] = [];
  readonly #links = new Set<Arena>();
  #generation = 0;

  constructor(options: ArenaOptions = {}, sink?: TraceSink) {
    this.id = nextArenaId();
    this.schema = options.schema ?? defaultSchema();
    this.validate = options.validate ?? true;
    this.traceConstruction = options.traceConstruction ?? false;
    this.trace = sink ?? new TraceSink(options.onTrace);
    this.#budgets = options.budgets;
  }

  get generation(): number {
    return this.#generation;
  }

  get size(): number {
    return this.#nodes.length;
  }

  get links(): readonly Arena[] {
    return [...this.#links];
  }

  allocate(node: ArenaNode): NodeHandle {
    const maxNodes = this.#budgets?.maxNodes;
    if (maxNodes !== undefined && this.#nodes.length + 1 > maxNodes) {
      throw new BudgetExceededError({
        code: "BUDGET_EXCEEDED",
        budget: "maxNodes",
        limit: maxNodes,
        actual: this.#nodes.length + 1
      });
    }

    const stored = freezeNode(node);
    if (stored.kind === "element" || stored.kind === "fragment") {
      for (const child of stored.children) {
        this.resolve(child);
      }
    }

    const handle = new NodeHandle(this.id, this.#generation, this.#nodes.length);
    this.#nodes.push(stored);
    return handle;
  }

  resolve(handle: NodeHandle): ArenaNode {
    const owner = this.#findOwner(handle.arenaId, new Set());
    if (!owner) {
      throw this.#invalid(handle, "foreign-arena");
    }

    return owner.#resolveOwn(handle);
  }

  /** True when `handle` was issued by this arena in its current generation. */
  owns(handle: NodeHandle): boolean {
    return (
      handle.arenaId === this.id &&
      handle.generation === this.#generation &&
      handle.slot < this.#nodes.length
    );
  }

  /** True when `resolve(handle)` would succeed. */
  canResolve(handle: NodeHandle): boolean {
    const owner = this.#findOwner(handle.arenaId, new Set());
    return owner !== undefined && owner.owns(handle);
  }

  link(source: Arena): void {
    if (source === this || this.#links.has(source)) {
      return;
    }

    this.#links.add(source);
    this.trace.emit({ kind: "link", arenaId: this.id, sourceArenaId: source.id });
  }

  /** Links `source` and checks that `handle` is live there, so it can be used as a child here. */
  graft(source: Arena, handle: NodeHandle): NodeHandle {
    this.link(source);
    this.resolve(handle);
    return handle;
  }

  reset(): void {
    const nodes = this.#nodes.length;
    this.#nodes.length = 0;
    this.#links.clear();
    this.#generation += 1;
    this.trace.emit({ kind: "reset", arenaId: this.id, generation: this.#generation, nodes });
  }

  #resolveOwn(handle: NodeHandle): ArenaNode {
    if (handle.generation !== this.#generation) {
      throw this.#invalid(handle, "stale-generation");
    }

    const node = this.#nodes[handle.slot];
    if (node === undefined) {
      throw this.#invalid(handle, "out-of-range");
    }
    return node;
  }

  #findOwner(arenaId: number, seen: Set<Arena>): Arena | undefined {
    if (arenaId === this.id) {
      return this;
    }

    seen.add(this);
    for (const linked of this.#links) {
      if (seen.has(linked)) {
        continue;
      }
      const owner = linked.#findOwner(arenaId, seen);
      if (owner) {
        return owner;
      }
    }
    return undefined;
  }

  #invalid(handle: NodeHandle, reason: InvalidHandleReason): InvalidHandleError {
    return new InvalidHandleError({
      code: "INVALID_HANDLE",
      reason,
      handle: handle.toString(),
      arenaId: this.id
    });
  }
}
