import type { Arena } from "../arena/arena.js";
import { type NodeHandle, isNodeHandle } from "../arena/handle.js";
import { HtmlBuilder } from "./build.js";
import type { ArenaNode, NodeDescription } from "./types.js";

export type Replacement = NodeHandle | NodeDescription;

export type TransformResult =
  | { readonly kind: "keep" }
  | { readonly kind: "replace"; readonly node: Replacement }
  | { readonly kind: "remove" }
  | { readonly kind: "splice"; readonly nodes: readonly Replacement[] };

/** Returning `undefined` is the same as `keep()`. */
export type TransformVisitor = (
  node: ArenaNode,
  handle: NodeHandle,
  depth: number
) => TransformResult | undefined;

export interface TransformOptions {
  /** Arena receiving new nodes. Defaults to the source arena; any other arena is linked to the source. */
  readonly into?: Arena;
}

const KEEP: TransformResult = Object.freeze({ kind: "keep" });
const REMOVE: TransformResult = Object.freeze({ kind: "remove" });

export function keep(): TransformResult {
  return KEEP;
}

export function replace(node: Replacement): TransformResult {
  return { kind: "replace", node };
}

export function remove(): TransformResult {
  return REMOVE;
}

export function splice(...nodes: Replacement[]): TransformResult {
  return { kind: "splice", nodes };
}

interface TransformState {
  readonly source: Arena;
  readonly builder: HtmlBuilder;
  readonly visitor: TransformVisitor;
}

function materialize(state: TransformState, replacement: Replacement): NodeHandle {
  return isNodeHandle(replacement) ? replacement : state.builder.build(replacement);
}

function descend(state: TransformState, node: ArenaNode, handle: NodeHandle, depth: number): NodeHandle {
  if (node.kind !== "element" && node.kind !== "fragment") {
    return handle;
  }

  let changed = false;
  const children: NodeHandle[] = [];
  for (const child of node.children) {
    const replaced = visit(state, child, depth + 1);
    if (replaced.length !== 1 || replaced[0] !== child) {
      changed = true;
    }
    children.push(...replaced);
  }

  if (!changed) {
    return handle;
  }

  if (node.kind === "element") {
    return state.builder.withChildren(node, children);
  }
  return state.builder.arena.allocate({ kind: "fragment", children });
}

function visit(state: TransformState, handle: NodeHandle, depth: number): readonly NodeHandle[] {
  const node = state.source.resolve(handle);
  const result = state.visitor(node, handle, depth) ?? KEEP;

  switch (result.kind) {
    case "keep":
      return [descend(state, node, handle, depth)];
    case "replace":
      if (result.node === handle) {
        return [descend(state, node, handle, depth)];
      }
      return [materialize(state, result.node)];
    case "remove":
      return [];
    case "splice":
      return result.nodes.map((replacement) => materialize(state, replacement));
  }
}

/**
 * Rebuilds the tree under `root` according to `visitor`, never touching existing nodes.
 *
 * Subtrees the visitor keeps and whose descendants are all kept come back as the very
 * same handles. An ancestor of a changed node is reallocated with its remaining children
 * reused by handle. Replacement nodes are not visited.
 */
export function transform(
  source: Arena,
  root: NodeHandle,
  visitor: TransformVisitor,
  options: TransformOptions = {}
): NodeHandle {
  const destination = options.into ?? source;
  destination.link(source);

  const state: TransformState = { source, builder: new HtmlBuilder(destination), visitor };
  const result = visit(state, root, 0);
  const [only] = result;
  if (result.length === 1 && only) {
    return only;
  }
  return destination.allocate({ kind: "fragment", children: [...result] });
}

/** `fn` returns a replacement, or `undefined` to keep the node and continue into its children. */
export function map(
  source: Arena,
  root: NodeHandle,
  fn: (node: ArenaNode, handle: NodeHandle) => Replacement | undefined,
  options?: TransformOptions
): NodeHandle {
  return transform(
    source,
    root,
    (node, handle) => {
      const replacement = fn(node, handle);
      return replacement === undefined ? KEEP : replace(replacement);
    },
    options
  );
}

/** Drops every node (and its subtree) for which `predicate` is false. A dropped root yields an empty fragment. */
export function filter(
  source: Arena,
  root: NodeHandle,
  predicate: (node: ArenaNode, handle: NodeHandle) => boolean,
  options?: TransformOptions
): NodeHandle {
  return transform(source, root, (node, handle) => (predicate(node, handle) ? KEEP : REMOVE), options);
}

export function identity(source: Arena, root: NodeHandle, options?: TransformOptions): NodeHandle {
  return transform(source, root, () => KEEP, options);
}
