import type { Arena } from "../arena/arena.js";
import type { NodeHandle } from "../arena/handle.js";
import { htmlToText } from "../parse5-runtime.js";
import type { ArenaNode, ElementNode, ElementVisitor, NodeVisitor } from "./types.js";

export interface VisitedNode {
  readonly node: ArenaNode;
  readonly handle: NodeHandle;
  readonly depth: number;
}

/** Depth-first, pre-order. Fragment members sit one level below their fragment. */
export function* iterateTree(arena: Arena, root: NodeHandle): Generator<VisitedNode> {
  const stack: Array<{ readonly handle: NodeHandle; readonly depth: number }> = [{ handle: root, depth: 0 }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) {
      break;
    }
    const node = arena.resolve(entry.handle);
    yield { node, handle: entry.handle, depth: entry.depth };

    if (node.kind === "element" || node.kind === "fragment") {
      for (let index = node.children.length - 1; index >= 0; index -= 1) {
        const child = node.children[index];
        if (child) {
          stack.push({ handle: child, depth: entry.depth + 1 });
        }
      }
    }
  }
}

export function walk(arena: Arena, root: NodeHandle, visitor: NodeVisitor): void {
  for (const { node, handle, depth } of iterateTree(arena, root)) {
    visitor(node, handle, depth);
  }
}

export function walkElements(arena: Arena, root: NodeHandle, visitor: ElementVisitor): void {
  for (const { node, handle, depth } of iterateTree(arena, root)) {
    if (node.kind === "element") {
      visitor(node, handle, depth);
    }
  }
}

export function findAllByTagName(arena: Arena, root: NodeHandle, tagName: string): NodeHandle[] {
  const found: NodeHandle[] = [];
  walkElements(arena, root, (node, handle) => {
    if (node.tagName === tagName) {
      found.push(handle);
    }
  });
  return found;
}

export function countNodes(arena: Arena, root: NodeHandle): number {
  let count = 0;
  for (const _ of iterateTree(arena, root)) {
    count += 1;
  }
  return count;
}

/** Text of the subtree with all markup dropped. Pre-serialized HTML is parsed to recover its text. */
export function textContent(arena: Arena, root: NodeHandle): string {
  const parts: string[] = [];
  for (const { node } of iterateTree(arena, root)) {
    if (node.kind === "text") {
      parts.push(node.value);
    } else if (node.kind === "preserialized") {
      parts.push(htmlToText(node.fragment.html));
    }
  }
  return parts.join("");
}

/** Returns `handle` itself when it is a text node, else a new text node holding its plain text. */
export function plainTextNode(arena: Arena, handle: NodeHandle): NodeHandle {
  if (arena.resolve(handle).kind === "text") {
    return handle;
  }
  return arena.allocate({ kind: "text", value: textContent(arena, handle) });
}

function elementNamed(arena: Arena, handle: NodeHandle, tagName: string): ElementNode | undefined {
  const node = arena.resolve(handle);
  return node.kind === "element" && node.tagName === tagName ? node : undefined;
}

/**
 * If `handles` is exactly one `tagName` element, returns its children, otherwise `handles`.
 * With `strict`, an element carrying attributes is not unwrapped.
 */
export function unwrapElement(
  arena: Arena,
  handles: readonly NodeHandle[],
  tagName: string,
  strict = false
): readonly NodeHandle[] {
  const only = handles.length === 1 ? handles[0] : undefined;
  if (!only) {
    return handles;
  }
  const element = elementNamed(arena, only, tagName);
  if (!element || (strict && element.attributes.length > 0)) {
    return handles;
  }
  return element.children;
}

/** Replaces every `tagName` element in `handles` by its children. */
export function unwrapElements(
  arena: Arena,
  handles: readonly NodeHandle[],
  tagName: string
): NodeHandle[] {
  return handles.flatMap((handle) => {
    const element = elementNamed(arena, handle, tagName);
    return element ? [...element.children] : [handle];
  });
}

/** Splits before the first handle matching `predicate`; undefined when none matches. */
export function splitWhen(
  arena: Arena,
  handles: readonly NodeHandle[],
  predicate: (node: ArenaNode, handle: NodeHandle) => boolean
): [readonly NodeHandle[], readonly NodeHandle[]] | undefined {
  const index = handles.findIndex((handle) => predicate(arena.resolve(handle), handle));
  if (index < 0) {
    return undefined;
  }
  return [handles.slice(0, index), handles.slice(index)];
}
