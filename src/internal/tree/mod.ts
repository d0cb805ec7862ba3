export { HtmlBuilder, normalizeAttributes } from "./build.js";
export type { ElementBuilder } from "./build.js";
export { describeTree } from "./normalize.js";
export { softPre } from "./soft-pre.js";
export type { SoftPreOptions } from "./soft-pre.js";
export { filter, identity, keep, map, remove, replace, splice, transform } from "./transform.js";
export type { Replacement, TransformOptions, TransformResult, TransformVisitor } from "./transform.js";
export {
  countNodes,
  findAllByTagName,
  iterateTree,
  plainTextNode,
  splitWhen,
  textContent,
  unwrapElement,
  unwrapElements,
  walk,
  walkElements
} from "./walk.js";
export type { VisitedNode } from "./walk.js";

export type {
  ArenaNode,
  ElementNode,
  ElementVisitor,
  FragmentNode,
  NodeDescription,
  NodeKind,
  NodeVisitor,
  PreSerializedNode,
  TextNode
} from "./types.js";
