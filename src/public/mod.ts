import type { Arena } from "../internal/arena/arena.js";
import type { NodeHandle } from "../internal/arena/handle.js";
import type { ArenaPool } from "../internal/arena/pool.js";
import { serialize } from "../internal/serializer/serialize.js";
import { HtmlBuilder } from "../internal/tree/build.js";

import type { SerializeOptions } from "./types.js";

export type {
  Attribute,
  AttributeEntry,
  AttributeInput,
  AttributeMeta,
  AttributeValue,
  AttributeValueType,
  ArenaBudgets,
  ArenaOptions,
  BudgetExceededPayload,
  ChildInput,
  ContentCategory,
  ContentSummary,
  FragmentCacheOptions,
  InvalidHandlePayload,
  InvalidHandleReason,
  PoolErrorPayload,
  PoolOptions,
  SchemaErrorCode,
  SchemaErrorPayload,
  SchemaLoadErrorPayload,
  SerializedFragment,
  SerializeOptions,
  TagMeta,
  TraceConstructionSiteSkippedEvent,
  TraceEvent,
  TraceLinkEvent,
  TraceListener,
  TracePoolAcquireEvent,
  TracePoolReleaseEvent,
  TraceResetEvent,
  ValidationResult
} from "./types.js";

export { Arena, ArenaPool, NodeHandle, isNodeHandle } from "../internal/arena/mod.js";
export {
  BudgetExceededError,
  InvalidHandleError,
  PoolError,
  SchemaLoadError,
  SchemaValidationError
} from "../internal/errors.js";
export {
  DEFAULT_SCHEMA_URL,
  SchemaDatabase,
  TEXT_CHILD,
  createSchemaDatabase,
  defaultSchema,
  isValidAttributeName,
  loadSchemaDatabase
} from "../internal/schema/mod.js";
export type { SchemaDatabaseInit } from "../internal/schema/mod.js";
export {
  DOCTYPE,
  FragmentCache,
  adoptHtml,
  escapeAttribute,
  escapeText,
  preserialize,
  serialize,
  serializeToBytes
} from "../internal/serializer/mod.js";
export {
  HtmlBuilder,
  countNodes,
  describeTree,
  filter,
  findAllByTagName,
  identity,
  iterateTree,
  keep,
  map,
  normalizeAttributes,
  plainTextNode,
  remove,
  replace,
  softPre,
  splice,
  splitWhen,
  textContent,
  transform,
  unwrapElement,
  unwrapElements,
  walk,
  walkElements
} from "../internal/tree/mod.js";
export type {
  ArenaNode,
  ElementBuilder,
  ElementNode,
  ElementVisitor,
  FragmentNode,
  NodeDescription,
  NodeKind,
  NodeVisitor,
  PreSerializedNode,
  Replacement,
  SoftPreOptions,
  TextNode,
  TransformOptions,
  TransformResult,
  TransformVisitor,
  VisitedNode
} from "../internal/tree/mod.js";

export type DocumentBuilder = (html: HtmlBuilder, arena: Arena) => NodeHandle;

/**
 * Builds one document in an arena leased from `pool`, serializes it and hands the
 * arena back, also when building throws.
 */
export function renderDocument(
  pool: ArenaPool,
  build: DocumentBuilder,
  options: SerializeOptions = {}
): string {
  return pool.withArena((arena) => serialize(arena, build(new HtmlBuilder(arena), arena), options));
}
