import type { NodeHandle } from "../internal/arena/handle.js";
import type { SchemaDatabase } from "../internal/schema/database.js";

export type ContentCategory = string;

export type AttributeValueType =
  | "bool"
  | "string"
  | "integer"
  | "float"
  | { readonly identifier: string }
  | { readonly enumerable: readonly string[] };

export interface AttributeMeta {
  readonly name: string;
  readonly description: string;
  readonly type: AttributeValueType;
}

export interface TagMeta {
  readonly tagName: string;
  readonly structName: string;
  readonly hasGlobalAttributes: boolean;
  readonly hasClosingTag: boolean;
  readonly attributes: ReadonlyMap<string, AttributeMeta>;
  readonly contentCategories: ReadonlySet<ContentCategory>;
  readonly permittedContent: ReadonlySet<ContentCategory>;
  readonly excludedContent: ReadonlySet<ContentCategory>;
  /** Every tag name that may appear as a direct child, resolved from categories and the explicit list. */
  readonly permittedChildTags: ReadonlySet<string>;
  readonly allowsText: boolean;
}

export interface Attribute {
  readonly name: string;
  readonly value: string;
}

export type AttributeValue = string | number | boolean | null | undefined;

export type AttributeEntry = readonly [name: string, value: AttributeValue];

export type AttributeInput = Readonly<Record<string, AttributeValue>> | readonly AttributeEntry[];

export type ChildInput = NodeHandle | string | null | undefined | false | readonly ChildInput[];

export interface ContentSummary {
  readonly tagNames: readonly string[];
  readonly hasText: boolean;
}

export interface SerializedFragment {
  readonly html: string;
  readonly content: ContentSummary;
}

export type SchemaErrorCode =
  | "UNKNOWN_TAG"
  | "DISALLOWED_ATTRIBUTE"
  | "DISALLOWED_CHILD"
  | "DUPLICATE_ATTRIBUTE"
  | "INVALID_ATTRIBUTE_NAME";

export interface SchemaErrorPayload {
  readonly code: SchemaErrorCode;
  readonly tagName: string;
  readonly attribute?: string;
  readonly child?: string;
  readonly childIndex?: number;
  readonly allowed?: readonly string[];
}

export type ValidationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: SchemaErrorPayload };

export type InvalidHandleReason = "stale-generation" | "foreign-arena" | "out-of-range";

export interface InvalidHandlePayload {
  readonly code: "INVALID_HANDLE";
  readonly reason: InvalidHandleReason;
  readonly handle: string;
  readonly arenaId: number;
}

export interface BudgetExceededPayload {
  readonly code: "BUDGET_EXCEEDED";
  readonly budget: "maxNodes";
  readonly limit: number;
  readonly actual: number;
}

export interface SchemaLoadErrorPayload {
  readonly code: "INVALID_SCHEMA_RECORD" | "UNKNOWN_CHILD_REFERENCE";
  readonly detail: string;
  readonly tagName?: string;
}

export interface PoolErrorPayload {
  readonly code: "ARENA_NOT_LEASED";
  readonly arenaId: number;
}

export interface TraceResetEvent {
  readonly seq: number;
  readonly kind: "reset";
  readonly arenaId: number;
  readonly generation: number;
  readonly nodes: number;
}

export interface TraceLinkEvent {
  readonly seq: number;
  readonly kind: "link";
  readonly arenaId: number;
  readonly sourceArenaId: number;
}

export interface TraceConstructionSiteSkippedEvent {
  readonly seq: number;
  readonly kind: "construction-site-skipped";
  readonly arenaId: number;
  readonly tagName: string;
}

export interface TracePoolAcquireEvent {
  readonly seq: number;
  readonly kind: "pool-acquire";
  readonly arenaId: number;
  readonly reused: boolean;
}

export interface TracePoolReleaseEvent {
  readonly seq: number;
  readonly kind: "pool-release";
  readonly arenaId: number;
  readonly pooled: boolean;
  readonly reason: "pooled" | "generation-limit" | "pool-full";
}

export type TraceEvent =
  | TraceResetEvent
  | TraceLinkEvent
  | TraceConstructionSiteSkippedEvent
  | TracePoolAcquireEvent
  | TracePoolReleaseEvent;

export type TraceListener = (event: TraceEvent) => void;

export interface ArenaBudgets {
  readonly maxNodes?: number;
}

export interface ArenaOptions {
  readonly schema?: SchemaDatabase;
  /** When false, tags are still resolved but attributes and children are not checked. */
  readonly validate?: boolean;
  readonly budgets?: ArenaBudgets;
  /** Attach a `title` attribute naming the call site to every element built. */
  readonly traceConstruction?: boolean;
  readonly onTrace?: TraceListener;
}

export interface PoolOptions extends ArenaOptions {
  readonly maxIdle?: number;
  readonly maxGenerations?: number;
}

export interface SerializeOptions {
  readonly doctype?: boolean;
}

export interface FragmentCacheOptions {
  readonly maxEntries?: number;
}
