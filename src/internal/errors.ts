import type {
  BudgetExceededPayload,
  InvalidHandlePayload,
  PoolErrorPayload,
  SchemaErrorPayload,
  SchemaLoadErrorPayload
} from "../public/types.js";

function describeSchemaError(payload: SchemaErrorPayload): string {
  const parts = [`Schema validation failed: ${payload.code} tag=${payload.tagName}`];
  if (payload.attribute !== undefined) {
    parts.push(`attribute=${payload.attribute}`);
  }
  if (payload.child !== undefined) {
    parts.push(`child=${payload.child}`);
  }
  if (payload.childIndex !== undefined) {
    parts.push(`index=${String(payload.childIndex)}`);
  }
  if (payload.allowed !== undefined) {
    parts.push(`allowed=[${payload.allowed.join(", ")}]`);
  }
  return parts.join(" ");
}

export class SchemaValidationError extends Error {
  readonly payload: SchemaErrorPayload;

  constructor(payload: SchemaErrorPayload) {
    super(describeSchemaError(payload));
    this.name = "SchemaValidationError";
    this.payload = payload;
  }
}

export class InvalidHandleError extends Error {
  readonly payload: InvalidHandlePayload;

  constructor(payload: InvalidHandlePayload) {
    super(`Invalid handle ${payload.handle} for arena ${String(payload.arenaId)}: ${payload.reason}`);
    this.name = "InvalidHandleError";
    this.payload = payload;
  }
}

export class BudgetExceededError extends Error {
  readonly payload: BudgetExceededPayload;

  constructor(payload: BudgetExceededPayload) {
    super(
      `Budget exceeded: ${payload.budget} limit=${String(payload.limit)} actual=${String(payload.actual)}`
    );
    this.name = "BudgetExceededError";
    this.payload = payload;
  }
}

export class SchemaLoadError extends Error {
  readonly payload: SchemaLoadErrorPayload;

  constructor(payload: SchemaLoadErrorPayload) {
    super(
      `Schema load failed: ${payload.code}${
        payload.tagName === undefined ? "" : ` tag=${payload.tagName}`
      }: ${payload.detail}`
    );
    this.name = "SchemaLoadError";
    this.payload = payload;
  }
}

export class PoolError extends Error {
  readonly payload: PoolErrorPayload;

  constructor(payload: PoolErrorPayload) {
    super(`Pool misuse: ${payload.code} arena=${String(payload.arenaId)}`);
    this.name = "PoolError";
    this.payload = payload;
  }
}
