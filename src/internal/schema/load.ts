import { readFileSync } from "node:fs";

import { SchemaLoadError } from "../errors.js";
import type { AttributeMeta, AttributeValueType, TagMeta } from "../../public/types.js";
import { SchemaDatabase } from "./database.js";

export const DEFAULT_SCHEMA_URL = new URL("../../../schema/html-elements.json", import.meta.url);

const TEXT_STRUCT_NAME = "Text";

// Text is phrasing content, and phrasing content is flow content.
const TEXT_CATEGORIES = new Set(["phrasing", "flow"]);

type JsonRecord = Readonly<Record<string, unknown>>;

interface RawTagRecord {
  readonly tagName: string;
  readonly structName: string;
  readonly hasGlobalAttributes: boolean;
  readonly hasClosingTag: boolean;
  readonly attributes: readonly AttributeMeta[];
  readonly contentCategories: readonly string[];
  readonly permittedContent: readonly string[];
  readonly excludedContent: readonly string[];
  readonly permittedChildElements: readonly string[];
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(detail: string, tagName?: string): SchemaLoadError {
  return new SchemaLoadError(
    tagName === undefined
      ? { code: "INVALID_SCHEMA_RECORD", detail }
      : { code: "INVALID_SCHEMA_RECORD", detail, tagName }
  );
}

function readString(record: JsonRecord, key: string, tagName?: string): string {
  const value = record[key];
  if (typeof value !== "string" || value.length === 0) {
    throw invalid(`"${key}" must be a non-empty string`, tagName);
  }
  return value;
}

function readBoolean(record: JsonRecord, key: string, tagName: string): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    throw invalid(`"${key}" must be a boolean`, tagName);
  }
  return value;
}

function readStringList(record: JsonRecord, key: string, tagName?: string): readonly string[] {
  const value = record[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(`"${key}" must be an array of strings`, tagName);
  }

  const list: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      throw invalid(`"${key}" must be an array of strings`, tagName);
    }
    list.push(entry);
  }
  return list;
}

function readAttributeType(value: unknown, tagName: string): AttributeValueType {
  if (value === "bool" || value === "string" || value === "integer" || value === "float") {
    return value;
  }

  if (isRecord(value)) {
    const identifier = value["identifier"];
    if (typeof identifier === "string") {
      return { identifier };
    }
    if (value["enumerable"] !== undefined) {
      return { enumerable: readStringList(value, "enumerable", tagName) };
    }
  }

  throw invalid(`unsupported attribute type ${JSON.stringify(value)}`, tagName);
}

function readAttributes(record: JsonRecord, tagName: string): readonly AttributeMeta[] {
  const value = record["attributes"];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(`"attributes" must be an array`, tagName);
  }

  return value.map((entry: unknown): AttributeMeta => {
    if (!isRecord(entry)) {
      throw invalid("attribute entries must be objects", tagName);
    }
    const description = entry["description"];
    return {
      name: readString(entry, "name", tagName),
      description: typeof description === "string" ? description : "",
      type: readAttributeType(entry["type"], tagName)
    };
  });
}

function readTagRecord(value: unknown): RawTagRecord {
  if (!isRecord(value)) {
    throw invalid("element entries must be objects");
  }

  const tagName = readString(value, "tagName");
  return {
    tagName,
    structName: readString(value, "structName", tagName),
    hasGlobalAttributes: readBoolean(value, "hasGlobalAttributes", tagName),
    hasClosingTag: readBoolean(value, "hasClosingTag", tagName),
    attributes: readAttributes(value, tagName),
    contentCategories: readStringList(value, "contentCategories", tagName),
    permittedContent: readStringList(value, "permittedContent", tagName),
    excludedContent: readStringList(value, "excludedContent", tagName),
    permittedChildElements: readStringList(value, "permittedChildElements", tagName)
  };
}

function intersects(left: readonly string[], right: ReadonlySet<string>): boolean {
  return left.some((entry) => right.has(entry));
}

function resolveTagMeta(
  record: RawTagRecord,
  all: readonly RawTagRecord[],
  tagByStruct: ReadonlyMap<string, string>
): TagMeta {
  const permittedContent = new Set(record.permittedContent);
  const excludedContent = new Set(record.excludedContent);
  const permittedChildTags = new Set<string>();
  let allowsText = intersects(record.permittedContent, TEXT_CATEGORIES);

  for (const structName of record.permittedChildElements) {
    if (structName === TEXT_STRUCT_NAME) {
      allowsText = true;
      continue;
    }
    const childTag = tagByStruct.get(structName);
    if (childTag === undefined) {
      throw new SchemaLoadError({
        code: "UNKNOWN_CHILD_REFERENCE",
        detail: `no element is named ${structName}`,
        tagName: record.tagName
      });
    }
    permittedChildTags.add(childTag);
  }

  for (const candidate of all) {
    if (
      intersects(candidate.contentCategories, permittedContent) &&
      !intersects(candidate.contentCategories, excludedContent)
    ) {
      permittedChildTags.add(candidate.tagName);
    }
  }

  return {
    tagName: record.tagName,
    structName: record.structName,
    hasGlobalAttributes: record.hasGlobalAttributes,
    hasClosingTag: record.hasClosingTag,
    attributes: new Map(record.attributes.map((attribute) => [attribute.name, attribute])),
    contentCategories: new Set(record.contentCategories),
    permittedContent,
    excludedContent,
    permittedChildTags,
    allowsText
  };
}

/** Builds a database from an already parsed schema document. */
export function createSchemaDatabase(document: unknown): SchemaDatabase {
  if (!isRecord(document)) {
    throw invalid("schema document must be an object");
  }

  const elements = document["elements"];
  if (!Array.isArray(elements)) {
    throw invalid(`"elements" must be an array`);
  }

  const records = elements.map((entry: unknown) => readTagRecord(entry));
  const tagByStruct = new Map<string, string>();
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.tagName)) {
      throw invalid("duplicate element entry", record.tagName);
    }
    seen.add(record.tagName);
    tagByStruct.set(record.structName, record.tagName);
  }

  const version = document["version"];
  return new SchemaDatabase({
    version: typeof version === "number" ? version : 0,
    tags: records.map((record) => resolveTagMeta(record, records, tagByStruct)),
    globalAttributes: [
      ...readStringList(document, "globalAttributes"),
      ...readStringList(document, "eventHandlerAttributes")
    ],
    globalAttributePrefixes: readStringList(document, "globalAttributePrefixes")
  });
}

/** Reads and parses a schema document from disk. */
export function loadSchemaDatabase(source: string | URL = DEFAULT_SCHEMA_URL): SchemaDatabase {
  const text = readFileSync(source, "utf8");
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalid(`schema document is not valid JSON: ${reason}`);
  }
  return createSchemaDatabase(document);
}

let shared: SchemaDatabase | undefined;

/** The bundled HTML schema, loaded on first use. */
export function defaultSchema(): SchemaDatabase {
  shared ??= loadSchemaDatabase();
  return shared;
}
