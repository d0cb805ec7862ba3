import { fileURLToPath } from "node:url";

import type { Arena } from "../arena/arena.js";
import { type NodeHandle, isNodeHandle } from "../arena/handle.js";
import { SchemaValidationError } from "../errors.js";
import { TEXT_CHILD, isValidAttributeName } from "../schema/database.js";
import type {
  Attribute,
  AttributeEntry,
  AttributeInput,
  AttributeValue,
  ChildInput,
  SchemaErrorPayload,
  SerializedFragment,
  TagMeta,
  ValidationResult
} from "../../public/types.js";
import type { ArenaNode, ElementNode, NodeDescription } from "./types.js";

export type ElementBuilder = (attributes?: AttributeInput | null, ...children: ChildInput[]) => NodeHandle;

type ChildPart = NodeHandle | string;

const NBSP = "\u00a0";
const TRACE_ATTRIBUTE = "title";
const MAX_TRACE_FRAMES = 8;

const LIBRARY_ROOT_URL = new URL("../../", import.meta.url);
const LIBRARY_ROOTS = [LIBRARY_ROOT_URL.href, fileURLToPath(LIBRARY_ROOT_URL)];

function isAttributeEntryList(input: AttributeInput): input is readonly AttributeEntry[] {
  return Array.isArray(input);
}

function isChildList(input: ChildInput): input is readonly ChildInput[] {
  return Array.isArray(input);
}

function attributeText(value: AttributeValue): string | undefined {
  if (value === null || value === undefined || value === false) {
    return undefined;
  }
  if (value === true) {
    return "";
  }
  return typeof value === "number" ? String(value) : value;
}

export function normalizeAttributes(
  tagName: string,
  input: AttributeInput | null | undefined
): readonly Attribute[] {
  if (!input) {
    return [];
  }

  const entries: readonly AttributeEntry[] = isAttributeEntryList(input)
    ? input
    : Object.entries(input);
  const attributes: Attribute[] = [];
  const seen = new Set<string>();

  for (const [name, raw] of entries) {
    const value = attributeText(raw);
    if (value === undefined) {
      continue;
    }
    if (!isValidAttributeName(name)) {
      throw new SchemaValidationError({ code: "INVALID_ATTRIBUTE_NAME", tagName, attribute: name });
    }
    if (seen.has(name)) {
      throw new SchemaValidationError({ code: "DUPLICATE_ATTRIBUTE", tagName, attribute: name });
    }
    seen.add(name);
    attributes.push({ name, value });
  }
  return attributes;
}

function flattenChildren(input: readonly ChildInput[], out: ChildPart[]): ChildPart[] {
  for (const child of input) {
    if (child === null || child === undefined || child === false) {
      continue;
    }
    if (isChildList(child)) {
      flattenChildren(child, out);
      continue;
    }
    out.push(child);
  }
  return out;
}

function captureConstructionSite(): string {
  const stack = new Error().stack ?? "";
  const frames = stack
    .split("\n")
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !LIBRARY_ROOTS.some((root) => line.includes(root)))
    .slice(0, MAX_TRACE_FRAMES);
  return `Generated at:\n${frames.join("\n")}`;
}

function reject(error: SchemaErrorPayload, childIndex?: number): never {
  throw new SchemaValidationError(childIndex === undefined ? error : { ...error, childIndex });
}

function check(result: ValidationResult, childIndex?: number): void {
  if (!result.ok) {
    reject(result.error, childIndex);
  }
}

/**
 * Construction API over one arena. Every element is validated against the arena's schema
 * before anything is allocated for it; string children become text nodes.
 *
 * Tag-specific shorthands exist for every tag of the bundled schema:
 * `b.a({ href: "/x" }, "text")` is `b.element("a", { href: "/x" }, "text")`.
 */
export class HtmlBuilder {
  readonly arena: Arena;

  constructor(arena: Arena) {
    this.arena = arena;
  }

  element(tagName: string, attributes?: AttributeInput | null, ...children: ChildInput[]): NodeHandle {
    return this.#element(tagName, attributes, children, this.arena.traceConstruction);
  }

  text(value: string): NodeHandle {
    return this.arena.allocate({ kind: "text", value });
  }

  nbsp(): NodeHandle {
    return this.text(NBSP);
  }

  fragment(...children: ChildInput[]): NodeHandle {
    const parts = flattenChildren(children, []);
    return this.arena.allocate({ kind: "fragment", children: this.#materialize(parts) });
  }

  empty(): NodeHandle {
    return this.arena.allocate({ kind: "fragment", children: [] });
  }

  preserialized(fragment: SerializedFragment): NodeHandle {
    return this.arena.allocate({ kind: "preserialized", fragment });
  }

  /** Builds a node from a plain description. No construction site is recorded. */
  build(description: NodeDescription): NodeHandle {
    switch (description.kind) {
      case "element":
        return this.#element(description.tagName, description.attributes, [description.children], false);
      case "text":
        return this.text(description.value);
      case "fragment":
        return this.fragment(description.children);
      case "preserialized":
        return this.preserialized(description.fragment);
    }
  }

  /** Allocates a copy of `node` with new children, keeping tag and attributes. */
  withChildren(node: ElementNode, children: readonly NodeHandle[]): NodeHandle {
    if (this.arena.validate) {
      this.#validateChildren(node.meta, children);
    }
    return this.arena.allocate({
      kind: "element",
      tagName: node.tagName,
      meta: node.meta,
      attributes: node.attributes,
      children: [...children]
    });
  }

  #element(
    tagName: string,
    attributeInput: AttributeInput | null | undefined,
    childInput: readonly ChildInput[],
    traced: boolean
  ): NodeHandle {
    const schema = this.arena.schema;
    const meta = schema.lookup(tagName);
    let attributes = normalizeAttributes(tagName, attributeInput);
    const parts = flattenChildren(childInput, []);

    if (this.arena.validate) {
      for (const attribute of attributes) {
        check(schema.validateAttribute(tagName, attribute.name));
      }
      this.#validateChildren(meta, parts);
    }

    if (traced) {
      if (attributes.some((attribute) => attribute.name === TRACE_ATTRIBUTE)) {
        this.arena.trace.emit({ kind: "construction-site-skipped", arenaId: this.arena.id, tagName });
      } else {
        attributes = [...attributes, { name: TRACE_ATTRIBUTE, value: captureConstructionSite() }];
      }
    }

    return this.arena.allocate({
      kind: "element",
      tagName,
      meta,
      attributes,
      children: this.#materialize(parts)
    });
  }

  #materialize(parts: readonly ChildPart[]): NodeHandle[] {
    return parts.map((part) => (isNodeHandle(part) ? part : this.text(part)));
  }

  #validateChildren(meta: TagMeta, parts: readonly ChildPart[]): void {
    parts.forEach((part, index) => {
      if (typeof part === "string") {
        check(this.arena.schema.validateText(meta.tagName, part), index);
        return;
      }
      this.#validateChildNode(meta, this.arena.resolve(part), index);
    });
  }

  #validateChildNode(meta: TagMeta, node: ArenaNode, index: number): void {
    const schema = this.arena.schema;
    switch (node.kind) {
      case "element":
        check(schema.validateChild(meta.tagName, node.tagName), index);
        return;
      case "text":
        check(schema.validateText(meta.tagName, node.value), index);
        return;
      case "fragment":
        for (const child of node.children) {
          this.#validateChildNode(meta, this.arena.resolve(child), index);
        }
        return;
      case "preserialized":
        for (const tagName of node.fragment.content.tagNames) {
          check(schema.validateChild(meta.tagName, tagName), index);
        }
        if (node.fragment.content.hasText && !meta.allowsText) {
          reject(
            {
              code: "DISALLOWED_CHILD",
              tagName: meta.tagName,
              child: TEXT_CHILD,
              allowed: schema.allowedChildren(meta.tagName)
            },
            index
          );
        }
        return;
    }
  }

  #tag(tagName: string): ElementBuilder {
    return (attributes, ...children) => this.element(tagName, attributes, ...children);
  }

  readonly html = this.#tag("html");
  readonly head = this.#tag("head");
  readonly title = this.#tag("title");
  readonly base = this.#tag("base");
  readonly link = this.#tag("link");
  readonly meta = this.#tag("meta");
  readonly style = this.#tag("style");
  readonly script = this.#tag("script");
  readonly noscript = this.#tag("noscript");
  readonly template = this.#tag("template");
  readonly body = this.#tag("body");
  readonly article = this.#tag("article");
  readonly section = this.#tag("section");
  readonly nav = this.#tag("nav");
  readonly aside = this.#tag("aside");
  readonly header = this.#tag("header");
  readonly footer = this.#tag("footer");
  readonly main = this.#tag("main");
  readonly address = this.#tag("address");
  readonly h1 = this.#tag("h1");
  readonly h2 = this.#tag("h2");
  readonly h3 = this.#tag("h3");
  readonly h4 = this.#tag("h4");
  readonly h5 = this.#tag("h5");
  readonly h6 = this.#tag("h6");
  readonly hgroup = this.#tag("hgroup");
  readonly p = this.#tag("p");
  readonly hr = this.#tag("hr");
  readonly pre = this.#tag("pre");
  readonly blockquote = this.#tag("blockquote");
  readonly ol = this.#tag("ol");
  readonly ul = this.#tag("ul");
  readonly li = this.#tag("li");
  readonly dl = this.#tag("dl");
  readonly dt = this.#tag("dt");
  readonly dd = this.#tag("dd");
  readonly figure = this.#tag("figure");
  readonly figcaption = this.#tag("figcaption");
  readonly div = this.#tag("div");
  readonly a = this.#tag("a");
  readonly em = this.#tag("em");
  readonly strong = this.#tag("strong");
  readonly small = this.#tag("small");
  readonly s = this.#tag("s");
  readonly cite = this.#tag("cite");
  readonly dfn = this.#tag("dfn");
  readonly code = this.#tag("code");
  readonly var = this.#tag("var");
  readonly samp = this.#tag("samp");
  readonly kbd = this.#tag("kbd");
  readonly sub = this.#tag("sub");
  readonly sup = this.#tag("sup");
  readonly i = this.#tag("i");
  readonly b = this.#tag("b");
  readonly u = this.#tag("u");
  readonly mark = this.#tag("mark");
  readonly span = this.#tag("span");
  readonly bdi = this.#tag("bdi");
  readonly q = this.#tag("q");
  readonly abbr = this.#tag("abbr");
  readonly br = this.#tag("br");
  readonly wbr = this.#tag("wbr");
  readonly time = this.#tag("time");
  readonly data = this.#tag("data");
  readonly ins = this.#tag("ins");
  readonly del = this.#tag("del");
  readonly img = this.#tag("img");
  readonly iframe = this.#tag("iframe");
  readonly picture = this.#tag("picture");
  readonly source = this.#tag("source");
  readonly video = this.#tag("video");
  readonly audio = this.#tag("audio");
  readonly track = this.#tag("track");
  readonly map = this.#tag("map");
  readonly area = this.#tag("area");
  readonly table = this.#tag("table");
  readonly caption = this.#tag("caption");
  readonly colgroup = this.#tag("colgroup");
  readonly col = this.#tag("col");
  readonly thead = this.#tag("thead");
  readonly tbody = this.#tag("tbody");
  readonly tfoot = this.#tag("tfoot");
  readonly tr = this.#tag("tr");
  readonly td = this.#tag("td");
  readonly th = this.#tag("th");
  readonly form = this.#tag("form");
  readonly label = this.#tag("label");
  readonly input = this.#tag("input");
  readonly button = this.#tag("button");
  readonly select = this.#tag("select");
  readonly option = this.#tag("option");
  readonly optgroup = this.#tag("optgroup");
  readonly textarea = this.#tag("textarea");
  readonly fieldset = this.#tag("fieldset");
  readonly legend = this.#tag("legend");
  readonly details = this.#tag("details");
  readonly summary = this.#tag("summary");
  readonly dialog = this.#tag("dialog");
  readonly output = this.#tag("output");
  readonly progress = this.#tag("progress");
  readonly meter = this.#tag("meter");
}
