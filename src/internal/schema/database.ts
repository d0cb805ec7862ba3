import { SchemaValidationError } from "../errors.js";
import type { TagMeta, ValidationResult } from "../../public/types.js";

export const TEXT_CHILD = "#text";

const OK: ValidationResult = { ok: true };

const ASCII_WHITESPACE = /^[\t\n\f\r ]*$/;

// Characters the HTML tokenizer would end an attribute name on, plus controls.
const ATTRIBUTE_NAME = /^[^\s"'>/=\u0000-\u001f\u007f-\u009f]+$/;

// Suffix accepted after a global prefix such as `data-` or `aria-`.
const PREFIXED_ATTRIBUTE_SUFFIX = /^[a-z0-9_.:-]+$/;

export function isValidAttributeName(name: string): boolean {
  return ATTRIBUTE_NAME.test(name);
}

export interface SchemaDatabaseInit {
  readonly version: number;
  readonly tags: readonly TagMeta[];
  readonly globalAttributes: readonly string[];
  readonly globalAttributePrefixes: readonly string[];
}

/**
 * Immutable per-tag metadata table. Built once by the loader and shared by every arena;
 * all methods are pure lookups.
 */
export class SchemaDatabase {
  readonly version: number;
  readonly #tags: ReadonlyMap<string, TagMeta>;
  readonly #globalAttributes: ReadonlySet<string>;
  readonly #globalAttributePrefixes: readonly string[];

  constructor(init: SchemaDatabaseInit) {
    this.version = init.version;
    this.#tags = new Map(init.tags.map((meta) => [meta.tagName, meta]));
    this.#globalAttributes = new Set(init.globalAttributes);
    this.#globalAttributePrefixes = [...init.globalAttributePrefixes];
    Object.freeze(this);
  }

  get tagNames(): readonly string[] {
    return [...this.#tags.keys()];
  }

  has(tagName: string): boolean {
    return this.#tags.has(tagName);
  }

  find(tagName: string): TagMeta | undefined {
    return this.#tags.get(tagName);
  }

  lookup(tagName: string): TagMeta {
    const meta = this.#tags.get(tagName);
    if (!meta) {
      throw new SchemaValidationError({ code: "UNKNOWN_TAG", tagName });
    }
    return meta;
  }

  isGlobalAttribute(name: string): boolean {
    if (this.#globalAttributes.has(name)) {
      return true;
    }
    return this.#globalAttributePrefixes.some(
      (prefix) => name.startsWith(prefix) && PREFIXED_ATTRIBUTE_SUFFIX.test(name.slice(prefix.length))
    );
  }

  validateAttribute(tagName: string, name: string): ValidationResult {
    const meta = this.#tags.get(tagName);
    if (!meta) {
      return { ok: false, error: { code: "UNKNOWN_TAG", tagName } };
    }

    if (meta.attributes.has(name)) {
      return OK;
    }

    if (meta.hasGlobalAttributes && this.isGlobalAttribute(name)) {
      return OK;
    }

    return {
      ok: false,
      error: {
        code: "DISALLOWED_ATTRIBUTE",
        tagName,
        attribute: name,
        allowed: this.allowedAttributes(tagName)
      }
    };
  }

  /** Checks an element child by tag name against the parent's resolved child set. */
  validateChild(parentTag: string, childTag: string): ValidationResult {
    const meta = this.#tags.get(parentTag);
    if (!meta) {
      return { ok: false, error: { code: "UNKNOWN_TAG", tagName: parentTag } };
    }

    if (meta.permittedChildTags.has(childTag)) {
      return OK;
    }

    return {
      ok: false,
      error: {
        code: "DISALLOWED_CHILD",
        tagName: parentTag,
        child: childTag,
        allowed: this.allowedChildren(parentTag)
      }
    };
  }

  /** Checks a bare content category, for callers that know what they intend to insert but not its tag. */
  validateChildCategory(parentTag: string, category: string): ValidationResult {
    const meta = this.#tags.get(parentTag);
    if (!meta) {
      return { ok: false, error: { code: "UNKNOWN_TAG", tagName: parentTag } };
    }

    if (meta.permittedContent.has(category) && !meta.excludedContent.has(category)) {
      return OK;
    }

    return {
      ok: false,
      error: {
        code: "DISALLOWED_CHILD",
        tagName: parentTag,
        child: category,
        allowed: [...meta.permittedContent].filter((entry) => !meta.excludedContent.has(entry)).sort()
      }
    };
  }

  validateText(parentTag: string, text: string): ValidationResult {
    const meta = this.#tags.get(parentTag);
    if (!meta) {
      return { ok: false, error: { code: "UNKNOWN_TAG", tagName: parentTag } };
    }

    if (meta.allowsText || ASCII_WHITESPACE.test(text)) {
      return OK;
    }

    return {
      ok: false,
      error: {
        code: "DISALLOWED_CHILD",
        tagName: parentTag,
        child: TEXT_CHILD,
        allowed: this.allowedChildren(parentTag)
      }
    };
  }

  permitsText(tagName: string): boolean {
    return this.#tags.get(tagName)?.allowsText ?? false;
  }

  /** Tag-specific attribute names, sorted. Global attributes are not listed. */
  allowedAttributes(tagName: string): readonly string[] {
    const meta = this.#tags.get(tagName);
    return meta ? [...meta.attributes.keys()].sort() : [];
  }

  allowedChildren(tagName: string): readonly string[] {
    const meta = this.#tags.get(tagName);
    if (!meta) {
      return [];
    }
    const names = [...meta.permittedChildTags].sort();
    return meta.allowsText ? [TEXT_CHILD, ...names] : names;
  }
}
