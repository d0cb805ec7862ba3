import { expect, test } from "vitest";

import {
  SchemaLoadError,
  SchemaValidationError,
  createSchemaDatabase,
  defaultSchema,
  isValidAttributeName,
  loadSchemaDatabase
} from "../src/public/mod.js";

const schema = defaultSchema();

function miniSchema(elements: unknown[]): unknown {
  return {
    version: 7,
    globalAttributes: ["id", "class"],
    eventHandlerAttributes: ["onclick"],
    globalAttributePrefixes: ["data-"],
    elements
  };
}

test("schema: bundled database is loaded once and shared", () => {
  expect(defaultSchema()).toBe(schema);
  expect(schema.tagNames.length).toBe(101);
  expect(schema.has("a")).toBe(true);
  expect(schema.has("blink")).toBe(false);
  expect(Object.isFrozen(schema)).toBe(true);
});

test("schema: lookup returns tag metadata", () => {
  const anchor = schema.lookup("a");
  expect(anchor.structName).toBe("Anchor");
  expect(anchor.hasClosingTag).toBe(true);
  expect(anchor.hasGlobalAttributes).toBe(true);
  expect(anchor.allowsText).toBe(true);
  expect(anchor.attributes.get("target")?.type).toEqual({ enumerable: ["_self", "_blank", "_parent", "_top"] });
  expect(schema.lookup("br").hasClosingTag).toBe(false);
  expect(schema.lookup("img").hasClosingTag).toBe(false);
});

test("schema: lookup of an unregistered tag throws UNKNOWN_TAG", () => {
  expect(() => schema.lookup("blink")).toThrow(SchemaValidationError);
  try {
    schema.lookup("blink");
  } catch (error) {
    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.payload).toEqual({ code: "UNKNOWN_TAG", tagName: "blink" });
      expect(error.message).toBe("Schema validation failed: UNKNOWN_TAG tag=blink");
    }
  }
  expect(schema.find("blink")).toBeUndefined();
});

test("schema: tag-specific and global attributes are accepted", () => {
  expect(schema.validateAttribute("a", "href")).toEqual({ ok: true });
  expect(schema.validateAttribute("a", "class")).toEqual({ ok: true });
  expect(schema.validateAttribute("a", "onclick")).toEqual({ ok: true });
  expect(schema.validateAttribute("a", "aria-label")).toEqual({ ok: true });
  expect(schema.validateAttribute("a", "data-id")).toEqual({ ok: true });
  expect(schema.validateAttribute("html", "xmlns")).toEqual({ ok: true });
});

test("schema: prefixed global attributes need a plain name after the prefix", () => {
  expect(schema.isGlobalAttribute("data-user_id.v2")).toBe(true);
  expect(schema.isGlobalAttribute("aria-describedby")).toBe(true);
  expect(schema.isGlobalAttribute('data-x"><b')).toBe(false);
  expect(schema.isGlobalAttribute("data-a b")).toBe(false);
  expect(schema.isGlobalAttribute("data-X")).toBe(false);
  expect(schema.validateAttribute("p", 'data-x"><b').ok).toBe(false);
  expect(isValidAttributeName("data-x")).toBe(true);
  expect(isValidAttributeName('x"')).toBe(false);
  expect(isValidAttributeName("a/b")).toBe(false);
  expect(isValidAttributeName("")).toBe(false);
});

test("schema: every attribute listed for a tag validates for that tag", () => {
  for (const tagName of schema.tagNames) {
    for (const name of schema.allowedAttributes(tagName)) {
      expect(schema.validateAttribute(tagName, name)).toEqual({ ok: true });
    }
  }
});

test("schema: unknown attributes fail with DISALLOWED_ATTRIBUTE", () => {
  expect(schema.validateAttribute("a", "src")).toEqual({
    ok: false,
    error: {
      code: "DISALLOWED_ATTRIBUTE",
      tagName: "a",
      attribute: "src",
      allowed: ["download", "href", "hreflang", "ping", "referrerpolicy", "rel", "target", "type"]
    }
  });
  const bare = schema.validateAttribute("div", "data-");
  expect(bare.ok).toBe(false);
  expect(schema.validateAttribute("blink", "id")).toEqual({
    ok: false,
    error: { code: "UNKNOWN_TAG", tagName: "blink" }
  });
});

test("schema: child tags are checked against content categories", () => {
  expect(schema.validateChild("p", "span")).toEqual({ ok: true });
  expect(schema.validateChild("map", "area")).toEqual({ ok: true });
  expect(schema.validateChild("ul", "li")).toEqual({ ok: true });
  expect(schema.validateChild("html", "body")).toEqual({ ok: true });
  expect(schema.validateChild("a", "div")).toEqual({ ok: true });

  expect(schema.validateChild("p", "div").ok).toBe(false);
  expect(schema.validateChild("a", "button").ok).toBe(false);
  expect(schema.validateChild("a", "a").ok).toBe(false);
  expect(schema.validateChild("ul", "p")).toEqual({
    ok: false,
    error: { code: "DISALLOWED_CHILD", tagName: "ul", child: "p", allowed: ["li", "script", "template"] }
  });
});

test("schema: area is not a permitted child of an anchor", () => {
  const result = schema.validateChild("a", "area");
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.code).toBe("DISALLOWED_CHILD");
    expect(result.error.child).toBe("area");
  }
});

test("schema: content categories can be checked directly", () => {
  expect(schema.validateChildCategory("p", "phrasing")).toEqual({ ok: true });
  expect(schema.validateChildCategory("p", "flow")).toEqual({
    ok: false,
    error: { code: "DISALLOWED_CHILD", tagName: "p", child: "flow", allowed: ["phrasing"] }
  });
  expect(schema.validateChildCategory("head", "metadata")).toEqual({ ok: true });
});

test("schema: text is allowed where the tag permits it, whitespace everywhere", () => {
  expect(schema.permitsText("p")).toBe(true);
  expect(schema.permitsText("ul")).toBe(false);
  expect(schema.validateText("ul", " \n\t")).toEqual({ ok: true });
  expect(schema.validateText("ul", "x")).toEqual({
    ok: false,
    error: { code: "DISALLOWED_CHILD", tagName: "ul", child: "#text", allowed: ["li", "script", "template"] }
  });
  expect(schema.validateText("title", "Home")).toEqual({ ok: true });
});

test("schema: allowedChildren lists text first when permitted", () => {
  expect(schema.allowedChildren("tr")).toEqual(["script", "td", "template", "th"]);
  expect(schema.allowedChildren("title")).toEqual(["#text"]);
  expect(schema.allowedChildren("br")).toEqual([]);
});

test("schema: createSchemaDatabase resolves struct names and categories", () => {
  const db = createSchemaDatabase(
    miniSchema([
      {
        tagName: "list",
        structName: "List",
        hasGlobalAttributes: true,
        hasClosingTag: true,
        attributes: [{ name: "compact", description: "Tight spacing", type: "bool" }],
        contentCategories: ["flow"],
        permittedContent: [],
        permittedChildElements: ["Item"]
      },
      {
        tagName: "item",
        structName: "Item",
        hasGlobalAttributes: false,
        hasClosingTag: false,
        attributes: [],
        contentCategories: [],
        permittedContent: ["flow"],
        permittedChildElements: []
      }
    ])
  );

  expect(db.version).toBe(7);
  expect(db.validateChild("list", "item")).toEqual({ ok: true });
  expect(db.validateChild("item", "list")).toEqual({ ok: true });
  expect(db.permitsText("item")).toBe(true);
  expect(db.permitsText("list")).toBe(false);
  expect(db.validateAttribute("list", "onclick")).toEqual({ ok: true });
  expect(db.validateAttribute("list", "data-x")).toEqual({ ok: true });
  expect(db.validateAttribute("item", "id").ok).toBe(false);
  expect(db.lookup("item").hasClosingTag).toBe(false);
});

test("schema: unknown child references are reported", () => {
  const build = (): unknown =>
    createSchemaDatabase(
      miniSchema([
        {
          tagName: "list",
          structName: "List",
          hasGlobalAttributes: true,
          hasClosingTag: true,
          permittedChildElements: ["Missing"]
        }
      ])
    );

  expect(build).toThrow(SchemaLoadError);
  try {
    build();
  } catch (error) {
    if (error instanceof SchemaLoadError) {
      expect(error.payload).toEqual({
        code: "UNKNOWN_CHILD_REFERENCE",
        detail: "no element is named Missing",
        tagName: "list"
      });
    }
  }
});

test("schema: malformed records are rejected", () => {
  expect(() => createSchemaDatabase(null)).toThrow(SchemaLoadError);
  expect(() => createSchemaDatabase({ elements: {} })).toThrow(SchemaLoadError);
  expect(() =>
    createSchemaDatabase(miniSchema([{ tagName: "x", structName: "X", hasGlobalAttributes: "yes", hasClosingTag: true }]))
  ).toThrow('Schema load failed: INVALID_SCHEMA_RECORD tag=x: "hasGlobalAttributes" must be a boolean');
  expect(() =>
    createSchemaDatabase(
      miniSchema([
        {
          tagName: "x",
          structName: "X",
          hasGlobalAttributes: true,
          hasClosingTag: true,
          attributes: [{ name: "y", type: "date" }]
        }
      ])
    )
  ).toThrow(SchemaLoadError);
});

test("schema: loadSchemaDatabase reads the bundled file", () => {
  const db = loadSchemaDatabase();
  expect(db).not.toBe(schema);
  expect(db.tagNames).toEqual(schema.tagNames);
});
