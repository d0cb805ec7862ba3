import type { Arena } from "../arena/arena.js";
import type { NodeHandle } from "../arena/handle.js";
import { parseHtmlFragment } from "../parse5-runtime.js";
import type { ContentSummary, SerializedFragment } from "../../public/types.js";
import { serialize } from "./serialize.js";

const NON_WHITESPACE = /[^\t\n\f\r ]/;

function summarize(arena: Arena, handle: NodeHandle, tagNames: Set<string>): boolean {
  const node = arena.resolve(handle);
  switch (node.kind) {
    case "element":
      tagNames.add(node.tagName);
      return false;
    case "text":
      return NON_WHITESPACE.test(node.value);
    case "preserialized":
      for (const tagName of node.fragment.content.tagNames) {
        tagNames.add(tagName);
      }
      return node.fragment.content.hasText;
    case "fragment": {
      let hasText = false;
      for (const child of node.children) {
        hasText = summarize(arena, child, tagNames) || hasText;
      }
      return hasText;
    }
  }
}

/**
 * Renders `handle` once into an arena-independent fragment. Inserting the fragment
 * anywhere serializes to exactly the bytes the original subtree would have produced.
 */
export function preserialize(arena: Arena, handle: NodeHandle): SerializedFragment {
  const tagNames = new Set<string>();
  const hasText = summarize(arena, handle, tagNames);
  const content: ContentSummary = Object.freeze({ tagNames: Object.freeze([...tagNames]), hasText });
  return Object.freeze({ html: serialize(arena, handle), content });
}

/** Wraps trusted, already rendered HTML. The markup is kept as given; parse5 only derives its summary. */
export function adoptHtml(html: string): SerializedFragment {
  const parsed = parseHtmlFragment(html);
  const content: ContentSummary = Object.freeze({
    tagNames: Object.freeze([...parsed.topLevelTags]),
    hasText: parsed.hasText
  });
  return Object.freeze({ html, content });
}
