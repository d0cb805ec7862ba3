// parse5 is used only on trusted, already rendered HTML: to summarize what a
// pre-serialized fragment contains and to recover its text.
import { defaultTreeAdapter, parseFragment } from "parse5";
import type { DefaultTreeAdapterMap } from "parse5";

type Parse5Node = DefaultTreeAdapterMap["node"];

const NON_WHITESPACE = /[^\t\n\f\r ]/;

export interface ParsedFragmentSummary {
  /** Tag names of the top-level elements, in document order, without duplicates. */
  readonly topLevelTags: readonly string[];
  /** Whether any top-level text node holds more than ASCII whitespace. */
  readonly hasText: boolean;
  /** Concatenated text of every text node, markup dropped. */
  readonly text: string;
}

function collectText(node: Parse5Node, out: string[]): void {
  if (defaultTreeAdapter.isTextNode(node)) {
    out.push(node.value);
    return;
  }

  if ("childNodes" in node) {
    for (const child of node.childNodes) {
      collectText(child, out);
    }
  }
}

export function parseHtmlFragment(html: string): ParsedFragmentSummary {
  const fragment = parseFragment(html);
  const topLevelTags: string[] = [];
  let hasText = false;

  for (const child of fragment.childNodes) {
    if (defaultTreeAdapter.isElementNode(child)) {
      if (!topLevelTags.includes(child.tagName)) {
        topLevelTags.push(child.tagName);
      }
    } else if (defaultTreeAdapter.isTextNode(child) && NON_WHITESPACE.test(child.value)) {
      hasText = true;
    }
  }

  const text: string[] = [];
  collectText(fragment, text);
  return { topLevelTags, hasText, text: text.join("") };
}

export function htmlToText(html: string): string {
  return parseHtmlFragment(html).text;
}
