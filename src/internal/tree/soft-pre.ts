import type { NodeHandle } from "../arena/handle.js";
import type { HtmlBuilder } from "./build.js";

const NBSP = "\u00a0";
const DEFAULT_TAB_WIDTH = 8;

export interface SoftPreOptions {
  /** Non-breaking spaces written per tab. `null` keeps tabs. Defaults to 8. */
  readonly tabWidth?: number | null;
  readonly lineSeparator?: string;
}

/**
 * Lays out plain text the way `<pre>` would while still letting long lines wrap:
 * each line is followed by a `<br>`, all inside `<div class="soft_pre">`.
 */
export function softPre(html: HtmlBuilder, text: string, options: SoftPreOptions = {}): NodeHandle {
  const tabWidth = options.tabWidth === undefined ? DEFAULT_TAB_WIDTH : options.tabWidth;
  const tab = tabWidth === null ? "\t" : NBSP.repeat(Math.max(0, Math.floor(tabWidth)));
  const children: NodeHandle[] = [];

  for (const line of text.split(options.lineSeparator ?? "\n")) {
    const value = line.replace(/\t/g, tab);
    if (value !== "") {
      children.push(html.text(value));
    }
    children.push(html.br());
  }

  return html.div({ class: "soft_pre" }, children);
}
