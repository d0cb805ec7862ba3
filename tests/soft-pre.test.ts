import { expect, test } from "vitest";

import { Arena, HtmlBuilder, serialize, softPre, textContent } from "../src/public/mod.js";

function setup(): { arena: Arena; html: HtmlBuilder } {
  const arena = new Arena();
  return { arena, html: new HtmlBuilder(arena) };
}

test("soft pre: each line is followed by a line break", () => {
  const { arena, html } = setup();

  expect(serialize(arena, softPre(html, "foo bar"))).toBe('<div class="soft_pre">foo bar<br></div>');
});

test("soft pre: tabs become eight non-breaking spaces", () => {
  const { arena, html } = setup();
  const root = softPre(html, "foo bar\n\tbaz");

  expect(serialize(arena, root)).toBe(
    `<div class="soft_pre">foo bar<br>${"\u00a0".repeat(8)}baz<br></div>`
  );
});

test("soft pre: tab width and line separator are configurable", () => {
  const { arena, html } = setup();

  expect(serialize(arena, softPre(html, "a\tb", { tabWidth: 2 }))).toBe(
    '<div class="soft_pre">a\u00a0\u00a0b<br></div>'
  );
  expect(serialize(arena, softPre(html, "a\tb", { tabWidth: null }))).toBe(
    '<div class="soft_pre">a\tb<br></div>'
  );
  expect(serialize(arena, softPre(html, "one\r\ntwo", { lineSeparator: "\r\n" }))).toBe(
    '<div class="soft_pre">one<br>two<br></div>'
  );
});

test("soft pre: text is escaped and empty lines keep their break", () => {
  const { arena, html } = setup();
  const root = softPre(html, "<b>\n\nend");

  expect(serialize(arena, root)).toBe('<div class="soft_pre">&lt;b&gt;<br><br>end<br></div>');
  expect(textContent(arena, root)).toBe("<b>end");
});
