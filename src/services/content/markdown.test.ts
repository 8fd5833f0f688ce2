import test from "node:test";
import assert from "node:assert/strict";
import { cleanupMarkdown } from "./markdown-cleanup.js";
import { foldUnicodePunctuation, htmlToMarkdown, wrapParagraphs } from "./markdown.js";
import type { MarkdownRules } from "./types.js";

const rules: MarkdownRules = {
  ignoreLinks: true,
  ignoreImages: true,
  bodyWidth: 0,
  unicodeSnob: true,
  ignoreEmphasis: false,
  skipInternalLinks: true,
};

const convert = (html: string, overrides: Partial<MarkdownRules> = {}) =>
  cleanupMarkdown(htmlToMarkdown(html, { ...rules, ...overrides }));

test("head, scripts and styles never reach the markdown", () => {
  const html =
    "<html><head><title>Hidden title</title><style>.x { color: red }</style></head>" +
    "<body><h1>Hello</h1><script>var secret = 1;</script><p>World</p></body></html>";
  assert.equal(convert(html), "# Hello\n\nWorld");
});

test("links keep only their text when links are ignored", () => {
  const html = '<p>Read <a href="https://example.com/x">the docs</a> now</p>';
  assert.equal(convert(html), "Read the docs now");
});

test("links are kept as inline links when enabled", () => {
  const html = '<p>Read <a href="https://example.com/x">the docs</a> now</p>';
  assert.equal(convert(html, { ignoreLinks: false }), "Read [the docs](https://example.com/x) now");
});

test("fragment links lose their target when internal links are skipped", () => {
  const html = '<p><a href="#top">Back</a> to top</p>';
  assert.equal(convert(html, { ignoreLinks: false }), "Back to top");
});

test("images are dropped when ignored", () => {
  const markdown = convert('<p>Chart <img src="chart.png" alt="Revenue"> below</p>');
  assert.equal(markdown.includes("chart.png"), false);
  assert.equal(markdown.includes("Revenue"), false);
});

test("emphasis markers follow the ignoreEmphasis rule", () => {
  const html = "<p>Some <strong>bold</strong> text</p>";
  assert.equal(convert(html), "Some **bold** text");
  assert.equal(convert(html, { ignoreEmphasis: true }), "Some bold text");
});

test("typographic punctuation is folded to ASCII unless unicode is kept", () => {
  const html = "<p>“Quoted” – done…</p>";
  assert.equal(convert(html, { unicodeSnob: false }), '"Quoted" - done...');
  assert.equal(convert(html), "“Quoted” – done…");
});

test("foldUnicodePunctuation maps quotes, dashes and spaces", () => {
  assert.equal(foldUnicodePunctuation("it’s — fine now"), "it's - fine now");
});

test("wrapParagraphs wraps plain lines at the body width", () => {
  assert.equal(wrapParagraphs("one two three four five", 9), "one two\nthree\nfour five");
});

test("wrapParagraphs leaves headings, list items and code alone", () => {
  const markdown = "# a very long heading here\n- a very long list item\n```\nsome long code line\n```";
  assert.equal(wrapParagraphs(markdown, 5), markdown);
});

test("a body width of zero never wraps", () => {
  const line = "word ".repeat(40).trim();
  assert.equal(wrapParagraphs(line, 0), line);
});
