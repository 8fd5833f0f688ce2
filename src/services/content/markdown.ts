import { NodeHtmlMarkdown, type TranslatorConfig, type TranslatorConfigObject } from "node-html-markdown";
import type { MarkdownRules } from "./types.js";

const IGNORED_ELEMENTS = ["head", "script", "style", "noscript", "template"];

const ASCII_FOLDS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[\u2018\u2019\u201a\u2032]/g, "'"],
  [/[\u201c\u201d\u201e\u2033]/g, '"'],
  [/[\u2010-\u2015\u2212]/g, "-"],
  [/\u2026/g, "..."],
  [/[\u00a0\u2007\u202f]/g, " "],
];

const CODE_FENCE = /^\s*(```|~~~)/;
// Lines that carry markdown structure and must keep their line start.
const STRUCTURAL_LINE = /^(?:\s{4}|\s*(?:#|[-*+]\s|\d+[.)]\s|>|\|))/;

interface AttributeSource {
  getAttribute(name: string): string | undefined | null;
}

const hasAttributes = (node: unknown): node is AttributeSource =>
  typeof node === "object" &&
  node !== null &&
  "getAttribute" in node &&
  typeof node.getAttribute === "function";

const readHref = (ctx: unknown): string | undefined => {
  if (typeof ctx !== "object" || ctx === null || !("node" in ctx)) return undefined;
  const { node } = ctx;
  if (!hasAttributes(node)) return undefined;
  return node.getAttribute("href")?.trim() || undefined;
};

const TEXT_ONLY: TranslatorConfig = {};

const buildLinkTranslator =
  (rules: MarkdownRules) =>
  (ctx: unknown): TranslatorConfig => {
    if (rules.ignoreLinks) return TEXT_ONLY;
    const href = readHref(ctx);
    if (!href) return TEXT_ONLY;
    if (rules.skipInternalLinks && href.startsWith("#")) return TEXT_ONLY;
    return { prefix: "[", postfix: `](${href})` };
  };

const buildTranslators = (rules: MarkdownRules): TranslatorConfigObject => {
  const translators: TranslatorConfigObject = {
    a: buildLinkTranslator(rules),
  };
  if (rules.ignoreImages) {
    translators.img = { ignore: true };
  }
  if (rules.ignoreEmphasis) {
    translators["strong,b,em,i"] = TEXT_ONLY;
  }
  return translators;
};

export const foldUnicodePunctuation = (text: string): string =>
  ASCII_FOLDS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);

const wrapLine = (line: string, width: number): string[] => {
  const words = line.split(/\s+/).filter(Boolean);
  const wrapped: string[] = [];
  let current = "";
  for (const word of words) {
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current = `${current} ${word}`;
    } else {
      wrapped.push(current);
      current = word;
    }
  }
  if (current) wrapped.push(current);
  return wrapped;
};

/** Greedy word wrap of paragraph lines. Code blocks and structural lines are left alone. */
export const wrapParagraphs = (markdown: string, width: number): string => {
  if (width <= 0) return markdown;

  let inFence = false;
  const output: string[] = [];
  for (const line of markdown.split("\n")) {
    if (CODE_FENCE.test(line)) {
      inFence = !inFence;
      output.push(line);
      continue;
    }
    if (inFence || line.length <= width || !line.trim() || STRUCTURAL_LINE.test(line)) {
      output.push(line);
      continue;
    }
    output.push(...wrapLine(line, width));
  }
  return output.join("\n");
};

/**
 * Converts an HTML document to markdown under the given rules. A converter is
 * built per call so no state is shared between documents.
 */
export const htmlToMarkdown = (html: string, rules: MarkdownRules): string => {
  const converter = new NodeHtmlMarkdown(
    {
      ignore: IGNORED_ELEMENTS,
      bulletMarker: "-",
      codeFence: "```",
      codeBlockStyle: "fenced",
      emDelimiter: "_",
      strongDelimiter: "**",
      keepDataImages: false,
    },
    buildTranslators(rules),
  );

  let markdown = converter.translate(html);
  if (!rules.unicodeSnob) markdown = foldUnicodePunctuation(markdown);
  return wrapParagraphs(markdown, rules.bodyWidth);
};
