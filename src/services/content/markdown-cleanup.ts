const LINE_ENDINGS = /\r\n?|[\u2028\u2029]/g;
const MULTI_NEWLINES = /\n{3,}/g;
const SPACES_BEFORE_NEWLINE = / +\n/g;
const EMPTY_LINK = /\[\]\([^)]*\)/g;
const EMPTY_BRACKET_LINE = /^\[\][^\S\n]*$/gm;
const RULE_LINE = /^[-_]{3,}[^\S\n]*$/gm;
const EMPTY_HEADER_LINE = /^#+[^\S\n]*$/gm;
const BLANK_LINE_RUN = /\n(?:[^\S\n]*\n){2,}/g;
const BULLET_MARKER = /^[*+-][^\S\n]+/gm;
const HEADER_SPACING = /^(#{1,6})[^\S\n]*(.+)$/gm;

const MAX_PASSES = 8;

const replaceUntilStable = (text: string, pattern: RegExp, replacement: string): string => {
  let current = text;
  for (;;) {
    const next = current.replace(pattern, replacement);
    if (next === current) return next;
    current = next;
  }
};

const cleanupPass = (raw: string): string => {
  let markdown = raw.replace(LINE_ENDINGS, "\n");

  markdown = markdown.replace(MULTI_NEWLINES, "\n\n");
  markdown = markdown.replace(SPACES_BEFORE_NEWLINE, "\n");
  // `[[]()]()` only reveals its outer empty link once the inner one is gone.
  markdown = replaceUntilStable(markdown, EMPTY_LINK, "");
  markdown = markdown.replace(EMPTY_BRACKET_LINE, "");
  markdown = markdown.replace(RULE_LINE, "---");
  markdown = markdown.replace(EMPTY_HEADER_LINE, "");
  markdown = markdown.replace(BLANK_LINE_RUN, "\n\n");
  markdown = markdown
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n");
  markdown = markdown.replace(BULLET_MARKER, "- ");
  markdown = markdown.replace(HEADER_SPACING, "$1 $2");

  return markdown.trim();
};

/**
 * Normalizes converter output: blank-line runs, empty links and headers, rules,
 * bullets and header spacing. Pure and idempotent; the pass is repeated until
 * the text stops changing because trimming can expose a new line start.
 */
export const cleanupMarkdown = (raw: string): string => {
  let markdown = raw;
  for (let pass = 0; pass < MAX_PASSES; pass += 1) {
    const next = cleanupPass(markdown);
    if (next === markdown) return next;
    markdown = next;
  }
  return markdown;
};
