/** Length in code points, so an astral character counts once. */
export function charLength(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

/** First `max` code points of `text`; never splits a surrogate pair. */
export function truncateChars(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join("");
}

// \s minus U+FEFF: a byte-order mark is content, not padding.
const EDGE_WHITESPACE = /^[^\S\uFEFF]+|[^\S\uFEFF]+$/g;

/** `trim()` that leaves a byte-order mark in place. */
export function stripWhitespace(text: string): string {
  return text.replace(EDGE_WHITESPACE, "");
}

/** `padEnd` by code points. */
export function padChars(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - charLength(text)));
}
