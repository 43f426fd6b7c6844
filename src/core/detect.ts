import { stripWhitespace } from "./text";

export type ContentType =
  | "image"
  | "html"
  | "markdown"
  | "code"
  | "json"
  | "xml"
  | "text"
  | "binary";

export interface Classification {
  type: ContentType;
  subtype: string;
}

export interface DecodedContent {
  text: string;
  /** True when nothing readable survived decoding. */
  failed: boolean;
}

export interface ClassificationRule {
  name: string;
  matches: (text: string, decoded: DecodedContent) => boolean;
  result: Classification | ((text: string) => Classification);
}

export interface DetectionResult extends Classification {
  /** Decoded text, empty for images. */
  text: string;
}

const MARKDOWN_SCAN_CHARS = 500;

function startsWithBytes(bytes: Uint8Array, signature: number[], offset = 0): boolean {
  if (offset + signature.length > bytes.length) return false;
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

function ascii(value: string): number[] {
  return Array.from(value, (ch) => ch.charCodeAt(0));
}

const IMAGE_SIGNATURES: { subtype: string; test: (bytes: Uint8Array) => boolean }[] = [
  { subtype: "jpeg", test: (b) => startsWithBytes(b, [0xff, 0xd8, 0xff]) },
  { subtype: "png", test: (b) => startsWithBytes(b, [0x89, 0x50, 0x4e, 0x47]) },
  { subtype: "gif", test: (b) => startsWithBytes(b, [0x47, 0x49, 0x46, 0x38]) },
  {
    subtype: "webp",
    test: (b) => startsWithBytes(b, ascii("RIFF")) && startsWithBytes(b, ascii("WEBP"), 8),
  },
];

/**
 * Recognize binary image formats from their leading magic bytes.
 * Returns null when no signature matches.
 */
export function detectImageSignature(bytes: Uint8Array): Classification | null {
  for (const sig of IMAGE_SIGNATURES) {
    if (sig.test(bytes)) return { type: "image", subtype: sig.subtype };
  }
  return null;
}

type ByteRange = readonly [number, number];

const CONT: ByteRange = [0x80, 0xbf];

/** Allowed continuation bytes after a lead byte; null when it cannot start a sequence. */
function continuationRanges(lead: number): readonly ByteRange[] | null {
  if (lead <= 0x7f) return [];
  if (lead >= 0xc2 && lead <= 0xdf) return [CONT];
  if (lead === 0xe0) return [[0xa0, 0xbf], CONT];
  if (lead === 0xed) return [[0x80, 0x9f], CONT];
  if (lead >= 0xe1 && lead <= 0xef) return [CONT, CONT];
  if (lead === 0xf0) return [[0x90, 0xbf], CONT, CONT];
  if (lead >= 0xf1 && lead <= 0xf3) return [CONT, CONT, CONT];
  if (lead === 0xf4) return [[0x80, 0x8f], CONT, CONT];
  return null;
}

/**
 * Copy of `bytes` with every ill-formed UTF-8 subsequence removed. A broken
 * sequence drops its maximal prefix and resumes at the offending byte.
 */
export function dropInvalidUtf8(bytes: Uint8Array): Uint8Array {
  const kept: number[] = [];
  let i = 0;

  while (i < bytes.length) {
    const ranges = continuationRanges(bytes[i]);
    if (!ranges) {
      i++;
      continue;
    }

    let n = 0;
    while (n < ranges.length && i + 1 + n < bytes.length) {
      const [lo, hi] = ranges[n];
      const b = bytes[i + 1 + n];
      if (b < lo || b > hi) break;
      n++;
    }

    if (n === ranges.length) {
      for (let k = 0; k <= n; k++) kept.push(bytes[i + k]);
    }
    i += n + 1;
  }

  return Uint8Array.from(kept);
}

/**
 * Decode bytes as UTF-8, dropping invalid sequences. A leading BOM and any
 * U+FFFD actually present in the input are kept.
 * Decoding counts as failed only when the input was not valid UTF-8 and no
 * printable character is left once the invalid sequences are gone.
 */
export function decodeText(bytes: Uint8Array): DecodedContent {
  try {
    const text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
    return { text, failed: false };
  } catch {
    const text = new TextDecoder("utf-8", { ignoreBOM: true }).decode(dropInvalidUtf8(bytes));
    // eslint-disable-next-line no-control-regex
    const printable = /[^\s\x00-\x1f\x7f]/.test(text);
    return { text, failed: !printable };
  }
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ordered text heuristics. The first rule whose predicate matches decides the
 * label; order matters (structural markers before loose textual cues).
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: "undecodable",
    matches: (_text, decoded) => decoded.failed,
    result: { type: "binary", subtype: "unknown" },
  },
  {
    name: "html",
    matches: (text) => {
      const lower = text.toLowerCase();
      return lower.includes("<html") || lower.includes("<!doctype html");
    },
    result: { type: "html", subtype: "html" },
  },
  {
    name: "markdown",
    matches: (text) => {
      const head = text.slice(0, MARKDOWN_SCAN_CHARS);
      return stripWhitespace(text).startsWith("#") || head.includes("## ") || head.includes("**");
    },
    result: { type: "markdown", subtype: "markdown" },
  },
  {
    name: "javascript",
    matches: (text) =>
      text.includes("const ") ||
      text.includes("function ") ||
      text.includes("=>") ||
      text.includes("import "),
    result: (text) =>
      text.includes("React") || text.includes("Component")
        ? { type: "code", subtype: "react" }
        : { type: "code", subtype: "javascript" },
  },
  {
    name: "python",
    matches: (text) =>
      (text.includes("def ") || text.includes("import ") || text.includes("class ")) &&
      (text.includes("print(") || text.includes("def ")),
    result: { type: "code", subtype: "python" },
  },
  {
    name: "css",
    matches: (text) =>
      text.includes("{") &&
      (text.includes("color:") || text.includes("display:") || text.includes("margin:")),
    result: { type: "code", subtype: "css" },
  },
  {
    name: "json",
    matches: (text) => {
      const trimmed = stripWhitespace(text);
      return (trimmed.startsWith("{") || trimmed.startsWith("[")) && isJson(text);
    },
    result: { type: "json", subtype: "json" },
  },
  {
    name: "xml",
    matches: (text) => stripWhitespace(text).startsWith("<?xml"),
    result: { type: "xml", subtype: "xml" },
  },
];

const DEFAULT_CLASSIFICATION: Classification = { type: "text", subtype: "text" };

export function classifyText(decoded: DecodedContent): Classification {
  for (const rule of CLASSIFICATION_RULES) {
    if (!rule.matches(decoded.text, decoded)) continue;
    return typeof rule.result === "function" ? rule.result(decoded.text) : { ...rule.result };
  }
  return { ...DEFAULT_CLASSIFICATION };
}

/** Signature detection first, then the text heuristics. */
export function classifyContent(bytes: Uint8Array): DetectionResult {
  const image = detectImageSignature(bytes);
  if (image) return { ...image, text: "" };

  const decoded = decodeText(bytes);
  return { ...classifyText(decoded), text: decoded.text };
}
