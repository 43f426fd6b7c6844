import type { Classification, ContentType } from "./detect";
import { charLength, stripWhitespace, truncateChars } from "./text";

export const UNKNOWN_DESCRIPTION = "Unknown Document";
export const IMAGE_PREVIEW = "[Image Preview]";
export const EMPTY_PREVIEW = "[No text preview available]";

const TITLE_CHARS = 60;
const PREVIEW_CHARS = 150;

const LABELS: ReadonlyMap<string, string> = new Map([
  ["image/jpeg", "JPEG Image"],
  ["image/png", "PNG Image"],
  ["image/gif", "GIF Image"],
  ["image/webp", "WebP Image"],
  ["html/html", "HTML Document"],
  ["markdown/markdown", "Markdown Article"],
  ["code/react", "React Component"],
  ["code/javascript", "JavaScript Code"],
  ["code/python", "Python Script"],
  ["code/css", "CSS Stylesheet"],
  ["json/json", "JSON Data"],
  ["xml/xml", "XML Document"],
  ["text/text", "Text Document"],
  ["binary/unknown", "Binary File"],
]);

export function labelFor(type: ContentType, subtype: string): string {
  return LABELS.get(`${type}/${subtype}`) ?? UNKNOWN_DESCRIPTION;
}

type Extractor = (text: string, subtype: string) => string | null;

const EXTRACTORS: Partial<Record<ContentType, Extractor>> = {
  markdown: (text) => {
    const heading = /^#\s+(.+)$/m.exec(text);
    return heading ? `Article: ${truncateChars(heading[1], TITLE_CHARS)}` : null;
  },
  html: (text) => {
    const title = /<title[^>]*>([^<]+)<\/title>/i.exec(text);
    if (title) return `HTML Page: ${truncateChars(title[1], TITLE_CHARS)}`;
    const lower = text.toLowerCase();
    if (lower.includes("form")) return "HTML Form/Widget";
    if (lower.includes("canvas")) return "HTML Canvas Visualization";
    return null;
  },
  code: (text, subtype) => {
    if (subtype === "react") {
      const component = /const\s+(\w+)\s*=/.exec(text);
      return component ? `React: ${component[1]} Component` : "React Component";
    }
    if (subtype === "python") {
      const fn = /def\s+(\w+)\s*\(/.exec(text);
      return fn ? `Python: ${fn[1]}() function` : "Python Script";
    }
    return null;
  },
};

/**
 * Human-readable label for a classified blob. Tries to pull a better title
 * out of the content and falls back to the label table.
 */
export function describeContent({ type, subtype }: Classification, text: string): string {
  return EXTRACTORS[type]?.(text, subtype) ?? labelFor(type, subtype);
}

/** Single-line card preview of the content. */
export function previewContent(type: ContentType, text: string): string {
  if (type === "image") return IMAGE_PREVIEW;

  const flat = stripWhitespace(text.replace(/[^\S\uFEFF]+/g, " "));
  if (charLength(flat) > PREVIEW_CHARS) return truncateChars(flat, PREVIEW_CHARS) + "...";
  return flat || EMPTY_PREVIEW;
}
