import { escapeHtml } from "./html";
import { markdownToHtml } from "./markdown";
import { formatJson } from "./json-format";
import { charLength, truncateChars } from "./text";
import type { ContentItem } from "./item";

export const HTML_SOURCE_CHARS = 5000;

function renderImage(item: ContentItem): string {
  const encoded = Buffer.from(item.bytes).toString("base64");
  return `<img src="data:image/${item.subtype};base64,${encoded}" alt="${escapeHtml(item.description)}" style="max-width: 100%; height: auto;">`;
}

function renderHtmlDocument(text: string): string {
  const escaped = escapeHtml(text);
  const excerpt =
    truncateChars(escaped, HTML_SOURCE_CHARS) + (charLength(escaped) > HTML_SOURCE_CHARS ? "..." : "");
  return `<div class="html-preview">
            <h3>HTML Source:</h3>
            <pre><code>${excerpt}</code></pre>
            <h3>HTML Preview:</h3>
            <iframe sandbox="allow-scripts" srcdoc="${escaped}" style="width: 100%; height: 600px; border: 1px solid #ddd;"></iframe>
        </div>`;
}

function renderJson(text: string): string {
  let formatted: string;
  try {
    formatted = formatJson(text);
  } catch {
    return `<pre><code>${escapeHtml(text)}</code></pre>`;
  }
  return `<pre><code class="language-json">${escapeHtml(formatted)}</code></pre>`;
}

/**
 * Content fragment for one item, chosen by its type. The caller embeds it in
 * a page; nothing is written here.
 */
export function renderFragment(item: ContentItem): string {
  switch (item.type) {
    case "image":
      return renderImage(item);
    case "html":
      return renderHtmlDocument(item.text);
    case "markdown":
      return markdownToHtml(item.text);
    case "code":
      return `<pre><code class="language-${item.subtype}">${escapeHtml(item.text)}</code></pre>`;
    case "json":
      return renderJson(item.text);
    default:
      return `<pre>${escapeHtml(item.text)}</pre>`;
  }
}
