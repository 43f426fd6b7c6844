import { escapeHtml } from "./html";

// Longest prefix first so "# " never eats the tail of "## ".
const HEADINGS: [RegExp, string][] = [
  [/#### (.+)/g, "<h4>$1</h4>"],
  [/### (.+)/g, "<h3>$1</h3>"],
  [/## (.+)/g, "<h2>$1</h2>"],
  [/# (.+)/g, "<h1>$1</h1>"],
];

const EMPHASIS: [RegExp, string][] = [
  [/\*\*\*(.+?)\*\*\*/g, "<strong><em>$1</em></strong>"],
  [/\*\*(.+?)\*\*/g, "<strong>$1</strong>"],
  [/\*(.+?)\*/g, "<em>$1</em>"],
];

/**
 * Line-oriented Markdown subset: headings, bold/italic and paragraphs.
 * Not a block parser; nested or malformed input comes out best-effort.
 */
export function markdownToHtml(markdown: string): string {
  let out = escapeHtml(markdown);

  for (const [pattern, replacement] of [...HEADINGS, ...EMPHASIS]) {
    out = out.replace(pattern, replacement);
  }

  out = out.replaceAll("\n\n", "</p><p>").replaceAll("\n", "<br>");
  return `<p>${out}</p>`;
}
