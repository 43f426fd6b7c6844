import { escapeHtml } from "../core/html";
import type { ContentItem } from "../core/item";

const HLJS_BASE = "https://cdnjs.cloudflare.com/ajax/libs/highlight.js/11.9.0";
const HLJS_LANGUAGES = ["javascript", "python", "css", "json"];

export function pageFileName(identifier: string): string {
  return `${identifier}.html`;
}

/** Full viewer document for one item, wrapping its rendered fragment. */
export function renderItemPage(item: ContentItem, fragment: string): string {
  const id = escapeHtml(item.identifier);
  const languageScripts = HLJS_LANGUAGES.map(
    (lang) => `    <script src="${HLJS_BASE}/languages/${lang}.min.js"></script>`
  ).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${id} - Content Viewer</title>
    <link rel="stylesheet" href="styles.css">
    <link rel="stylesheet" href="${HLJS_BASE}/styles/github.min.css">
    <script src="${HLJS_BASE}/highlight.min.js"></script>
${languageScripts}
</head>
<body>
    <div class="container">
        <nav class="breadcrumb">
            <a href="index.html">← Back to All Content</a>
        </nav>

        <header class="content-header">
            <h1>${id}</h1>
            <div class="meta">
                <span class="badge type-${item.type}">${item.type.toUpperCase()}</span>
                <span class="badge subtype-${escapeHtml(item.subtype)}">${escapeHtml(item.subtype)}</span>
                <span class="description">${escapeHtml(item.description)}</span>
            </div>
        </header>

        <main class="content-display">
            ${fragment}
        </main>
    </div>

    <script>
        document.addEventListener('DOMContentLoaded', function() {
            document.querySelectorAll('pre code').forEach((block) => {
                hljs.highlightElement(block);
            });
        });
    </script>
</body>
</html>`;
}
