import { escapeHtml } from "../core/html";
import { formatTimestamp } from "../core/time";
import { truncateChars } from "../core/text";
import type { ContentType } from "../core/detect";

export interface SiteEntry {
  identifier: string;
  type: ContentType;
  subtype: string;
  description: string;
  preview: string;
  page: string;
}

const FILTERS: { type: ContentType; label: string }[] = [
  { type: "markdown", label: "Articles" },
  { type: "html", label: "HTML" },
  { type: "code", label: "Code" },
  { type: "image", label: "Images" },
  { type: "text", label: "Text" },
];

export function renderCard(entry: SiteEntry): string {
  const type = entry.type;
  const subtype = escapeHtml(entry.subtype);
  return `<article class="card type-${type}" data-type="${type}" data-subtype="${subtype}">
            <a href="${escapeHtml(entry.page)}" class="card-link">
                <div class="card-header">
                    <span class="card-id">${escapeHtml(truncateChars(entry.identifier, 8))}...</span>
                    <span class="card-type">${type.toUpperCase()}</span>
                </div>
                <div class="card-body">
                    <h3 class="card-title">${escapeHtml(truncateChars(entry.description, 80))}</h3>
                    <p class="card-preview">${escapeHtml(truncateChars(entry.preview, 120))}</p>
                </div>
                <div class="card-footer">
                    <span class="badge">${subtype}</span>
                    <span class="view-link">View →</span>
                </div>
            </a>
        </article>`;
}

export function renderFilterButtons(entries: SiteEntry[]): string {
  const buttons = [
    `<button class="filter-btn active" data-filter="all">All (${entries.length})</button>`,
    ...FILTERS.map(({ type, label }) => {
      const count = entries.filter((e) => e.type === type).length;
      return `<button class="filter-btn" data-filter="${type}">${label} (${count})</button>`;
    }),
  ];
  return buttons.join("\n                ");
}

/** Card-grid listing page with client-side search and type filters. */
export function renderSiteIndex(entries: SiteEntry[], generatedAt: Date): string {
  const cards = entries.map(renderCard).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Content Browser - ${entries.length} Items</title>
    <link rel="stylesheet" href="styles.css">
</head>
<body>
    <div class="container">
        <header class="site-header">
            <h1>📁 Content Browser</h1>
            <p class="subtitle">Browse ${entries.length} content files from subdirectories</p>
        </header>

        <section class="filters">
            <div class="search-box">
                <input type="text" id="searchInput" placeholder="Search by description..." autocomplete="off">
            </div>
            <div class="filter-buttons">
                ${renderFilterButtons(entries)}
            </div>
        </section>

        <main class="card-grid">
            ${cards}
        </main>

        <footer class="site-footer">
            <p>Generated on ${formatTimestamp(generatedAt)}</p>
        </footer>
    </div>

    <script>
        const searchInput = document.getElementById('searchInput');
        const cards = document.querySelectorAll('.card');

        searchInput.addEventListener('input', function(e) {
            const query = e.target.value.toLowerCase();
            cards.forEach(card => {
                const title = card.querySelector('.card-title').textContent.toLowerCase();
                const preview = card.querySelector('.card-preview').textContent.toLowerCase();
                card.style.display = title.includes(query) || preview.includes(query) ? '' : 'none';
            });
        });

        const filterBtns = document.querySelectorAll('.filter-btn');
        filterBtns.forEach(btn => {
            btn.addEventListener('click', function() {
                filterBtns.forEach(b => b.classList.remove('active'));
                this.classList.add('active');

                const filter = this.getAttribute('data-filter');
                cards.forEach(card => {
                    const match = filter === 'all' || card.getAttribute('data-type') === filter;
                    card.style.display = match ? '' : 'none';
                });
            });
        });
    </script>
</body>
</html>`;
}
