import { pathToFileURL } from "url";
import { escapeHtml } from "../core/html";
import { formatDate, formatMinutes } from "../core/time";
import { newestFirst, type NoteEntry } from "./registry";
import { substituteTemplate } from "./template";
import type { Theme, ThemesConfig } from "./themes";

const DOC_ICON =
  '<svg viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2"><path d="M14 2H6a2 2 0 0 0-2 2v16a2 2 0 0 0 2 2h12a2 2 0 0 0 2-2V8z"/><polyline points="14 2 14 8 20 8"/></svg>';
const TOOL_ICON =
  '<svg viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2"><path d="M14.7 6.3a1 1 0 0 0 0 1.4l1.6 1.6a1 1 0 0 0 1.4 0l3.77-3.77a6 6 0 0 1-7.94 7.94l-6.91 6.91a2.12 2.12 0 0 1-3-3l6.91-6.91a6 6 0 0 1 7.94-7.94l-3.76 3.76z"/></svg>';
const CALENDAR_ICON = `<svg viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2">
          <rect x="3" y="4" width="18" height="18" rx="2" ry="2"/>
          <line x1="16" y1="2" x2="16" y2="6"/>
          <line x1="8" y1="2" x2="8" y2="6"/>
          <line x1="3" y1="10" x2="21" y2="10"/>
        </svg>`;
const FILE_LINES_ICON = `<svg viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2">
          <path d="M14 2H6a2 2 0 0 0-2 2v16a2 2 0 0 0 2 2h12a2 2 0 0 0 2-2V8z"/>
          <polyline points="14 2 14 8 20 8"/>
          <line x1="16" y1="13" x2="8" y2="13"/>
          <line x1="16" y1="17" x2="8" y2="17"/>
          <polyline points="10 9 9 9 8 9"/>
        </svg>`;
const SHIELD_ICON = `<svg viewBox="0 0 24 24" fill="none" stroke="currentColor" stroke-width="2">
          <path d="M12 22s8-4 8-10V5l-8-3-8 3v7c0 6 8 10 8 10z"/>
        </svg>`;

export const TABLE_HEADER_HTML = "<tr><th>Title</th><th>Location</th><th>Added</th></tr>";

export const EMPTY_ROW_HTML = `<tr><td colspan="3" class="empty-state"><div class="empty-icon">${DOC_ICON}</div><div class="empty-title">No notes yet</div><div class="empty-text">Add your first note to get started</div></td></tr>`;

function fileHref(path: string): string {
  return escapeHtml(pathToFileURL(path).href);
}

/** "Today", the newest entry's date, or "Never". */
export function lastUpdatedLabel(entries: NoteEntry[], now: Date): string {
  const [latest] = newestFirst(entries);
  if (!latest) return "Never";
  const date = latest.added.slice(0, 10);
  return date === formatDate(now) ? "Today" : date;
}

function statItem(icon: string, value: string, label: string): string {
  return `
    <div class="stat-item">
      <div class="stat-icon">
        ${icon}
      </div>
      <div class="stat-content">
        <span class="stat-value">${escapeHtml(value)}</span>
        <span class="stat-label">${label}</span>
      </div>
    </div>
    `;
}

export function renderStats(entries: NoteEntry[], now: Date): string {
  return [
    statItem(FILE_LINES_ICON, String(entries.length), "Total Notes"),
    statItem(CALENDAR_ICON, lastUpdatedLabel(entries, now), "Last Updated"),
    statItem(SHIELD_ICON, "Private", "Access"),
  ].join("");
}

function iconFor(path: string): string {
  return path.toLowerCase().includes("tools") ? TOOL_ICON : DOC_ICON;
}

export function renderTableRows(entries: NoteEntry[]): string {
  if (entries.length === 0) return EMPTY_ROW_HTML;

  return newestFirst(entries)
    .map(
      (entry) => `<tr>
    <td>
      <div class="note-title">
        <div class="note-icon">${iconFor(entry.path)}</div>
        <a href="${fileHref(entry.path)}" class="note-link">${escapeHtml(entry.title)}</a>
      </div>
    </td>
    <td><code class="note-path">${escapeHtml(entry.path)}</code></td>
    <td>
      <span class="note-date">
        ${CALENDAR_ICON}
        ${entry.added.slice(0, 10)}
      </span>
    </td>
  </tr>`
    )
    .join("\n");
}

export function renderThemeLinks(themes: Theme[]): string {
  return themes.map((t) => `<link rel="stylesheet" href="${escapeHtml(t.cssUrl)}">`).join("\n  ");
}

export function renderThemeOptions(themes: Theme[], defaultTheme: string): string {
  return themes
    .map((t) => {
      const selected = t.id === defaultTheme ? " selected" : "";
      return `<option value="${escapeHtml(t.id)}"${selected}>${escapeHtml(t.name)}</option>`;
    })
    .join("\n            ");
}

/** Themed notes index, filled into the HTML template. */
export function renderNotesIndex(
  entries: NoteEntry[],
  config: ThemesConfig,
  template: string,
  now: Date
): string {
  const page = config.pageTypes.index ?? {};

  return substituteTemplate(template, {
    title: "Notes Index",
    default_theme: config.defaultTheme,
    theme_selector_options: renderThemeOptions(config.themes, config.defaultTheme),
    theme_css_links: renderThemeLinks(config.themes),
    css_core: `${config.cssBaseUrl}/core.css`,
    css_page: `${config.cssBaseUrl}/${page.css_file ?? "index.css"}`,
    badge_text: page.badge_default ?? "Knowledge Base",
    subtitle: page.subtitle_default ?? "Your personal collection of linked documents",
    stats_html: renderStats(entries, now),
    table_header_html: TABLE_HEADER_HTML,
    table_rows_html: renderTableRows(entries),
    last_updated: `Updated ${formatMinutes(now)}`,
  });
}

/** Bare list page, used when the themed template is unavailable. */
export function renderFallbackIndex(entries: NoteEntry[]): string {
  const rows = newestFirst(entries).map(
    (e) => `<li><a href="${fileHref(e.path)}">${escapeHtml(e.title)}</a> (${e.added.slice(0, 10)})</li>`
  );
  const list = rows.length ? rows.join("\n") : "<li>No notes yet.</li>";
  return (
    "<!doctype html>\n" +
    '<html><head><meta charset="utf-8"><title>Notes Index</title></head>\n' +
    `<body><h1>Notes Index</h1><ul>${list}</ul></body></html>`
  );
}
