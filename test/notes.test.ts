import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { pathToFileURL } from "url";
import { substituteTemplate } from "../src/notes/template";
import {
  appendNote,
  extractTitle,
  formatNoteList,
  loadRegistry,
  RegistryError,
  type NoteEntry,
} from "../src/notes/registry";
import { discoverThemes, loadThemesConfig, themeDisplayName, type ThemesConfig } from "../src/notes/themes";
import {
  lastUpdatedLabel,
  renderFallbackIndex,
  renderNotesIndex,
  renderTableRows,
  EMPTY_ROW_HTML,
} from "../src/notes/index-page";
import { addNote, initializeWorkspace, removeNotes, validateNotesAssets } from "../src/notes/workspace";
import { notesPaths, type NotesPaths } from "../src/notes/paths";
import { runNotesIn } from "../src/commands/notes";

const ENTRIES: NoteEntry[] = [
  { title: "Short", path: "/a.html", added: "2026-01-01T10:00:00" },
  { title: "T".repeat(45), path: "/tools/b.html", added: "2026-02-01T09:00:00" },
];

describe("substituteTemplate", () => {
  test("fills known names and leaves the rest", () => {
    expect(substituteTemplate("Hello $name, ${name}! $$5 $missing ${other}", { name: "Ada" })).toBe(
      "Hello Ada, Ada! $5 $missing ${other}"
    );
  });
});

describe("extractTitle", () => {
  test("uses the last title element, trimmed", () => {
    expect(extractTitle("<title> First </title><TITLE lang='en'>\n  Second \n</TITLE>", "fb")).toBe("Second");
  });

  test("falls back when missing or blank", () => {
    expect(extractTitle("<p>none</p>", "fb")).toBe("fb");
    expect(extractTitle("<title>   </title>", "fb")).toBe("fb");
  });
});

describe("formatNoteList", () => {
  test("prints newest first with truncated titles", () => {
    expect(formatNoteList(ENTRIES).split("\n")).toEqual([
      `${"Title".padEnd(40)} ${"Added".padEnd(12)} Path`,
      "-".repeat(80),
      `${"T".repeat(38)}.. 2026-02-01   /tools/b.html`,
      `Short${" ".repeat(35)} 2026-01-01   /a.html`,
    ]);
  });

  test("widths count characters, not UTF-16 units", () => {
    const lines = formatNoteList([
      { title: "😀 notes", path: "/e.html", added: "2026-03-01T00:00:00" },
      { title: "😀".repeat(41), path: "/f.html", added: "2026-02-01T00:00:00" },
    ]).split("\n");
    expect(lines[2]).toBe(`😀 notes${" ".repeat(33)} 2026-03-01   /e.html`);
    expect(lines[3]).toBe(`${"😀".repeat(38)}.. 2026-02-01   /f.html`);
  });

  test("empty registry", () => {
    expect(formatNoteList([])).toBe("No notes registered yet.");
  });
});

describe("themes", () => {
  test("display names are title-cased words", () => {
    expect(themeDisplayName("solarized-light")).toBe("Solarized Light");
    expect(themeDisplayName("modern")).toBe("Modern");
  });
});

describe("index page", () => {
  const config: ThemesConfig = {
    defaultTheme: "modern",
    themes: [],
    cssBaseUrl: "file:///n/styles",
    pageTypes: {},
  };

  test("last updated label", () => {
    expect(lastUpdatedLabel([], new Date(2026, 1, 1))).toBe("Never");
    expect(lastUpdatedLabel(ENTRIES, new Date(2026, 1, 1, 18))).toBe("Today");
    expect(lastUpdatedLabel(ENTRIES, new Date(2026, 2, 1))).toBe("2026-02-01");
  });

  test("table rows link the file and escape the title", () => {
    const rows = renderTableRows([{ title: "Tom & Jerry", path: "/x/y.html", added: "2026-03-04T00:00:00" }]);
    expect(rows).toContain(`<a href="${pathToFileURL("/x/y.html").href}" class="note-link">Tom &amp; Jerry</a>`);
    expect(rows).toContain('<code class="note-path">/x/y.html</code>');
    expect(renderTableRows([])).toBe(EMPTY_ROW_HTML);
  });

  test("fills the template", () => {
    const template = "$title|$badge_text|$css_core|$last_updated|$table_header_html";
    expect(renderNotesIndex([], config, template, new Date(2026, 4, 6, 7, 8))).toBe(
      "Notes Index|Knowledge Base|file:///n/styles/core.css|Updated 2026-05-06 07:08|<tr><th>Title</th><th>Location</th><th>Added</th></tr>"
    );
  });

  test("fallback page", () => {
    expect(renderFallbackIndex([])).toContain("<ul><li>No notes yet.</li></ul>");
  });
});

describe("workspace", () => {
  let dir: string;
  let paths: NotesPaths;
  let notePage: string;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), "content-notes-"));
    paths = notesPaths(join(dir, "notes"));
    notePage = join(dir, "page.html");
    writeFileSync(notePage, "<html><title>Tom &amp; Friends</title></html>");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  test("initialization creates registry, index and styles", async () => {
    await initializeWorkspace(paths);
    expect(readFileSync(paths.registryFile, "utf-8")).toBe("[]");
    expect(readFileSync(paths.indexFile, "utf-8")).toContain('data-theme="modern"');
    expect(validateNotesAssets(paths)).toEqual([]);
  });

  test("bundled themes are discovered and named", async () => {
    await initializeWorkspace(paths);
    const themes = discoverThemes(paths);
    expect(themes.map((t) => [t.id, t.supportsDark])).toEqual([
      ["modern", true],
      ["paper", false],
    ]);

    const config = loadThemesConfig(paths);
    expect(config.defaultTheme).toBe("modern");
    expect(config.themes.map((t) => t.name)).toEqual(["Modern", "Paper (Serif)"]);
    expect(loadThemesConfig(paths, "paper").defaultTheme).toBe("paper");
  });

  test("add registers once and rewrites the index", async () => {
    await initializeWorkspace(paths);
    const now = new Date(2026, 0, 2, 3, 4, 5);

    const first = await addNote(paths, notePage, { now });
    expect(first.created).toBe(true);
    expect(first.entry).toEqual({ title: "Tom &amp; Friends", path: notePage, added: "2026-01-02T03:04:05" });
    expect(readFileSync(paths.indexFile, "utf-8")).toContain("Tom &amp;amp; Friends");

    const second = await addNote(paths, notePage, { title: "Other" });
    expect(second.created).toBe(false);
    expect(loadRegistry(paths)).toHaveLength(1);
  });

  test("appendNote leaves the list alone for a known path", () => {
    const { entries } = appendNote([], notePage, { title: "Mine" });
    const again = appendNote(entries, notePage);
    expect(again.created).toBe(false);
    expect(again.entries).toBe(entries);
    expect(again.entry.title).toBe("Mine");
  });

  test("remove matches title case-insensitively", async () => {
    await initializeWorkspace(paths);
    await addNote(paths, notePage, { title: "Weekly Review" });
    expect(await removeNotes(paths, "nothing-like-it")).toBe(0);
    expect(await removeNotes(paths, "weekly")).toBe(1);
    expect(loadRegistry(paths)).toEqual([]);
  });

  test("corrupt registry raises RegistryError", () => {
    writeFileSync(join(dir, "notes.json"), "{not json");
    const broken = notesPaths(dir);
    expect(() => loadRegistry(broken)).toThrow(RegistryError);

    writeFileSync(join(dir, "notes.json"), '[{"title":1}]');
    expect(() => loadRegistry(broken)).toThrow("unexpected shape");
  });

  test("notes command: list, shorthand add, remove miss", async () => {
    expect(await runNotesIn(paths, { positionals: ["list"], title: null })).toBe(0);
    expect(console.log).toHaveBeenCalledWith("No notes registered yet.");

    expect(await runNotesIn(paths, { positionals: [notePage], title: "Custom" })).toBe(0);
    expect(loadRegistry(paths).map((e) => e.title)).toEqual(["Custom"]);

    expect(await runNotesIn(paths, { positionals: ["remove", "no-such-note"], title: null })).toBe(1);
    expect(console.error).toHaveBeenCalledWith("✗ No notes found matching: no-such-note");
  });
});
