import { existsSync, readFileSync } from "fs";
import { cp } from "fs/promises";
import { join } from "path";
import { ensureDir, writeOutput } from "../core/output";
import { errorMessage } from "../core/errors";
import { cliLog, cliWarn } from "../shared/cli-output";
import type { NotesPaths } from "./paths";
import {
  appendNote,
  loadRegistry,
  matchesIdentifier,
  saveRegistry,
  type AddResult,
  type NoteEntry,
} from "./registry";
import { loadThemesConfig } from "./themes";
import { renderFallbackIndex, renderNotesIndex } from "./index-page";

export const REQUIRED_CSS = ["core.css", "index.css"];

export interface IndexOptions {
  defaultTheme?: string;
  now?: Date;
}

function loadTemplate(paths: NotesPaths): string {
  if (!existsSync(paths.templateFile)) {
    throw new Error(`Template not found: ${paths.templateFile}`);
  }
  return readFileSync(paths.templateFile, "utf-8");
}

/** Missing-asset warnings; an empty list means the themed index is complete. */
export function validateNotesAssets(paths: NotesPaths): string[] {
  const warnings: string[] = [];
  if (!existsSync(paths.stylesDir)) {
    warnings.push(`Styles directory not found: ${paths.stylesDir}`);
  }
  for (const css of REQUIRED_CSS) {
    const cssPath = join(paths.stylesDir, css);
    if (!existsSync(cssPath)) warnings.push(`Optional CSS file not found: ${cssPath}`);
  }
  return warnings;
}

export function renderIndexFor(paths: NotesPaths, entries: NoteEntry[], options: IndexOptions = {}): string {
  const now = options.now ?? new Date();
  try {
    return renderNotesIndex(entries, loadThemesConfig(paths, options.defaultTheme), loadTemplate(paths), now);
  } catch (err) {
    cliWarn(`⚠ Could not render themed index (${errorMessage(err)})`);
    return renderFallbackIndex(entries);
  }
}

export async function writeNotesIndex(
  paths: NotesPaths,
  entries: NoteEntry[],
  options: IndexOptions = {}
): Promise<void> {
  await writeOutput(paths.indexFile, renderIndexFor(paths, entries, options));
}

/** Create the workspace directory, bundled styles, registry and index as needed. */
export async function initializeWorkspace(paths: NotesPaths, options: IndexOptions = {}): Promise<void> {
  await ensureDir(paths.notesDir);

  if (existsSync(paths.sourceStylesDir)) {
    const missing = REQUIRED_CSS.some((css) => !existsSync(join(paths.stylesDir, css)));
    if (missing) {
      await cp(paths.sourceStylesDir, paths.stylesDir, { recursive: true });
      cliLog(`Initialized styles: ${paths.stylesDir}`);
    }
  } else if (!existsSync(paths.stylesDir)) {
    cliWarn(`⚠ Source styles directory not found: ${paths.sourceStylesDir}`);
  }

  if (!existsSync(paths.registryFile)) {
    await saveRegistry(paths, []);
  }

  if (!existsSync(paths.indexFile)) {
    await writeNotesIndex(paths, loadRegistry(paths), options);
    cliLog(`Initialized: ${paths.indexFile}`);
  }
}

export async function addNote(
  paths: NotesPaths,
  file: string,
  options: IndexOptions & { title?: string | null } = {}
): Promise<AddResult> {
  const result = appendNote(loadRegistry(paths), file, options);
  if (result.created) {
    await saveRegistry(paths, result.entries);
    await writeNotesIndex(paths, result.entries, options);
  }
  return { entry: result.entry, created: result.created };
}

/** Remove every matching note; returns how many were dropped. */
export async function removeNotes(
  paths: NotesPaths,
  identifier: string,
  options: IndexOptions = {}
): Promise<number> {
  const entries = loadRegistry(paths);
  const kept = entries.filter((e) => !matchesIdentifier(e, identifier));
  const removed = entries.length - kept.length;
  if (removed > 0) {
    await saveRegistry(paths, kept);
    await writeNotesIndex(paths, kept, options);
  }
  return removed;
}
