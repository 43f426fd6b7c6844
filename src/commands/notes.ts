import { existsSync } from "fs";
import type { Config } from "../core/config";
import { ValidationError } from "../core/errors";
import { notesPaths, type NotesPaths } from "../notes/paths";
import { formatNoteList, loadRegistry } from "../notes/registry";
import { formatThemeList, loadThemesConfig } from "../notes/themes";
import {
  addNote,
  initializeWorkspace,
  removeNotes,
  validateNotesAssets,
  writeNotesIndex,
  type IndexOptions,
} from "../notes/workspace";
import { cliError, cliLog, cliResult, cliWarn } from "../shared/cli-output";
import { ensureNotesPath } from "./init";

const SUBCOMMANDS = new Set(["add", "list", "remove", "regen", "rebuild", "themes"]);

export interface NotesRequest {
  positionals: string[];
  title: string | null;
}

async function add(paths: NotesPaths, file: string | undefined, title: string | null, opts: IndexOptions) {
  if (!file) throw new ValidationError("Missing file path. Usage: content-browser notes add <file>");
  if (!existsSync(file)) {
    cliError(`✗ File not found: ${file}`);
    return 1;
  }

  const { entry, created } = await addNote(paths, file, { ...opts, title });
  if (!created) {
    cliWarn(`Note already registered: ${entry.title}`);
    cliWarn(`  Path: ${entry.path}`);
  }
  cliResult(`Added: ${entry.title}`);
  cliResult(`  Path: ${entry.path}`);
  cliResult(`  Index: ${paths.indexFile}`);
  return 0;
}

/** Run a notes subcommand against an already-resolved workspace. */
export async function runNotesIn(paths: NotesPaths, request: NotesRequest, opts: IndexOptions = {}): Promise<number> {
  await initializeWorkspace(paths, opts);

  const warnings = validateNotesAssets(paths);
  if (warnings.length > 0) {
    cliWarn("⚠ Themed index assets are incomplete.");
    for (const warning of warnings) cliWarn(`  - ${warning}`);
    cliWarn("  Falling back to a minimal index page as needed.");
  }

  const [first, ...rest] = request.positionals;
  if (!first) throw new ValidationError("Missing notes command. Run content-browser --help for usage.");

  // "notes <file>" is shorthand for "notes add <file>"
  if (!SUBCOMMANDS.has(first)) return add(paths, first, request.title, opts);

  switch (first) {
    case "add":
      return add(paths, rest[0], request.title, opts);
    case "list":
      cliResult(formatNoteList(loadRegistry(paths)));
      return 0;
    case "remove": {
      const identifier = rest[0];
      if (!identifier) throw new ValidationError("Missing title or path to remove.");
      const removed = await removeNotes(paths, identifier, opts);
      if (removed === 0) {
        cliError(`✗ No notes found matching: ${identifier}`);
        return 1;
      }
      cliResult(`Removed notes matching: ${identifier}`);
      return 0;
    }
    case "themes":
      cliResult(formatThemeList(loadThemesConfig(paths, opts.defaultTheme)));
      return 0;
    default: {
      // regen / rebuild
      const entries = loadRegistry(paths);
      await writeNotesIndex(paths, entries, opts);
      cliResult(`Regenerated: ${paths.indexFile}`);
      cliLog(`  ${entries.length} note${entries.length === 1 ? "" : "s"} indexed`);
      return 0;
    }
  }
}

export async function runNotes(config: Config, request: NotesRequest): Promise<number> {
  const mainPath = await ensureNotesPath(config);
  return runNotesIn(notesPaths(mainPath), request, { defaultTheme: config.notes?.defaultTheme });
}
