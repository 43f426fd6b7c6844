import { existsSync, readFileSync } from "fs";
import { basename, extname, resolve } from "path";
import { z } from "zod";
import { writeOutput } from "../core/output";
import { errorMessage } from "../core/errors";
import { formatLocalIso } from "../core/time";
import { charLength, padChars, truncateChars } from "../core/text";
import type { NotesPaths } from "./paths";

const NoteEntrySchema = z.object({
  title: z.string(),
  path: z.string(),
  added: z.string(),
});

const RegistrySchema = z.array(NoteEntrySchema);

export type NoteEntry = z.infer<typeof NoteEntrySchema>;

export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

export function loadRegistry(paths: NotesPaths): NoteEntry[] {
  if (!existsSync(paths.registryFile)) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(paths.registryFile, "utf-8"));
  } catch (err) {
    throw new RegistryError(`Registry is not valid JSON: ${paths.registryFile} (${errorMessage(err)})`);
  }

  const parsed = RegistrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RegistryError(
      `Registry has an unexpected shape: ${paths.registryFile} (${issue.path.join(".")}: ${issue.message})`
    );
  }
  return parsed.data;
}

export async function saveRegistry(paths: NotesPaths, entries: NoteEntry[]): Promise<void> {
  await writeOutput(paths.registryFile, JSON.stringify(entries, null, 2));
}

/** Text of the last <title> element, else the fallback. */
export function extractTitle(html: string, fallback: string): string {
  let title: string | null = null;
  for (const match of html.matchAll(/<title(?:\s[^>]*)?>([\s\S]*?)<\/title\s*>/gi)) {
    title = match[1].trim();
  }
  return title || fallback;
}

export function titleFromFile(file: string): string {
  return extractTitle(readFileSync(file, "utf-8"), basename(file, extname(file)));
}

export function newestFirst(entries: NoteEntry[]): NoteEntry[] {
  return [...entries].sort((a, b) => (a.added < b.added ? 1 : a.added > b.added ? -1 : 0));
}

export interface AddResult {
  entry: NoteEntry;
  created: boolean;
}

/**
 * Append a note unless its path is already registered. Returns the updated
 * list alongside the entry; persisting is left to the caller.
 */
export function appendNote(
  entries: NoteEntry[],
  file: string,
  options: { title?: string | null; now?: Date } = {}
): AddResult & { entries: NoteEntry[] } {
  const path = resolve(file);
  const existing = entries.find((e) => e.path === path);
  if (existing) return { entry: existing, created: false, entries };

  const entry: NoteEntry = {
    title: options.title || titleFromFile(path),
    path,
    added: formatLocalIso(options.now ?? new Date()),
  };
  return { entry, created: true, entries: [...entries, entry] };
}

/** Entries whose path or title (case-insensitive) contain the identifier. */
export function matchesIdentifier(entry: NoteEntry, identifier: string): boolean {
  return entry.path.includes(identifier) || entry.title.toLowerCase().includes(identifier.toLowerCase());
}

const TITLE_WIDTH = 40;

export function formatNoteList(entries: NoteEntry[]): string {
  if (entries.length === 0) return "No notes registered yet.";

  const lines = [`${"Title".padEnd(TITLE_WIDTH)} ${"Added".padEnd(12)} Path`, "-".repeat(80)];
  for (const entry of newestFirst(entries)) {
    const title =
      charLength(entry.title) > TITLE_WIDTH ? truncateChars(entry.title, TITLE_WIDTH - 2) + ".." : entry.title;
    lines.push(`${padChars(title, TITLE_WIDTH)} ${entry.added.slice(0, 10).padEnd(12)} ${entry.path}`);
  }
  return lines.join("\n");
}
