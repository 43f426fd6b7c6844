import { copyFile } from "fs/promises";
import { processItem, type ItemFailure, type ProcessedItem } from "../core/item";
import { assetPath } from "../core/assets";
import type { SiteOptions } from "../core/config";
import { ensureDir, resolveOutputPath, writeOutput } from "../core/output";
import { ValidationError, errorMessage } from "../core/errors";
import { discoverContent } from "./discover";
import { pageFileName, renderItemPage } from "./page";
import { renderSiteIndex, type SiteEntry } from "./index-page";

export const SITE_STYLESHEET = assetPath("site", "styles.css");

// Owned by the site listing; compared case-insensitively for case-folding file systems.
const RESERVED_PAGES = new Set(["index.html"]);

export interface BuildReport {
  outputDir: string;
  entries: SiteEntry[];
  failures: ItemFailure[];
  durationMs: number;
}

export interface BuildHooks {
  onGenerated?: (entry: SiteEntry) => void;
  onFailed?: (failure: ItemFailure) => void;
  now?: () => Date;
}

async function writeItemPage(outputDir: string, { item, fragment }: ProcessedItem): Promise<SiteEntry> {
  const page = pageFileName(item.identifier);
  if (RESERVED_PAGES.has(page.toLowerCase())) {
    throw new ValidationError(`Page name "${page}" is reserved for the site index`);
  }
  await writeOutput(resolveOutputPath(outputDir, page), renderItemPage(item, fragment));
  return {
    identifier: item.identifier,
    type: item.type,
    subtype: item.subtype,
    description: item.description,
    preview: item.preview,
    page,
  };
}

/**
 * Generate the browsable site: one page per content blob, the card index and
 * the stylesheet. Each page is written before the next blob is read, and
 * items fail independently and are listed in the report.
 */
export async function buildSite(options: SiteOptions, hooks: BuildHooks = {}): Promise<BuildReport> {
  const t0 = performance.now();
  await ensureDir(options.outputDir);

  const entries: SiteEntry[] = [];
  const failures: ItemFailure[] = [];

  // discoverContent returns sources sorted by identifier
  for (const source of discoverContent(options.root, options.contentFile)) {
    try {
      const entry = await writeItemPage(options.outputDir, processItem(source));
      entries.push(entry);
      hooks.onGenerated?.(entry);
    } catch (err) {
      const failure = { identifier: source.identifier, error: errorMessage(err) };
      failures.push(failure);
      hooks.onFailed?.(failure);
    }
  }

  const now = hooks.now?.() ?? new Date();
  await writeOutput(resolveOutputPath(options.outputDir, "index.html"), renderSiteIndex(entries, now));
  await copyFile(SITE_STYLESHEET, resolveOutputPath(options.outputDir, "styles.css"));

  return {
    outputDir: options.outputDir,
    entries,
    failures,
    durationMs: Math.round(performance.now() - t0),
  };
}
