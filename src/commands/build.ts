import { existsSync, statSync } from "fs";
import type { SiteOptions } from "../core/config";
import { buildSite } from "../site/build";
import { cliError, cliJson, cliLog, cliResult, isJsonMode } from "../shared/cli-output";

interface BuildResult {
  success: boolean;
  identifier: string;
  type?: string;
  subtype?: string;
  page?: string;
  error?: string;
}

export async function runBuild(options: SiteOptions, now?: () => Date): Promise<number> {
  if (!existsSync(options.root) || !statSync(options.root).isDirectory()) {
    cliError(`✗ Can't find content folder '${options.root}'.`);
    return 1;
  }

  const report = await buildSite(options, {
    now,
    onGenerated: (entry) => cliLog(`✓ Generated: ${entry.identifier} (${entry.type}/${entry.subtype})`),
    onFailed: (failure) => cliError(`✗ Error processing ${failure.identifier}: ${failure.error}`),
  });

  const total = report.entries.length + report.failures.length;

  if (isJsonMode()) {
    const results: BuildResult[] = [
      ...report.entries.map((e) => ({
        success: true,
        identifier: e.identifier,
        type: e.type,
        subtype: e.subtype,
        page: e.page,
      })),
      ...report.failures.map((f) => ({ success: false, identifier: f.identifier, error: f.error })),
    ];
    cliJson({
      results,
      total,
      succeeded: report.entries.length,
      failed: report.failures.length,
      duration_ms: report.durationMs,
      output: report.outputDir,
    });
    return 0;
  }

  if (total === 0) cliLog(`No '${options.contentFile}' files found under ${options.root}.`);
  cliLog(`\n✓ Generated index.html with ${report.entries.length} items`);
  cliLog("✓ Generated styles.css");
  const parts = [`${report.entries.length} generated`, `${report.failures.length} failed`];
  cliResult(`\nDone: ${parts.join(", ")}. Website in ${report.outputDir}`);
  return 0;
}
