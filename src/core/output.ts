import { resolve, sep } from "path";
import { mkdir, writeFile } from "fs/promises";
import { ValidationError } from "./errors";

/**
 * Resolve a generated file name inside `outputDir`, refusing names that
 * would land outside of it.
 */
export function resolveOutputPath(outputDir: string, fileName: string): string {
  const dir = resolve(outputDir);
  const outPath = resolve(dir, fileName);

  if (!outPath.startsWith(dir + sep)) {
    throw new ValidationError(
      `Output path escapes target directory "${dir}": ${fileName}`
    );
  }

  return outPath;
}

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

export async function writeOutput(
  outputPath: string,
  content: string
): Promise<void> {
  await writeFile(outputPath, content, "utf-8");
}
