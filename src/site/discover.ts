import { readdirSync, readFileSync, statSync } from "fs";
import { join } from "path";
import type { ContentSource } from "../core/item";

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Find `<root>/<folder>/<contentFile>` blobs, one per direct sub-directory.
 * Bytes are read lazily so an unreadable file only fails its own item.
 */
export function discoverContent(root: string, contentFile: string): ContentSource[] {
  return readdirSync(root, { withFileTypes: true })
    .filter((e) => e.isDirectory() && isFile(join(root, e.name, contentFile)))
    .map((e) => e.name)
    .sort()
    .map((identifier) => ({
      identifier,
      read: () => readFileSync(join(root, identifier, contentFile)),
    }));
}
