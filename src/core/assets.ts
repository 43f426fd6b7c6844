import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";

export const ASSETS_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "assets");

export function assetPath(...segments: string[]): string {
  return join(ASSETS_DIR, ...segments);
}
