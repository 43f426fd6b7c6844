import { join, resolve } from "path";
import { pathToFileURL } from "url";
import { assetPath } from "../core/assets";
import { expandHome } from "../core/config";

export interface NotesPaths {
  notesDir: string;
  registryFile: string;
  indexFile: string;
  stylesDir: string;
  /** file:// URL of stylesDir, used in generated <link> tags. */
  cssBaseUrl: string;
  templateFile: string;
  themesConfigFile: string;
  sourceStylesDir: string;
}

export const BUNDLED_NOTES_ASSETS = assetPath("notes");

export function notesPaths(mainPath: string, assetsDir = BUNDLED_NOTES_ASSETS): NotesPaths {
  const notesDir = resolve(expandHome(mainPath));
  const stylesDir = join(notesDir, "styles");
  return {
    notesDir,
    registryFile: join(notesDir, "notes.json"),
    indexFile: join(notesDir, "index.html"),
    stylesDir,
    cssBaseUrl: pathToFileURL(stylesDir).href,
    templateFile: join(assetsDir, "index.html"),
    themesConfigFile: join(assetsDir, "themes.json"),
    sourceStylesDir: join(assetsDir, "styles"),
  };
}
