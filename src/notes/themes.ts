import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { NotesPaths } from "./paths";

export interface Theme {
  id: string;
  name: string;
  cssUrl: string;
  supportsDark: boolean;
}

const PageTypeSchema = z.object({
  css_file: z.string().optional(),
  template: z.string().optional(),
  badge_default: z.string().optional(),
  subtitle_default: z.string().optional(),
});

const ThemesFileSchema = z.object({
  default_theme: z.string().optional(),
  themes: z.record(z.object({ name: z.string().optional() })).optional(),
  page_types: z.record(PageTypeSchema).optional(),
});

export type PageType = z.infer<typeof PageTypeSchema>;

export interface ThemesConfig {
  defaultTheme: string;
  themes: Theme[];
  cssBaseUrl: string;
  pageTypes: Record<string, PageType>;
}

export const DEFAULT_THEME = "modern";
const DARK_MARKER = '[data-color-scheme="dark"]';

const DEFAULT_PAGE_TYPES: Record<string, PageType> = {
  index: {
    css_file: "index.css",
    template: "index_template.html",
    badge_default: "Knowledge Base",
    subtitle_default: "Your personal collection of linked documents",
  },
  content: {
    css_file: "content.css",
    template: "content_template.html",
    badge_default: "Documentation",
    subtitle_default: "Generated by Content Browser",
  },
};

/** "solarized-light" → "Solarized Light" */
export function themeDisplayName(id: string): string {
  return id
    .split("-")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(" ");
}

/** Every styles/theme-*.css in the workspace, sorted by file name. */
export function discoverThemes(paths: NotesPaths): Theme[] {
  if (!existsSync(paths.stylesDir)) return [];

  return readdirSync(paths.stylesDir)
    .filter((name) => name.startsWith("theme-") && name.endsWith(".css"))
    .sort()
    .map((name) => {
      const id = name.slice("theme-".length, -".css".length);
      const css = readFileSync(join(paths.stylesDir, name), "utf-8");
      return {
        id,
        name: themeDisplayName(id),
        cssUrl: `${paths.cssBaseUrl}/${name}`,
        supportsDark: css.includes(DARK_MARKER),
      };
    });
}

function readThemesFile(file: string): z.infer<typeof ThemesFileSchema> {
  if (!existsSync(file)) return {};
  const parsed = ThemesFileSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
  if (!parsed.success) {
    throw new Error(`Invalid themes config: ${file}`);
  }
  return parsed.data;
}

/**
 * Discovered themes merged with the themes config file: display-name
 * overrides, default theme and per-page-type defaults.
 */
export function loadThemesConfig(paths: NotesPaths, defaultTheme?: string): ThemesConfig {
  const file = readThemesFile(paths.themesConfigFile);
  const themes = discoverThemes(paths).map((theme) => {
    const name = file.themes?.[theme.id]?.name;
    return name ? { ...theme, name } : theme;
  });

  return {
    defaultTheme: defaultTheme ?? file.default_theme ?? DEFAULT_THEME,
    themes,
    cssBaseUrl: paths.cssBaseUrl,
    pageTypes: file.page_types ?? DEFAULT_PAGE_TYPES,
  };
}

export function formatThemeList(config: ThemesConfig): string {
  const lines = ["Available themes:"];
  for (const theme of config.themes) {
    const marker = theme.id === config.defaultTheme ? " ✓" : "";
    lines.push(`  ${theme.id}${marker}: ${theme.name}`);
  }
  lines.push("", `Default theme: ${config.defaultTheme}`);
  return lines.join("\n");
}
