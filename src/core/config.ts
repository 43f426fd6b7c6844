import { readFileSync, existsSync } from "fs";
import { join, dirname, resolve } from "path";
import { homedir } from "os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";

const ConfigSchema = z.object({
  site: z
    .object({
      root: z.string().optional(),
      outputDir: z.string().optional(),
      contentFile: z.string().optional(),
    })
    .optional(),
  notes: z
    .object({
      mainPath: z.string().optional(),
      defaultTheme: z.string().optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface SiteOptions {
  root: string;
  outputDir: string;
  contentFile: string;
}

export const LOCAL_CONFIG_NAME = ".content-browser.yaml";
export const GLOBAL_CONFIG_PATH = join(
  homedir(),
  ".config",
  "content-browser",
  "config.yaml"
);

export const DEFAULT_SITE_OUTPUT = "website";
export const DEFAULT_CONTENT_FILE = "content";
export const DEFAULT_NOTES_PATH = join(homedir(), "notes");

export function findLocalConfig(startDir?: string): string | null {
  let dir = startDir ?? process.cwd();
  const home = homedir();

  while (true) {
    const candidate = join(dir, LOCAL_CONFIG_NAME);
    if (existsSync(candidate)) return candidate;
    // Stop at home directory to avoid picking up configs from shared parent dirs
    if (dir === home) break;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return null;
}

export function parseConfigFile(path: string): Config {
  if (!existsSync(path)) return {};
  try {
    const raw = readFileSync(path, "utf-8").trim();
    if (!raw) return {};
    const parsed = ConfigSchema.safeParse(parseYaml(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function mergeConfigs(global: Config, local: Config): Config {
  return {
    site: { ...global.site, ...local.site },
    notes: { ...global.notes, ...local.notes },
  };
}

export function loadConfig(startDir?: string): Config {
  const global = parseConfigFile(GLOBAL_CONFIG_PATH);
  const localPath = findLocalConfig(startDir);
  const local = localPath ? parseConfigFile(localPath) : {};
  return mergeConfigs(global, local);
}

/** Expand a leading "~" the way a shell would. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Site settings, most specific first: CLI flags, then config, then defaults.
 */
export function resolveSiteOptions(
  config: Config,
  overrides: { root?: string | null; outputDir?: string | null } = {}
): SiteOptions {
  const root = resolve(expandHome(overrides.root ?? config.site?.root ?? "."));
  const outputDir = overrides.outputDir ?? config.site?.outputDir;
  return {
    root,
    outputDir: outputDir ? resolve(expandHome(outputDir)) : resolve(root, DEFAULT_SITE_OUTPUT),
    contentFile: config.site?.contentFile ?? DEFAULT_CONTENT_FILE,
  };
}

export function serializeConfig(config: Config): string {
  return stringifyYaml(config, { lineWidth: 0 });
}
