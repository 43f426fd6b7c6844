import * as p from "@clack/prompts";
import { existsSync, mkdirSync } from "fs";
import { writeFile } from "fs/promises";
import { dirname } from "path";
import {
  type Config,
  DEFAULT_NOTES_PATH,
  DEFAULT_SITE_OUTPUT,
  GLOBAL_CONFIG_PATH,
  LOCAL_CONFIG_NAME,
  expandHome,
  parseConfigFile,
  serializeConfig,
} from "../core/config";
import { cliLog } from "../shared/cli-output";
import { guard } from "../shared/wizard-utils";

export async function runInit(isGlobal: boolean): Promise<number> {
  const targetPath = isGlobal ? GLOBAL_CONFIG_PATH : LOCAL_CONFIG_NAME;
  const existing = parseConfigFile(targetPath);

  p.intro("content-browser init");
  if (existsSync(targetPath)) {
    p.log.info(`Editing existing config at ${targetPath}`);
  }

  const root = guard(await p.text({
    message: "Folder holding the <name>/content blobs:",
    placeholder: ".",
    initialValue: existing.site?.root ?? ".",
  }));

  const outputDir = guard(await p.text({
    message: "Where should the website be written?",
    placeholder: DEFAULT_SITE_OUTPUT,
    initialValue: existing.site?.outputDir ?? DEFAULT_SITE_OUTPUT,
  }));

  const mainPath = await promptNotesPath(existing.notes?.mainPath);

  const config: Config = {
    ...existing,
    site: { ...existing.site, root: root.trim() || ".", outputDir: outputDir.trim() || DEFAULT_SITE_OUTPUT },
    notes: { ...existing.notes, mainPath },
  };

  await saveConfig(targetPath, config);
  return 0;
}

export async function promptNotesPath(initial?: string): Promise<string> {
  const raw = guard(await p.text({
    message: "Main notes path:",
    placeholder: DEFAULT_NOTES_PATH,
    initialValue: initial ?? DEFAULT_NOTES_PATH,
  }));
  return raw.trim() ? expandHome(raw.trim()) : DEFAULT_NOTES_PATH;
}

/**
 * Notes workspace location. Asks once on a TTY (defaults otherwise) and
 * remembers the answer in the global config.
 */
export async function ensureNotesPath(config: Config): Promise<string> {
  const configured = config.notes?.mainPath;
  if (configured) return expandHome(configured);

  let mainPath = DEFAULT_NOTES_PATH;
  if (process.stdin.isTTY) {
    p.intro("First run setup");
    p.log.info("Set the main notes path used by content-browser notes.");
    mainPath = await promptNotesPath();
  }

  const global = parseConfigFile(GLOBAL_CONFIG_PATH);
  const updated: Config = { ...global, notes: { ...global.notes, mainPath } };
  await writeConfig(GLOBAL_CONFIG_PATH, updated);
  cliLog(`Configured main path: ${mainPath}`);
  cliLog(`Config saved to: ${GLOBAL_CONFIG_PATH}`);
  return mainPath;
}

async function writeConfig(targetPath: string, config: Config) {
  const dir = dirname(targetPath);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  await writeFile(targetPath, serializeConfig(config), "utf-8");
}

async function saveConfig(targetPath: string, config: Config) {
  p.note(serializeConfig(config), targetPath);
  await writeConfig(targetPath, config);
  p.outro(`Config saved to ${targetPath}`);
}
