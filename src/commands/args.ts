import { ValidationError } from "../core/errors";

export type Command = "build" | "notes" | "init" | "help";

export interface ParsedArgs {
  command: Command;
  /** Arguments after the subcommand that are not flags. */
  positionals: string[];
  output: string | null;
  title: string | null;
  isGlobal: boolean;
  quiet: boolean;
  json: boolean;
}

const COMMANDS = new Set<string>(["build", "notes", "init", "help"]);

function isCommand(value: string): value is Command {
  return COMMANDS.has(value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  // process.argv: [node, script, ...args]
  const args = argv.slice(2);
  const parsed: ParsedArgs = {
    command: "help",
    positionals: [],
    output: null,
    title: null,
    isGlobal: false,
    quiet: false,
    json: false,
  };

  if (args.length === 0) return parsed;

  const first = args[0];
  if (first === "-h" || first === "--help") return parsed;
  if (!isCommand(first)) {
    throw new ValidationError(`Unknown command '${first}'. Run content-browser --help for usage.`);
  }
  parsed.command = first;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-o" || arg === "--output") {
      const val = args[++i];
      if (!val) throw new ValidationError("Missing output path.");
      parsed.output = val;
    } else if (arg === "-t" || arg === "--title") {
      const val = args[++i];
      if (!val) throw new ValidationError("Missing title.");
      parsed.title = val;
    } else if (arg === "--global") {
      parsed.isGlobal = true;
    } else if (arg === "-q" || arg === "--quiet") {
      parsed.quiet = true;
    } else if (arg === "--json") {
      parsed.json = true;
    } else if (arg === "-h" || arg === "--help") {
      parsed.command = "help";
    } else if (arg.startsWith("-")) {
      throw new ValidationError(`Unknown option '${arg}'.`);
    } else {
      parsed.positionals.push(arg);
    }
  }

  return parsed;
}

export const HELP_TEXT = `
content-browser — Classify content blobs and browse them as HTML

Usage:
  content-browser build [root]              Build the site from <root>/*/content
  content-browser build [root] -o <dir>     Write the site to <dir>
  content-browser notes add <file>          Register an HTML file in the notes index
  content-browser notes add <file> -t <t>   Register with a custom title
  content-browser notes <file>              Shorthand for notes add
  content-browser notes list                List registered notes
  content-browser notes remove <text>       Remove notes whose title or path matches
  content-browser notes regen               Regenerate the notes index
  content-browser notes themes              List available index themes
  content-browser init                      Create local .content-browser.yaml
  content-browser init --global             Create global config

Options:
  -o, --output <dir>    Output directory for build
  -t, --title <title>   Custom note title (default: the page <title>)
  -q, --quiet           Only show errors and the final summary
  --json                Machine-readable JSON output (build)
  --global              Target the global config (init)
  -h, --help            Show this help
`;
