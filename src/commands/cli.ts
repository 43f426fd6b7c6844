#!/usr/bin/env tsx

import { loadConfig, resolveSiteOptions } from "../core/config";
import { ValidationError, errorMessage } from "../core/errors";
import { cliError, setOutputMode } from "../shared/cli-output";
import { HELP_TEXT, parseArgs, type ParsedArgs } from "./args";
import { runBuild } from "./build";
import { runInit } from "./init";
import { runNotes } from "./notes";

async function dispatch(args: ParsedArgs): Promise<number> {
  switch (args.command) {
    case "help":
      console.log(HELP_TEXT);
      return 0;
    case "init":
      return runInit(args.isGlobal);
    case "build": {
      const options = resolveSiteOptions(loadConfig(), {
        root: args.positionals[0] ?? null,
        outputDir: args.output,
      });
      return runBuild(options);
    }
    case "notes":
      return runNotes(loadConfig(), { positionals: args.positionals, title: args.title });
  }
}

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err) {
    cliError(`✗ ${errorMessage(err)}`);
    return 1;
  }
  setOutputMode(args.quiet, args.json);

  try {
    return await dispatch(args);
  } catch (err) {
    cliError(`✗ ${errorMessage(err)}`);
    if (err instanceof ValidationError) cliError("  Tip: run content-browser --help for usage.");
    return 1;
  }
}

main().then((code) => process.exit(code));
