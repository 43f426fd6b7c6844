import * as p from "@clack/prompts";

/** Unwrap a prompt answer. Ctrl-C / Esc ends the process with exit code 0. */
export function guard<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Setup cancelled.");
    process.exit(0);
  }
  return value;
}
