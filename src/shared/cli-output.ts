// Output mode flags (set via setOutputMode)
let quietMode = false;
let jsonMode = false;

export function setOutputMode(quiet: boolean, json: boolean) {
  quietMode = quiet;
  jsonMode = json;
}

export function isJsonMode(): boolean {
  return jsonMode;
}

export function cliLog(msg: string) {
  if (!quietMode && !jsonMode) console.log(msg);
}
export function cliWarn(msg: string) {
  if (!jsonMode) console.error(msg);
}
export function cliError(msg: string) {
  if (!jsonMode) console.error(msg);
}
export function cliResult(msg: string) {
  if (!jsonMode) console.log(msg);
}
export function cliJson(value: unknown) {
  process.stdout.write(JSON.stringify(value));
}
