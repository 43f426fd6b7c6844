function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local calendar date, `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local time, `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Local time, `YYYY-MM-DD HH:MM`. */
export function formatMinutes(date: Date): string {
  return formatTimestamp(date).slice(0, 16);
}

/** Local ISO-8601 timestamp without zone, `YYYY-MM-DDTHH:MM:SS`. */
export function formatLocalIso(date: Date): string {
  return formatTimestamp(date).replace(" ", "T");
}
