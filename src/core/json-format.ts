const JSON_WHITESPACE = new Set([" ", "\t", "\n", "\r"]);

function nextToken(text: string, from: number): number {
  let i = from;
  while (i < text.length && JSON_WHITESPACE.has(text[i])) i++;
  return i;
}

/**
 * Re-indent a JSON document without round-tripping its values: numbers and
 * strings are copied exactly as written, so `1.0` and integers past 2^53
 * survive. Throws the same SyntaxError as `JSON.parse` for invalid input.
 */
export function formatJson(text: string, indent = 2): string {
  JSON.parse(text);

  const newline = (depth: number) => "\n" + " ".repeat(depth * indent);
  let out = "";
  let depth = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (JSON_WHITESPACE.has(ch)) {
      i++;
      continue;
    }

    if (ch === '"') {
      let end = i + 1;
      while (text[end] !== '"') end += text[end] === "\\" ? 2 : 1;
      out += text.slice(i, end + 1);
      i = end + 1;
      continue;
    }

    if (ch === "{" || ch === "[") {
      const close = ch === "{" ? "}" : "]";
      const next = nextToken(text, i + 1);
      if (text[next] === close) {
        out += ch + close;
        i = next + 1;
        continue;
      }
      depth++;
      out += ch + newline(depth);
    } else if (ch === "}" || ch === "]") {
      depth--;
      out += newline(depth) + ch;
    } else if (ch === ",") {
      out += "," + newline(depth);
    } else if (ch === ":") {
      out += ": ";
    } else {
      out += ch;
    }
    i++;
  }

  return out;
}
