/**
 * Escaping for quoted string literals
 *
 * Invariants:
 * - unescapeText(escapeText(x)) === x for every x
 * - Escaping replaces backslash first so later replacements are never re-escaped
 * - Unescaping is a single left-to-right pass (no chained replacements)
 */

const UNESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
};

const HEX4 = /^[0-9a-fA-F]{4}$/;

/**
 * Escape text for placement inside a double-quoted literal
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

/**
 * Recover the original text from the body of a quoted literal
 *
 * Also understands `\/`, `\b`, `\f` and `\uXXXX` as written by other JSON
 * producers. Unknown escapes and a trailing lone backslash are kept verbatim.
 */
export function unescapeText(text: string): string {
  if (!text.includes("\\")) {
    return text;
  }

  let out = "";
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch !== "\\" || i === text.length - 1) {
      out += ch;
      i++;
      continue;
    }

    const next = text[i + 1];
    const mapped = UNESCAPES[next];
    if (mapped !== undefined) {
      out += mapped;
      i += 2;
      continue;
    }

    if (next === "u") {
      const hex = text.slice(i + 2, i + 6);
      if (HEX4.test(hex)) {
        out += String.fromCharCode(Number.parseInt(hex, 16));
        i += 6;
        continue;
      }
    }

    out += ch + next;
    i += 2;
  }

  return out;
}
