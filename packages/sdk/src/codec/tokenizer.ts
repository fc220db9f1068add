/**
 * Single-pass tokenizer for flat object literals
 *
 * Walks `{"key": value, ...}` once, left to right, and classifies every
 * value by its first character:
 * - `null` → absent
 * - `"` → string, scanned to the first unescaped quote and unescaped
 * - `{` / `[` → nested value, skipped by depth (kept raw, never interpreted)
 * - anything else → bare literal up to the next `,` or `}`
 *
 * Invariants:
 * - Field order is irrelevant; the first occurrence of a key wins
 * - Unknown keys are tokenized like any other and left to the caller to ignore
 * - Structural problems throw MalformedRecordError
 */

import { MalformedRecordError } from "../errors.js";
import { unescapeText } from "./escape.js";

export type FieldValue =
  | { kind: "null" }
  | { kind: "string"; value: string }
  | { kind: "literal"; raw: string }
  | { kind: "nested"; raw: string };

const WHITESPACE = /\s/;

function skipWhitespace(text: string, pos: number): number {
  while (pos < text.length && WHITESPACE.test(text[pos])) {
    pos++;
  }
  return pos;
}

/**
 * Find the end of a quoted literal starting at `start` (the opening quote)
 *
 * A quote is escaped when preceded by an odd run of backslashes; stepping
 * over every backslash pair-wise gives exactly that rule.
 * @returns Raw body (still escaped) and the index just past the closing quote
 */
export function scanString(text: string, start: number): { raw: string; end: number } {
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === '"') {
      return { raw: text.slice(start + 1, i), end: i + 1 };
    }
    i++;
  }
  throw new MalformedRecordError(`unterminated string starting at offset ${start}`);
}

/**
 * Skip a bracketed value, tracking depth outside of quoted literals
 * @returns Index just past the matching closing bracket
 */
function scanNested(text: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"') {
      i = scanString(text, i).end;
      continue;
    }
    if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
    i++;
  }
  throw new MalformedRecordError(`unterminated nested value starting at offset ${start}`);
}

/**
 * Tokenize one flat object literal into a field map
 * @param text - Object literal, surrounding whitespace allowed
 * @throws MalformedRecordError if the text is not a well-formed object literal
 */
export function tokenizeObject(text: string): Map<string, FieldValue> {
  const source = text.trim();
  if (!source.startsWith("{") || !source.endsWith("}")) {
    throw new MalformedRecordError("expected an object literal enclosed in braces");
  }

  const fields = new Map<string, FieldValue>();
  const end = source.length - 1;
  let pos = 1;

  while (true) {
    pos = skipWhitespace(source, pos);

    if (pos === end) {
      return fields;
    }

    // Tolerate empty members such as a trailing comma
    if (source[pos] === ",") {
      pos++;
      continue;
    }

    if (source[pos] !== '"') {
      throw new MalformedRecordError(`expected a quoted key at offset ${pos}`);
    }
    const keyToken = scanString(source, pos);
    const key = unescapeText(keyToken.raw);

    pos = skipWhitespace(source, keyToken.end);
    if (source[pos] !== ":") {
      throw new MalformedRecordError(`expected ':' after key "${key}"`);
    }
    pos = skipWhitespace(source, pos + 1);

    let value: FieldValue;
    const first = source[pos];

    if (pos >= end) {
      throw new MalformedRecordError(`missing value for key "${key}"`);
    } else if (first === '"') {
      const token = scanString(source, pos);
      value = { kind: "string", value: unescapeText(token.raw) };
      pos = token.end;
    } else if (first === "{" || first === "[") {
      const next = scanNested(source, pos);
      value = { kind: "nested", raw: source.slice(pos, next) };
      pos = next;
    } else {
      let next = pos;
      while (next < end && source[next] !== "," && source[next] !== "}") {
        next++;
      }
      const raw = source.slice(pos, next).trim();
      if (raw === "") {
        throw new MalformedRecordError(`missing value for key "${key}"`);
      }
      value = raw === "null" ? { kind: "null" } : { kind: "literal", raw };
      pos = next;
    }

    if (!fields.has(key)) {
      fields.set(key, value);
    }

    pos = skipWhitespace(source, pos);
    if (pos === end) {
      return fields;
    }
    if (source[pos] !== ",") {
      throw new MalformedRecordError(`expected ',' or '}' after value of "${key}"`);
    }
    pos++;
  }
}
