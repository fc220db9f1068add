/**
 * Span splitter for the interior of an array literal
 *
 * One left-to-right pass with two pieces of state: whether the scan is
 * inside a quoted literal, and the brace depth outside of quoted literals.
 * Commas, braces and quotes inside string values never affect the structure.
 *
 * Invariants:
 * - Spans are emitted in input order, braces included, with no surrounding whitespace
 * - A backslash escapes exactly the next character, so `\"` never toggles quoting
 * - Braces inside quoted literals are not counted
 * - Depth counting handles nested braces even though records are flat
 * - A `}` at depth 0 is stray text and does not start or end a span
 */

export interface SpanScan {
  /** Complete top-level object literals */
  spans: Array<{ offset: number; text: string }>;
  /** Object opened but never closed before the end of the input */
  unterminated: { offset: number; text: string } | null;
}

/**
 * Scan an array interior, reporting spans and any unterminated trailing object
 * @param interior - Text strictly between the outer `[` and `]`
 */
export function scanSpans(interior: string): SpanScan {
  const spans: SpanScan["spans"] = [];
  let inString = false;
  let escaped = false;
  let depth = 0;
  let start = 0;

  for (let i = 0; i < interior.length; i++) {
    const ch = interior[i];

    if (escaped) {
      escaped = false;
      continue;
    }

    if (ch === "\\") {
      escaped = true;
      continue;
    }

    if (ch === '"') {
      inString = !inString;
      continue;
    }

    if (inString) {
      continue;
    }

    if (ch === "{") {
      if (depth === 0) {
        start = i;
      }
      depth++;
    } else if (ch === "}" && depth > 0) {
      depth--;
      if (depth === 0) {
        spans.push({ offset: start, text: interior.slice(start, i + 1) });
      }
    }
  }

  const unterminated = depth > 0 ? { offset: start, text: interior.slice(start) } : null;

  return { spans, unterminated };
}

/**
 * Split an array interior into its top-level object literals
 * @param interior - Text strictly between the outer `[` and `]`
 * @returns Object literal spans in original order
 */
export function splitSpans(interior: string): string[] {
  return scanSpans(interior).spans.map((span) => span.text);
}
