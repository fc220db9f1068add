/**
 * Collection codec: ordered list of sessions ⇄ array literal
 *
 * Invariants:
 * - Encoding preserves list order; an empty list is always `[]`
 * - A payload that is not bracketed fails as a whole (no partial result)
 * - A span that fails to decode is dropped and logged; the rest still decode
 */

import { MalformedCollectionError } from "../errors.js";
import { logger } from "../observability/logs.js";
import type { StudySession } from "../session.js";
import type { CollectionDecodeReport, EncodeCollectionOptions, SkippedSpan } from "../types.js";
import { decodeRecord, encodeRecord } from "./record.js";
import { scanSpans } from "./splitter.js";

/**
 * Encode sessions as an array literal
 * @param sessions - Sessions in the order they should appear
 * @param options - `layout: "compact"` (default) or `"pretty"`
 */
export function encodeCollection(
  sessions: readonly StudySession[],
  options: EncodeCollectionOptions = {}
): string {
  if (sessions.length === 0) {
    return "[]";
  }

  const records = sessions.map(encodeRecord);

  if (options.layout === "pretty") {
    return `[\n${records.map((record) => `  ${record}`).join(",\n")}\n]`;
  }

  return `[${records.join(",")}]`;
}

/**
 * Strip the outer brackets of a collection payload
 * @throws MalformedCollectionError if the payload is not an array literal
 */
function arrayInterior(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
    throw new MalformedCollectionError("expected an array literal enclosed in brackets");
  }
  return trimmed.slice(1, -1);
}

/**
 * Decode a collection payload, reporting every dropped span
 * @throws MalformedCollectionError if the outer bracket structure is absent
 */
export function decodeCollectionWithReport(text: string): CollectionDecodeReport {
  const interior = arrayInterior(text);
  const scan = scanSpans(interior);

  const sessions: StudySession[] = [];
  const skipped: SkippedSpan[] = [];

  scan.spans.forEach((span, index) => {
    try {
      sessions.push(decodeRecord(span.text));
    } catch (err) {
      skipped.push({
        index,
        offset: span.offset,
        text: span.text,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  });

  if (scan.unterminated) {
    skipped.push({
      index: scan.spans.length,
      offset: scan.unterminated.offset,
      text: scan.unterminated.text,
      reason: "unterminated object literal",
    });
  }

  return { sessions, skipped };
}

/**
 * Decode a collection payload, dropping spans that are not valid sessions
 * @returns Valid sessions in payload order
 * @throws MalformedCollectionError if the outer bracket structure is absent
 */
export function decodeCollection(text: string): StudySession[] {
  const { sessions, skipped } = decodeCollectionWithReport(text);

  for (const span of skipped) {
    logger.warn("codec.record.skipped", {
      message: `Failed to parse session: ${span.reason}`,
      details: { index: span.index, offset: span.offset },
    });
  }

  return sessions;
}
