import { describe, it, expect } from "vitest";
import { scanSpans, splitSpans } from "./splitter.js";
import { encodeRecord } from "./record.js";
import { StudySession } from "../session.js";

describe("splitSpans", () => {
  it("should not split on commas or quotes inside notes", () => {
    const first = encodeRecord(
      StudySession.restore({ id: "a", subject: "Art", durationMinutes: 5, date: "2024-01-01", notes: 'say "hi", bye' })
    );
    const second = encodeRecord(
      StudySession.restore({ id: "b", subject: "Art", durationMinutes: 6, date: "2024-01-02" })
    );

    expect(splitSpans(`${first},${second}`)).toEqual([first, second]);
  });

  it("should not count braces inside quoted literals", () => {
    const record = '{"id":"a","notes":"{not a record}"}';
    expect(splitSpans(record)).toEqual([record]);
  });

  it("should emit spans without the surrounding whitespace", () => {
    expect(splitSpans('\n  {"a":1} ,\n  {"b":2}\n')).toEqual(['{"a":1}', '{"b":2}']);
  });

  it("should keep nested braces inside one span", () => {
    expect(splitSpans('{"a":{"b":{}}},{"c":1}')).toEqual(['{"a":{"b":{}}}', '{"c":1}']);
  });

  it("should treat an escaped backslash before a quote as closing the string", () => {
    expect(splitSpans('{"n":"x\\\\"},{"m":1}')).toEqual(['{"n":"x\\\\"}', '{"m":1}']);
  });

  it("should ignore a stray closing brace at depth zero", () => {
    expect(splitSpans('}{"a":1}')).toEqual(['{"a":1}']);
  });

  it("should return nothing for an empty interior", () => {
    expect(splitSpans("")).toEqual([]);
    expect(splitSpans("  \n ")).toEqual([]);
  });
});

describe("scanSpans", () => {
  it("should report span offsets within the interior", () => {
    expect(scanSpans(' {"a":1}, {"b":2}').spans).toEqual([
      { offset: 1, text: '{"a":1}' },
      { offset: 10, text: '{"b":2}' },
    ]);
  });

  it("should report an object left open at the end", () => {
    const scan = scanSpans('{"a":1},{"b":');

    expect(scan.spans).toEqual([{ offset: 0, text: '{"a":1}' }]);
    expect(scan.unterminated).toEqual({ offset: 8, text: '{"b":' });
  });

  it("should report no unterminated object for balanced input", () => {
    expect(scanSpans('{"a":1}').unterminated).toBeNull();
  });
});
