import { describe, it, expect, vi, afterEach } from "vitest";
import { decodeCollection, decodeCollectionWithReport, encodeCollection } from "./collection.js";
import { encodeRecord } from "./record.js";
import { StudySession } from "../session.js";
import { MalformedCollectionError } from "../errors.js";

const math = StudySession.restore({
  id: "m-1",
  subject: "Math",
  durationMinutes: 45,
  date: "2024-10-04",
  startTime: "09:00:00",
  endTime: "09:45:00",
});
const history = StudySession.restore({
  id: "h-1",
  subject: "History",
  durationMinutes: 30,
  date: "2024-10-05",
  notes: 'Read "The Guns of August", ch. 1-3',
});
const physics = StudySession.restore({
  id: "p-1",
  subject: "Physics",
  durationMinutes: 120,
  date: "2024-10-06",
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("encodeCollection", () => {
  it("should encode an empty list as an empty array in both layouts", () => {
    expect(encodeCollection([])).toBe("[]");
    expect(encodeCollection([], { layout: "pretty" })).toBe("[]");
  });

  it("should join records with commas in the compact layout", () => {
    expect(encodeCollection([math, history])).toBe(`[${encodeRecord(math)},${encodeRecord(history)}]`);
  });

  it("should put one indented record per line in the pretty layout", () => {
    expect(encodeCollection([math, history], { layout: "pretty" })).toBe(
      `[\n  ${encodeRecord(math)},\n  ${encodeRecord(history)}\n]`
    );
  });
});

describe("decodeCollection", () => {
  it("should decode an empty array", () => {
    expect(decodeCollection("[]")).toEqual([]);
    expect(decodeCollection("  [ \n ]  ")).toEqual([]);
  });

  it("should preserve order and content through both layouts", () => {
    for (const layout of ["compact", "pretty"] as const) {
      const decoded = decodeCollection(encodeCollection([math, history, physics], { layout }));
      expect(decoded.map((s) => s.toJSON())).toEqual([math.toJSON(), history.toJSON(), physics.toJSON()]);
    }
  });

  it("should reject a payload without its closing bracket", () => {
    expect(() => decodeCollection(`[${encodeRecord(math)}`)).toThrow(MalformedCollectionError);
  });

  it("should reject payloads that are not array literals", () => {
    expect(() => decodeCollection("")).toThrow(
      "Malformed session collection: expected an array literal enclosed in brackets"
    );
    expect(() => decodeCollection(encodeRecord(math))).toThrow(MalformedCollectionError);
  });

  it("should drop a malformed record and keep its neighbours", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const broken = encodeRecord(history).replace('"durationMinutes":30', '"durationMinutes":soon');

    const decoded = decodeCollection(`[${encodeRecord(math)},${broken},${encodeRecord(physics)}]`);

    expect(decoded.map((s) => s.id)).toEqual(["m-1", "p-1"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain("[codec.record.skipped]");
  });

  it("should decode hand-written pretty files", () => {
    const text = `[
  {
    "id": "a7c1",
    "subject": "Chemistry",
    "durationMinutes": 50,
    "date": "2024-03-01",
    "startTime": "18:30:00",
    "endTime": null,
    "notes": "titration lab"
  }
]`;

    const [session] = decodeCollection(text);
    expect(session.toJSON()).toEqual({
      id: "a7c1",
      subject: "Chemistry",
      durationMinutes: 50,
      date: "2024-03-01",
      startTime: "18:30:00",
      endTime: null,
      notes: "titration lab",
    });
  });
});

describe("decodeCollectionWithReport", () => {
  it("should report each skipped span with its reason", () => {
    const broken = '{"id":"x","subject":"Art","durationMinutes":5}';
    const report = decodeCollectionWithReport(`[${encodeRecord(math)},${broken}]`);

    expect(report.sessions.map((s) => s.id)).toEqual(["m-1"]);
    expect(report.skipped).toEqual([
      {
        index: 1,
        offset: encodeRecord(math).length + 1,
        text: broken,
        reason: 'Malformed session record: missing required field "date"',
      },
    ]);
  });

  it("should report an object left open before the closing bracket", () => {
    const report = decodeCollectionWithReport(`[${encodeRecord(math)},{"id":"x"]`);

    expect(report.sessions).toHaveLength(1);
    expect(report.skipped).toEqual([
      {
        index: 1,
        offset: encodeRecord(math).length + 1,
        text: '{"id":"x"',
        reason: "unterminated object literal",
      },
    ]);
  });

  it("should not log anything", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    decodeCollectionWithReport('[{"id":"x"}]');
    expect(warn).not.toHaveBeenCalled();
  });
});
