/**
 * Unit tests for Zod schemas
 */

import { describe, it, expect } from "vitest";
import {
  SessionIdSchema,
  DateSchema,
  TimeSchema,
  AddSessionInputSchema,
  UpdateSessionInputSchema,
  ListSessionsInputSchema,
  SessionStatsInputSchema,
  ExportSessionsInputSchema,
  ImportSessionsInputSchema,
} from "../../schemas.js";

describe("SessionIdSchema", () => {
  it("should accept uuids and simple tokens", () => {
    expect(() => SessionIdSchema.parse("0b7a2f6e-4c1d-4e8a-9f3b-2d5c6e7f8a9b")).not.toThrow();
    expect(() => SessionIdSchema.parse("s-1")).not.toThrow();
  });

  it("should reject empty ids", () => {
    expect(() => SessionIdSchema.parse("")).toThrow();
  });

  it("should reject path-like ids", () => {
    expect(() => SessionIdSchema.parse("../etc")).toThrow(/id must start with alphanumeric/);
    expect(() => SessionIdSchema.parse("a/b")).toThrow(/id must start with alphanumeric/);
  });
});

describe("DateSchema and TimeSchema", () => {
  it("should accept calendar dates", () => {
    expect(DateSchema.parse("2024-02-29")).toBe("2024-02-29");
  });

  it("should reject impossible dates", () => {
    expect(() => DateSchema.parse("2023-02-29")).toThrow(/YYYY-MM-DD/);
    expect(() => DateSchema.parse("2024-13-01")).toThrow(/YYYY-MM-DD/);
  });

  it("should accept HH:MM and HH:MM:SS", () => {
    expect(() => TimeSchema.parse("09:30")).not.toThrow();
    expect(() => TimeSchema.parse("23:59:59")).not.toThrow();
  });

  it("should reject out-of-range times", () => {
    expect(() => TimeSchema.parse("24:00")).toThrow(/HH:MM/);
  });
});

describe("AddSessionInputSchema", () => {
  it("should accept the minimal input", () => {
    const input = AddSessionInputSchema.parse({ subject: "Math", durationMinutes: 45 });
    expect(input).toEqual({ subject: "Math", durationMinutes: 45 });
  });

  it("should reject blank subjects", () => {
    expect(() => AddSessionInputSchema.parse({ subject: "   ", durationMinutes: 45 })).toThrow(
      /subject cannot be empty/
    );
  });

  it("should reject non-positive or fractional durations", () => {
    expect(() => AddSessionInputSchema.parse({ subject: "Math", durationMinutes: 0 })).toThrow();
    expect(() => AddSessionInputSchema.parse({ subject: "Math", durationMinutes: 1.5 })).toThrow();
  });

  it("should accept null optionals", () => {
    expect(() =>
      AddSessionInputSchema.parse({
        subject: "Math",
        durationMinutes: 45,
        startTime: null,
        endTime: null,
        notes: null,
      })
    ).not.toThrow();
  });
});

describe("UpdateSessionInputSchema", () => {
  it("should require at least one field besides id", () => {
    expect(() => UpdateSessionInputSchema.parse({ id: "s-1" })).toThrow(
      /update requires at least one field besides id/
    );
  });

  it("should accept null to clear an optional field", () => {
    const input = UpdateSessionInputSchema.parse({ id: "s-1", notes: null });
    expect(input).toEqual({ id: "s-1", notes: null });
  });
});

describe("ListSessionsInputSchema", () => {
  it("should default limit to 100", () => {
    expect(ListSessionsInputSchema.parse({}).limit).toBe(100);
  });

  it("should reject limit > 1000", () => {
    expect(() => ListSessionsInputSchema.parse({ limit: 1001 })).toThrow();
  });

  it("should reject inverted ranges", () => {
    expect(() => ListSessionsInputSchema.parse({ from: "2024-10-05", to: "2024-10-04" })).toThrow(
      /from must not be after to/
    );
  });
});

describe("SessionStatsInputSchema", () => {
  it("should accept an open range", () => {
    expect(SessionStatsInputSchema.parse({ from: "2024-10-01" })).toEqual({ from: "2024-10-01" });
  });
});

describe("ExportSessionsInputSchema", () => {
  it("should default to the compact layout", () => {
    expect(ExportSessionsInputSchema.parse({}).layout).toBe("compact");
  });

  it("should reject unknown layouts", () => {
    expect(() => ExportSessionsInputSchema.parse({ layout: "yaml" })).toThrow();
  });
});

describe("ImportSessionsInputSchema", () => {
  it("should default onConflict to skip", () => {
    expect(ImportSessionsInputSchema.parse({ payload: "[]" }).onConflict).toBe("skip");
  });

  it("should reject payloads shorter than an empty array", () => {
    expect(() => ImportSessionsInputSchema.parse({ payload: "[" })).toThrow();
  });
});
