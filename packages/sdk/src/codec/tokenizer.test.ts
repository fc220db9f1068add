import { describe, it, expect } from "vitest";
import { tokenizeObject } from "./tokenizer.js";
import { MalformedRecordError } from "../errors.js";

describe("tokenizeObject", () => {
  it("should classify strings, literals and null", () => {
    const fields = tokenizeObject('{"a":"x","b":12,"c":null,"d":true}');

    expect(fields.get("a")).toEqual({ kind: "string", value: "x" });
    expect(fields.get("b")).toEqual({ kind: "literal", raw: "12" });
    expect(fields.get("c")).toEqual({ kind: "null" });
    expect(fields.get("d")).toEqual({ kind: "literal", raw: "true" });
  });

  it("should tolerate whitespace around keys, colons and values", () => {
    const fields = tokenizeObject('  {\n  "a" : "x" ,\n  "b":  3 \n}  ');

    expect(fields.get("a")).toEqual({ kind: "string", value: "x" });
    expect(fields.get("b")).toEqual({ kind: "literal", raw: "3" });
  });

  it("should unescape string values", () => {
    const fields = tokenizeObject('{"n":"say \\"hi\\", bye"}');
    expect(fields.get("n")).toEqual({ kind: "string", value: 'say "hi", bye' });
  });

  it("should keep the first occurrence of a repeated key", () => {
    const fields = tokenizeObject('{"a":"1","a":"2"}');
    expect(fields.get("a")).toEqual({ kind: "string", value: "1" });
  });

  it("should skip nested values without interpreting them", () => {
    const fields = tokenizeObject('{"tags":["x","}"],"a":"y"}');

    expect(fields.get("tags")).toEqual({ kind: "nested", raw: '["x","}"]' });
    expect(fields.get("a")).toEqual({ kind: "string", value: "y" });
  });

  it("should accept an empty object and a trailing comma", () => {
    expect(tokenizeObject("{}").size).toBe(0);
    expect(tokenizeObject('{"a":"x",}').get("a")).toEqual({ kind: "string", value: "x" });
  });

  it("should reject text that is not an object literal", () => {
    expect(() => tokenizeObject('["a"]')).toThrow(MalformedRecordError);
    expect(() => tokenizeObject("")).toThrow("expected an object literal enclosed in braces");
  });

  it("should reject a key without a colon", () => {
    expect(() => tokenizeObject('{"a" "x"}')).toThrow(`expected ':' after key "a"`);
  });

  it("should reject a missing value", () => {
    expect(() => tokenizeObject('{"a":}')).toThrow('missing value for key "a"');
  });

  it("should reject an unterminated string", () => {
    expect(() => tokenizeObject('{"a":"x}')).toThrow("unterminated string starting at offset 5");
  });

  it("should reject an unquoted key", () => {
    expect(() => tokenizeObject("{a:1}")).toThrow("expected a quoted key at offset 1");
  });
});
