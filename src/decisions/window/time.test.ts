import { describe, expect, it } from "vitest";
import { TimeFormatError } from "../../errors.js";
import { NAIVE_DATETIME_NOTE, parseTimeValue, tryParseTimeValue } from "./time.js";

const NEW_YEAR_2024 = 1704067200;

describe("parseTimeValue", () => {
  it("passes epoch seconds through", () => {
    expect(parseTimeValue(1700000000)).toBe(1700000000);
    expect(parseTimeValue(12.5)).toBe(12.5);
  });

  it("parses UTC and offset ISO strings", () => {
    expect(parseTimeValue("2024-01-01T00:00:00Z")).toBe(NEW_YEAR_2024);
    expect(parseTimeValue("2024-01-01T01:00:00+01:00")).toBe(NEW_YEAR_2024);
    expect(parseTimeValue("2024-01-01T05:30:00+0530")).toBe(NEW_YEAR_2024);
    expect(parseTimeValue("2023-12-31T19:00:00-05:00")).toBe(NEW_YEAR_2024);
  });

  it("keeps fractional seconds", () => {
    expect(parseTimeValue("2024-01-01T00:00:00.5Z")).toBe(NEW_YEAR_2024 + 0.5);
  });

  it("assumes UTC for naive strings and leaves a note", () => {
    const notes: string[] = [];
    expect(parseTimeValue("2024-01-01 00:00:10", notes)).toBe(NEW_YEAR_2024 + 10);
    expect(parseTimeValue("2024-01-01", notes)).toBe(NEW_YEAR_2024);
    expect(notes).toEqual([NAIVE_DATETIME_NOTE, NAIVE_DATETIME_NOTE]);
  });

  it("does not note offset-aware strings", () => {
    const notes: string[] = [];
    parseTimeValue("2024-01-01T00:00:00Z", notes);
    expect(notes).toEqual([]);
  });

  it("rejects unparseable strings and out-of-range dates", () => {
    expect(() => parseTimeValue("not a date")).toThrow(TimeFormatError);
    expect(() => parseTimeValue("2024-02-30T00:00:00Z")).toThrow('Invalid ISO datetime: "2024-02-30T00:00:00Z"');
    expect(() => parseTimeValue("2024-01-01T24:00:00Z")).toThrow(TimeFormatError);
  });

  it("rejects non-string, non-number values", () => {
    expect(() => parseTimeValue(true)).toThrow("Unsupported time value type: boolean");
    expect(() => parseTimeValue(null)).toThrow("Unsupported time value type: null");
    expect(() => parseTimeValue([1])).toThrow("Unsupported time value type: array");
  });
});

describe("tryParseTimeValue", () => {
  it("returns null instead of throwing", () => {
    expect(tryParseTimeValue("yesterday")).toBeNull();
    expect(tryParseTimeValue({})).toBeNull();
    expect(tryParseTimeValue("2024-01-01T00:00:00Z")).toBe(NEW_YEAR_2024);
  });
});
