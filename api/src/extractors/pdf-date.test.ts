import { describe, it, expect } from "vitest";
import { normalizePdfDate, parseOffsetMinutes } from "./pdf-date.js";

describe("normalizePdfDate", () => {
  it("returns empty string for empty input", () => {
    expect(normalizePdfDate("")).toBe("");
  });

  it("keeps a timestamp already at +05:30", () => {
    expect(normalizePdfDate("D:20230615120000+05'30'")).toBe("2023-06-15 12:00:00 UTC+05:30");
  });

  it("shifts UTC timestamps forward by 5h30m", () => {
    expect(normalizePdfDate("D:20230101120000Z")).toBe("2023-01-01 17:30:00 UTC+05:30");
    expect(normalizePdfDate("D:20230101120000")).toBe("2023-01-01 17:30:00 UTC+05:30");
  });

  it("applies negative offsets", () => {
    expect(normalizePdfDate("D:20230615120000-04'00'")).toBe("2023-06-15 21:30:00 UTC+05:30");
  });

  it("rolls over into the next year", () => {
    expect(normalizePdfDate("D:20231231220000Z")).toBe("2024-01-01 03:30:00 UTC+05:30");
  });

  it("accepts input without the D: prefix", () => {
    expect(normalizePdfDate("20230615083000Z")).toBe("2023-06-15 14:00:00 UTC+05:30");
  });

  it("defaults missing time components to zero", () => {
    expect(normalizePdfDate("D:20230615")).toBe("2023-06-15 05:30:00 UTC+05:30");
    expect(normalizePdfDate("D:2023061512")).toBe("2023-06-15 17:30:00 UTC+05:30");
  });

  it("returns incomplete dates unchanged", () => {
    expect(normalizePdfDate("D:2023")).toBe("D:2023");
    expect(normalizePdfDate("D:202306")).toBe("D:202306");
    expect(normalizePdfDate("not a date")).toBe("not a date");
  });

  it("returns invalid calendar values unchanged", () => {
    expect(normalizePdfDate("D:20231332000000")).toBe("D:20231332000000");
    expect(normalizePdfDate("D:20230229000000")).toBe("D:20230229000000");
    expect(normalizePdfDate("D:20230615240000")).toBe("D:20230615240000");
    expect(normalizePdfDate("D:00000101000000")).toBe("D:00000101000000");
  });

  it("accepts February 29th in leap years", () => {
    expect(normalizePdfDate("D:20240229000000Z")).toBe("2024-02-29 05:30:00 UTC+05:30");
  });

  it("returns the input unchanged when a time component is not numeric", () => {
    expect(normalizePdfDate("D:20230615ab0000")).toBe("D:20230615ab0000");
  });

  it("falls back to UTC for an unreadable timezone suffix", () => {
    expect(normalizePdfDate("D:20230615120000+ab'cd'")).toBe("2023-06-15 17:30:00 UTC+05:30");
    expect(normalizePdfDate("D:20230615120000+99'00'")).toBe("2023-06-15 17:30:00 UTC+05:30");
  });

  it("reads an hour-only suffix", () => {
    expect(normalizePdfDate("D:20230615120000+05")).toBe("2023-06-15 12:30:00 UTC+05:30");
  });

  it("keeps two-digit years literal", () => {
    expect(normalizePdfDate("D:00500101000000Z")).toBe("0050-01-01 05:30:00 UTC+05:30");
  });

  it("returns the input when the shift leaves the four-digit year range", () => {
    expect(normalizePdfDate("D:99991231230000Z")).toBe("D:99991231230000Z");
  });
});

describe("parseOffsetMinutes", () => {
  it("parses signed hour and minute offsets", () => {
    expect(parseOffsetMinutes("+05'30'")).toBe(330);
    expect(parseOffsetMinutes("-08'00'")).toBe(-480);
  });

  it("treats Z and empty suffixes as UTC", () => {
    expect(parseOffsetMinutes("Z")).toBe(0);
    expect(parseOffsetMinutes("")).toBe(0);
  });
});
