import { describe, expect, it } from "vitest";

import { formatDateKey, parseIsoDate, parseLogTimestamp } from "./timestamp.js";

describe("parseLogTimestamp", () => {
  it("drops the offset and keeps wall-clock fields", () => {
    expect(parseLogTimestamp("31/Jul/2025:17:03:16 -0700")).toEqual({
      year: 2025,
      month: 7,
      day: 31,
      hour: 17,
      minute: 3,
      second: 16,
    });
  });

  it("accepts lower-case month abbreviations", () => {
    expect(parseLogTimestamp("05/dec/2024:23:59:59 +0100")?.month).toBe(12);
  });

  it("requires the exact day/month/year layout", () => {
    expect(parseLogTimestamp("1/Jul/2025:17:03:16 -0700")).toBeNull();
    expect(parseLogTimestamp("31/July/2025:17:03:16 -0700")).toBeNull();
    expect(parseLogTimestamp("2025-07-31T17:03:16")).toBeNull();
    expect(parseLogTimestamp("31/Jux/2025:17:03:16 -0700")).toBeNull();
  });

  it("rejects out-of-range fields", () => {
    expect(parseLogTimestamp("29/Feb/2025:10:00:00 +0000")).toBeNull();
    expect(parseLogTimestamp("29/Feb/2024:10:00:00 +0000")?.day).toBe(29);
    expect(parseLogTimestamp("01/Jan/2025:24:00:00 +0000")).toBeNull();
    expect(parseLogTimestamp("01/Jan/2025:10:60:00 +0000")).toBeNull();
  });
});

describe("parseIsoDate", () => {
  it("parses YYYY-MM-DD", () => {
    expect(parseIsoDate("2025-07-31")).toEqual({ year: 2025, month: 7, day: 31 });
  });

  it("accepts month and day without leading zeros", () => {
    expect(parseIsoDate("2025-7-31")).toEqual({ year: 2025, month: 7, day: 31 });
    expect(parseIsoDate("2025-8-1")).toEqual({ year: 2025, month: 8, day: 1 });
    expect(parseIsoDate("2025-007-31")).toBeNull();
  });

  it("returns null for anything else", () => {
    expect(parseIsoDate("invalid-date")).toBeNull();
    expect(parseIsoDate("2025-13-01")).toBeNull();
    expect(parseIsoDate("2025-02-29")).toBeNull();
  });
});

describe("formatDateKey", () => {
  it("pads month and day", () => {
    expect(formatDateKey({ year: 2025, month: 8, day: 2 })).toBe("2025-08-02");
  });
});
