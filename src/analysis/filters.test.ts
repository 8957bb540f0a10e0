import { describe, expect, it } from "vitest";

import { makeRecord } from "../testing/records.js";
import type { LogRecord } from "../types.js";
import { applyFilters, describeFilters, resolveGranularity } from "./filters.js";

const r1 = makeRecord({ clientAddress: "192.168.1.1", at: "2025-07-31T17:03:16", softwareFamily: "Chrome" });
const r2 = makeRecord({ clientAddress: "192.168.1.2", at: "2025-08-01T17:10:00", softwareFamily: "Firefox" });
const r3 = makeRecord({ clientAddress: "192.168.1.1", at: "2025-07-31T05:00:00", softwareFamily: "Chrome" });
const r4 = makeRecord({ clientAddress: "192.168.1.2", at: "2025-07-30T23:59:59", softwareFamily: "Firefox" });
const RECORDS: LogRecord[] = [r1, r2, r3, r4];

describe("applyFilters", () => {
  it("returns the input unchanged without active criteria", () => {
    expect(applyFilters(RECORDS, {})).toBe(RECORDS);
    expect(applyFilters(RECORDS, { date: null, hour: null, clientAddress: null, softwareFamily: null })).toBe(RECORDS);
    expect(applyFilters(RECORDS, { date: "", clientAddress: "" })).toBe(RECORDS);
  });

  it("filters by calendar date", () => {
    expect(applyFilters(RECORDS, { date: "2025-07-31" })).toEqual([r1, r3]);
  });

  it("accepts a date without leading zeros", () => {
    expect(applyFilters(RECORDS, { date: "2025-7-31" })).toEqual([r1, r3]);
    expect(applyFilters(RECORDS, { date: "2025-8-1" })).toEqual([r2]);
  });

  it("ignores an unparsable date", () => {
    expect(applyFilters(RECORDS, { date: "invalid-date" })).toBe(RECORDS);
    expect(applyFilters(RECORDS, { date: "invalid-date", clientAddress: "192.168.1.2" })).toEqual(
      applyFilters(RECORDS, { clientAddress: "192.168.1.2" }),
    );
  });

  it("filters by hour, including midnight", () => {
    expect(applyFilters(RECORDS, { hour: 17 })).toEqual([r1, r2]);
    expect(applyFilters(RECORDS, { hour: 0 })).toEqual([]);
  });

  it("filters by address and software family", () => {
    expect(applyFilters(RECORDS, { clientAddress: "192.168.1.2" })).toEqual([r2, r4]);
    expect(applyFilters(RECORDS, { softwareFamily: "Chrome" })).toEqual([r1, r3]);
  });

  it("combines predicates with AND", () => {
    expect(
      applyFilters(RECORDS, { date: "2025-07-31", hour: 17, clientAddress: "192.168.1.1", softwareFamily: "Chrome" }),
    ).toEqual([r1]);
    expect(applyFilters(RECORDS, { date: "2025-07-31", softwareFamily: "Firefox" })).toEqual([]);
  });
});

describe("resolveGranularity", () => {
  it("forces hourly for a date filter alone", () => {
    expect(resolveGranularity({ date: "2025-07-31" }, "daily")).toBe("hourly");
  });

  it("forces daily for an hour filter alone", () => {
    expect(resolveGranularity({ hour: 0 }, "hourly")).toBe("daily");
  });

  it("keeps the requested granularity otherwise", () => {
    expect(resolveGranularity({}, "daily")).toBe("daily");
    expect(resolveGranularity({ date: "2025-07-31", hour: 4 }, "daily")).toBe("daily");
    expect(resolveGranularity({ clientAddress: "10.0.0.1" }, "hourly")).toBe("hourly");
  });

  it("treats an unparsable date as no date filter", () => {
    expect(resolveGranularity({ date: "31/07/2025", hour: 4 }, "hourly")).toBe("daily");
    expect(resolveGranularity({ date: "31/07/2025" }, "daily")).toBe("daily");
  });
});

describe("describeFilters", () => {
  it("describes the absence of filters", () => {
    expect(describeFilters({})).toBe("Showing all data");
    expect(describeFilters({ date: "bad" })).toBe("Showing all data");
  });

  it("lists active filters in a fixed order", () => {
    expect(
      describeFilters({ softwareFamily: "Chrome", clientAddress: "1.2.3.4", hour: 5, date: "2025-07-31" }),
    ).toBe("Filtered by: date 2025-07-31, hour 05:00, IP 1.2.3.4, browser Chrome");
  });
});
