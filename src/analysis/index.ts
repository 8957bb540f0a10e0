import { formatDateKey } from "../parser/timestamp.js";
import type {
  CategoryDistribution,
  FilterCriteria,
  FrequencyTable,
  Granularity,
  LogRecord,
  LogSummary,
  TrafficSeries,
} from "../types.js";
import { applyFilters, describeFilters, resolveGranularity } from "./filters.js";
import { NO_DATA_TITLE, countBy, mapCountsDescending, sanitizeTopN } from "./helpers.js";

export const DEFAULT_TOP_ADDRESSES = 20;
const HOURS_PER_DAY = 24;

/**
 * Buckets requests by hour of day (merging all dates) or by calendar date.
 * Hourly output always has all 24 hours; daily output only has dates that occur.
 */
export function trafficOverTime(records: readonly LogRecord[], granularity: Granularity): TrafficSeries {
  if (granularity === "hourly") {
    if (records.length === 0) {
      return { granularity, title: NO_DATA_TITLE, points: [] };
    }

    const counts = new Array<number>(HOURS_PER_DAY).fill(0);
    for (const record of records) {
      counts[record.occurredAt.hour] += 1;
    }

    return {
      granularity,
      title: "Traffic by Hour",
      points: counts.map((count, hour) => ({ bucket: hour, count })),
    };
  }

  if (records.length === 0) {
    return { granularity, title: NO_DATA_TITLE, points: [] };
  }

  // YYYY-MM-DD keys sort chronologically as plain strings.
  const counts = countBy(records, (record) => formatDateKey(record.occurredAt));
  const points = Array.from(counts.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([bucket, count]) => ({ bucket, count }));

  return { granularity, title: "Traffic by Day", points };
}

export function addressFrequency(records: readonly LogRecord[], topN = DEFAULT_TOP_ADDRESSES): FrequencyTable {
  if (records.length === 0) {
    return { title: NO_DATA_TITLE, entries: [] };
  }

  const limit = sanitizeTopN(topN);
  const counts = countBy(records, (record) => record.clientAddress);

  return {
    title: `Top ${limit} IP Addresses`,
    entries: mapCountsDescending(counts).slice(0, limit),
  };
}

export function softwareDistribution(records: readonly LogRecord[]): CategoryDistribution {
  if (records.length === 0) {
    return { title: NO_DATA_TITLE, entries: [] };
  }

  const counts = countBy(records, (record) => record.softwareFamily);

  return {
    title: "Browser Usage Distribution",
    entries: Array.from(counts.entries()).map(([value, count]) => ({ value, count })),
  };
}

export function summarizeRecords(records: readonly LogRecord[], criteria: FilterCriteria = {}): LogSummary {
  const addresses = new Set<string>();
  const files = new Set<string>();
  let earliest: string | null = null;
  let latest: string | null = null;

  for (const record of records) {
    addresses.add(record.clientAddress);
    files.add(record.sourceFile);

    const dateKey = formatDateKey(record.occurredAt);
    if (earliest === null || dateKey < earliest) {
      earliest = dateKey;
    }
    if (latest === null || dateKey > latest) {
      latest = dateKey;
    }
  }

  return {
    totalEntries: records.length,
    uniqueAddresses: addresses.size,
    dateRange: earliest !== null && latest !== null ? `${earliest} to ${latest}` : "No data",
    filesProcessed: Array.from(files),
    filterDescription: describeFilters(criteria),
  };
}

/** Binds one record set so callers can filter once and derive several views. */
export class LogAnalyzer {
  constructor(private readonly records: readonly LogRecord[]) {}

  filter(criteria: FilterCriteria): LogAnalyzer {
    const filtered = applyFilters(this.records, criteria);
    return filtered === this.records ? this : new LogAnalyzer(filtered);
  }

  trafficOverTime(granularity: Granularity): TrafficSeries {
    return trafficOverTime(this.records, granularity);
  }

  addressFrequency(topN = DEFAULT_TOP_ADDRESSES): FrequencyTable {
    return addressFrequency(this.records, topN);
  }

  softwareDistribution(): CategoryDistribution {
    return softwareDistribution(this.records);
  }

  summary(criteria: FilterCriteria = {}): LogSummary {
    return summarizeRecords(this.records, criteria);
  }
}

export { applyFilters, describeFilters, resolveGranularity } from "./filters.js";
export { NO_DATA_TITLE } from "./helpers.js";
