export const SOFTWARE_FAMILIES = [
  "Chrome",
  "Firefox",
  "Safari",
  "FacebookBot",
  "BotOrCrawler",
  "Other",
  "Unknown",
] as const;

export type SoftwareFamily = (typeof SOFTWARE_FAMILIES)[number];

export type Granularity = "hourly" | "daily";

/**
 * Calendar date plus wall-clock time as written in the log line.
 * The timezone offset is discarded, so two values compare by their fields only.
 */
export interface LocalDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export interface LogRecord {
  readonly clientAddress: string;
  readonly rawTimestamp: string;
  readonly occurredAt: LocalDateTime;
  readonly method: string;
  readonly path: string;
  readonly protocolVersion: string;
  readonly statusCode: number;
  /** Kept as text: servers write "-" when no body was sent. */
  readonly responseSize: string;
  readonly referer: string;
  readonly userAgent: string;
  readonly softwareFamily: SoftwareFamily;
  readonly sourceFile: string;
}

export type ParseFailure = { kind: "malformed" } | { kind: "bad_timestamp"; timestamp: string };

export type ParseResult = { ok: true; record: LogRecord } | { ok: false; failure: ParseFailure };

export interface FilterCriteria {
  date?: string | null;
  hour?: number | null;
  clientAddress?: string | null;
  softwareFamily?: SoftwareFamily | null;
}

export interface CountEntry<T extends string | number = string> {
  value: T;
  count: number;
}

export type TrafficSeries =
  | { granularity: "hourly"; title: string; points: Array<{ bucket: number; count: number }> }
  | { granularity: "daily"; title: string; points: Array<{ bucket: string; count: number }> };

export interface FrequencyTable {
  title: string;
  entries: CountEntry[];
}

export interface CategoryDistribution {
  title: string;
  entries: Array<CountEntry<SoftwareFamily>>;
}

export interface LogSummary {
  totalEntries: number;
  uniqueAddresses: number;
  dateRange: string;
  filesProcessed: string[];
  filterDescription: string;
}

export interface RecordSnapshot {
  readonly records: readonly LogRecord[];
  readonly loadedAt: Date;
  readonly generation: number;
}
