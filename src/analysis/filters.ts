import { parseIsoDate } from "../parser/timestamp.js";
import type { FilterCriteria, Granularity, LogRecord } from "../types.js";

interface ActiveFilters {
  date: { year: number; month: number; day: number } | null;
  dateText: string | null;
  hour: number | null;
  clientAddress: string | null;
  softwareFamily: FilterCriteria["softwareFamily"];
}

/**
 * Keeps the records that satisfy every active predicate, in input order.
 * An unparsable date string disables the date predicate instead of failing.
 */
export function applyFilters(records: readonly LogRecord[], criteria: FilterCriteria): readonly LogRecord[] {
  const active = resolveActiveFilters(criteria);
  if (!hasActiveFilters(active)) {
    return records;
  }

  return records.filter((record) => matchesFilters(record, active));
}

/**
 * A date filter alone narrows to one day, so hours are the useful view; an hour filter alone
 * spans days, so days are. Anything else keeps the requested granularity.
 */
export function resolveGranularity(criteria: FilterCriteria, requested: Granularity): Granularity {
  const active = resolveActiveFilters(criteria);
  const hasDate = active.date !== null;
  const hasHour = active.hour !== null;

  if (hasDate && !hasHour) {
    return "hourly";
  }
  if (hasHour && !hasDate) {
    return "daily";
  }
  return requested;
}

export function describeFilters(criteria: FilterCriteria): string {
  const active = resolveActiveFilters(criteria);
  const parts: string[] = [];

  if (active.dateText !== null) {
    parts.push(`date ${active.dateText}`);
  }
  if (active.hour !== null) {
    parts.push(`hour ${String(active.hour).padStart(2, "0")}:00`);
  }
  if (active.clientAddress !== null) {
    parts.push(`IP ${active.clientAddress}`);
  }
  if (active.softwareFamily) {
    parts.push(`browser ${active.softwareFamily}`);
  }

  return parts.length === 0 ? "Showing all data" : `Filtered by: ${parts.join(", ")}`;
}

function resolveActiveFilters(criteria: FilterCriteria): ActiveFilters {
  const date = criteria.date ? parseIsoDate(criteria.date) : null;

  return {
    date,
    dateText: date && criteria.date ? criteria.date : null,
    hour: typeof criteria.hour === "number" ? criteria.hour : null,
    clientAddress: criteria.clientAddress ? criteria.clientAddress : null,
    softwareFamily: criteria.softwareFamily ?? null,
  };
}

function hasActiveFilters(active: ActiveFilters): boolean {
  return active.date !== null || active.hour !== null || active.clientAddress !== null || Boolean(active.softwareFamily);
}

function matchesFilters(record: LogRecord, active: ActiveFilters): boolean {
  const { occurredAt } = record;

  if (
    active.date &&
    (occurredAt.year !== active.date.year || occurredAt.month !== active.date.month || occurredAt.day !== active.date.day)
  ) {
    return false;
  }

  if (active.hour !== null && occurredAt.hour !== active.hour) {
    return false;
  }

  if (active.clientAddress !== null && record.clientAddress !== active.clientAddress) {
    return false;
  }

  if (active.softwareFamily && record.softwareFamily !== active.softwareFamily) {
    return false;
  }

  return true;
}
