import type { LocalDateTime } from "../types.js";

const MONTH_ABBREVIATIONS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// DD/Mon/YYYY:HH:MM:SS
const TIMESTAMP_PATTERN = /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2})$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

/**
 * Parses the bracketed timestamp of an access-log line, e.g. `31/Jul/2025:17:03:16 -0700`.
 * Only the token before the first space is read; the offset is dropped.
 */
export function parseLogTimestamp(rawTimestamp: string): LocalDateTime | null {
  const dateTimeToken = rawTimestamp.split(" ")[0];
  const match = TIMESTAMP_PATTERN.exec(dateTimeToken);
  if (!match) {
    return null;
  }

  const [, dayText, monthText, yearText, hourText, minuteText, secondText] = match;
  const monthIndex = MONTH_ABBREVIATIONS.indexOf(monthText.toLowerCase());
  if (monthIndex === -1) {
    return null;
  }

  const year = Number(yearText);
  const month = monthIndex + 1;
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  if (!isCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  return { year, month, day, hour, minute, second };
}

/** Parses a `YYYY-MM-DD` string into its calendar fields; month and day may drop the leading zero. */
export function parseIsoDate(value: string): { year: number; month: number; day: number } | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return isCalendarDate(year, month, day) ? { year, month, day } : null;
}

export function formatDateKey(value: Pick<LocalDateTime, "year" | "month" | "day">): string {
  return `${pad(value.year, 4)}-${pad(value.month, 2)}-${pad(value.day, 2)}`;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}
