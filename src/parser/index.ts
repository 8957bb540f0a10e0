import type { LogRecord, ParseResult } from "../types.js";
import { LOG_FORMATS, type LogFormat } from "./formats.js";
import { classifySoftwareFamily } from "./software.js";
import { parseLogTimestamp } from "./timestamp.js";

export function parseLogLine(line: string, sourceFile = "", formats: readonly LogFormat[] = LOG_FORMATS): ParseResult {
  const trimmed = line.trim();

  for (const format of formats) {
    const match = format.pattern.exec(trimmed);
    if (!match?.groups) {
      continue;
    }

    const fields = format.extract(match.groups);
    const occurredAt = parseLogTimestamp(fields.rawTimestamp);
    if (!occurredAt) {
      return { ok: false, failure: { kind: "bad_timestamp", timestamp: fields.rawTimestamp } };
    }

    const record: LogRecord = {
      ...fields,
      occurredAt,
      softwareFamily: classifySoftwareFamily(fields.userAgent),
      sourceFile,
    };
    return { ok: true, record };
  }

  return { ok: false, failure: { kind: "malformed" } };
}

export { LOG_FORMATS } from "./formats.js";
export type { ExtractedFields, LogFormat } from "./formats.js";
export { ABSENT_FIELD, classifySoftwareFamily, isSoftwareFamily, softwareFamilyLabel } from "./software.js";
export { formatDateKey, parseIsoDate, parseLogTimestamp } from "./timestamp.js";
