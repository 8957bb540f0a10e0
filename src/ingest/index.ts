import { createReadStream } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { once } from "node:events";
import path from "node:path";
import { createInterface } from "node:readline";

import { createLogger, type Logger } from "../logger.js";
import { parseLogLine } from "../parser/index.js";
import type { LogRecord } from "../types.js";

const CANDIDATE_NAME_MARKERS = ["log", "rental", "access"];

export interface IngestOptions {
  maxRecords?: number;
  logger?: Logger;
}

export interface FileReadStats {
  fileName: string;
  parsed: number;
  malformed: number;
  badTimestamp: number;
  capReached: boolean;
}

export function isCandidateFileName(fileName: string): boolean {
  const lowered = fileName.toLowerCase();
  return CANDIDATE_NAME_MARKERS.some((marker) => lowered.includes(marker));
}

/**
 * Lists regular files directly inside `directory` whose names look like access logs,
 * sorted by name. A missing directory yields no candidates.
 */
export async function findCandidateFiles(directory: string, logger: Logger = defaultLogger()): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
    if (isNotFoundError(error)) {
      logger.warn(`log directory ${directory} does not exist`);
    } else {
      logger.error(`failed to list log directory ${directory}`, error);
    }
    return null;
  });
  if (!entries) {
    return [];
  }

  const candidates: string[] = [];
  for (const entry of entries) {
    if (!isCandidateFileName(entry.name)) {
      continue;
    }

    if (entry.isFile()) {
      candidates.push(path.join(directory, entry.name));
      continue;
    }

    if (entry.isSymbolicLink() && (await isRegularFile(path.join(directory, entry.name)))) {
      candidates.push(path.join(directory, entry.name));
    }
  }

  return candidates.sort(compareByName);
}

export async function ingestDirectory(directory: string, options: IngestOptions = {}): Promise<LogRecord[]> {
  const logger = options.logger ?? defaultLogger();
  const cap = options.maxRecords !== undefined && options.maxRecords > 0 ? options.maxRecords : undefined;

  const files = await findCandidateFiles(directory, logger);
  logger.info(`found ${files.length} log files in ${directory}`);

  const records: LogRecord[] = [];
  for (const filePath of files) {
    const remaining = cap === undefined ? undefined : cap - records.length;
    const stats = await readRecordsFromFile(filePath, records, remaining, logger);

    logger.info(
      `parsed ${stats.parsed} entries from ${stats.fileName}` +
        (stats.malformed + stats.badTimestamp > 0
          ? ` (skipped ${stats.malformed} malformed, ${stats.badTimestamp} with bad timestamps)`
          : ""),
    );

    if (stats.capReached) {
      logger.info(`reached max entries limit (${cap}), stopping parsing`);
      break;
    }
  }

  logger.info(`successfully parsed ${records.length} total log entries`);
  return records;
}

/**
 * Appends the records parsed from one file to `into`, stopping once `limit` records were read.
 * A read error is logged and the file contributes nothing, even if some lines were already parsed.
 */
export async function readRecordsFromFile(
  filePath: string,
  into: LogRecord[],
  limit: number | undefined,
  logger: Logger = defaultLogger(),
): Promise<FileReadStats> {
  const fileName = path.basename(filePath);
  const stats: FileReadStats = { fileName, parsed: 0, malformed: 0, badTimestamp: 0, capReached: false };

  if (limit !== undefined && limit <= 0) {
    stats.capReached = true;
    return stats;
  }

  const fileRecords: LogRecord[] = [];
  const stream = createReadStream(filePath, { encoding: "utf8" });
  try {
    await once(stream, "open");

    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    for await (const line of lines) {
      if (line.trim() === "") {
        continue;
      }

      const result = parseLogLine(line, fileName);
      if (!result.ok) {
        if (result.failure.kind === "malformed") {
          stats.malformed += 1;
        } else {
          stats.badTimestamp += 1;
          logger.debug(`bad timestamp "${result.failure.timestamp}" in ${fileName}`);
        }
        continue;
      }

      fileRecords.push(result.record);

      if (limit !== undefined && fileRecords.length >= limit) {
        stats.capReached = true;
        break;
      }
    }
  } catch (error: unknown) {
    logger.error(`error reading ${filePath}`, error);
    return stats;
  } finally {
    stream.destroy();
  }

  for (const record of fileRecords) {
    into.push(record);
  }
  stats.parsed = fileRecords.length;
  return stats;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

function compareByName(a: string, b: string): number {
  const nameA = path.basename(a);
  const nameB = path.basename(b);
  if (nameA === nameB) {
    return 0;
  }
  return nameA < nameB ? -1 : 1;
}

function isNotFoundError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function defaultLogger(): Logger {
  return createLogger("ingest");
}
