import { createLogger, type Logger } from "../logger.js";
import type { LogRecord, RecordSnapshot } from "../types.js";

export type RecordLoader = () => Promise<LogRecord[]>;

export interface RecordStoreOptions {
  logger?: Logger;
}

/**
 * Owns the process-wide record set. Readers take a snapshot; a refresh builds the next
 * snapshot off to the side and swaps it in with one assignment, so no reader ever sees a
 * partially loaded set.
 */
export class RecordStore {
  private snapshot: RecordSnapshot;
  private inFlight: Promise<RecordSnapshot> | null = null;
  private readonly loader: RecordLoader;
  private readonly logger: Logger;

  constructor(loader: RecordLoader, options: RecordStoreOptions = {}) {
    this.loader = loader;
    this.logger = options.logger ?? createLogger("store");
    this.snapshot = Object.freeze({
      records: Object.freeze([]),
      loadedAt: new Date(0),
      generation: 0,
    });
  }

  current(): RecordSnapshot {
    return this.snapshot;
  }

  /** Reloads every record. Calls made while a reload is running share its result. */
  refresh(): Promise<RecordSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async load(): Promise<RecordSnapshot> {
    let records: LogRecord[];
    try {
      records = await this.loader();
    } catch (error: unknown) {
      this.logger.error("failed to reload log records, keeping previous snapshot", error);
      throw error;
    }

    const next: RecordSnapshot = Object.freeze({
      records: Object.freeze(records),
      loadedAt: new Date(),
      generation: this.snapshot.generation + 1,
    });
    this.snapshot = next;
    this.logger.info(`loaded ${records.length} log entries (generation ${next.generation})`);
    return next;
  }
}
