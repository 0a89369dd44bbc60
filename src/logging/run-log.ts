/**
 * Run Log
 * Chronological, leveled transcript of a single pipeline execution
 */

import {
  LOG_LEVEL_ORDER,
  type LogEntry,
  type LogLevel,
} from "../types/index.js";

/**
 * Options for a run log
 */
export interface RunLogOptions {
  /** Minimum level to record (default: INFO) */
  level?: LogLevel;
  /** Clock for entry timestamps */
  now?: () => Date;
  /**
   * Receives every recorded entry. If it throws, mirroring stops for the
   * rest of the run and a WARNING entry records the failure.
   */
  onEntry?: (entry: LogEntry) => void;
}

/**
 * Formats an entry as `<timestamp> | <LEVEL> | <message>`
 */
export function formatLogEntry(entry: LogEntry): string {
  return `${entry.timestamp.toISOString()} | ${entry.level} | ${entry.message}`;
}

/**
 * Per-run log accumulator
 *
 * A new instance is created for every run and handed back with its result,
 * so entries from different runs never share a buffer.
 *
 * @example
 * ```typescript
 * const log = new RunLog({ level: 'DEBUG' });
 * log.info('Parsed 12 rows');
 * log.toText(); // "2026-01-05T10:00:00.000Z | INFO | Parsed 12 rows"
 * ```
 */
export class RunLog {
  private readonly records: LogEntry[] = [];
  private readonly threshold: number;
  private readonly now: () => Date;
  private onEntry: ((entry: LogEntry) => void) | undefined;

  constructor(options: RunLogOptions = {}) {
    this.threshold = LOG_LEVEL_ORDER[options.level ?? "INFO"];
    this.now = options.now ?? (() => new Date());
    this.onEntry = options.onEntry;
  }

  debug(message: string): void {
    this.append("DEBUG", message);
  }

  info(message: string): void {
    this.append("INFO", message);
  }

  warn(message: string): void {
    this.append("WARNING", message);
  }

  /**
   * Records an error; when `error` carries a stack, every stack line after
   * the first is recorded as its own ERROR entry
   */
  error(message: string, error?: unknown): void {
    this.append("ERROR", message);

    if (error instanceof Error && error.stack !== undefined) {
      for (const line of error.stack.split("\n").slice(1)) {
        const trimmed = line.trim();
        if (trimmed !== "") {
          this.append("ERROR", `    ${trimmed}`);
        }
      }
    }

    // Include the chain of causes
    if (error instanceof Error && error.cause !== undefined) {
      const cause = error.cause;
      const causeMessage = cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
      this.error(`Caused by ${causeMessage}`, cause instanceof Error ? cause : undefined);
    }
  }

  /**
   * Recorded entries in chronological order
   */
  get entries(): readonly LogEntry[] {
    return this.records;
  }

  /**
   * Number of recorded entries
   */
  get size(): number {
    return this.records.length;
  }

  /**
   * Plain-text transcript, one formatted entry per line
   */
  toText(): string {
    return this.records.map(formatLogEntry).join("\n");
  }

  private append(level: LogLevel, message: string): void {
    if (LOG_LEVEL_ORDER[level] < this.threshold) {
      return;
    }

    const entry: LogEntry = { timestamp: this.now(), level, message };
    this.records.push(entry);
    this.mirror(entry);
  }

  private mirror(entry: LogEntry): void {
    const onEntry = this.onEntry;
    if (onEntry === undefined) return;

    try {
      onEntry(entry);
    } catch (error) {
      this.onEntry = undefined;
      const reason = error instanceof Error ? error.message : String(error);
      this.records.push({
        timestamp: this.now(),
        level: "WARNING",
        message: `Log mirror failed: ${reason}; further entries are not mirrored`,
      });
    }
  }
}
