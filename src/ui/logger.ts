/**
 * Logging infrastructure for opusify
 *
 * - One RunLogger per run, passed to every component that logs
 * - Main log file (info and above) and error-only log file, next to the output
 * - Structured JSON lines in files
 * - Human-readable, colored console output
 */

import { appendFileSync, mkdirSync } from "fs";
import { join } from "path";
import pc from "picocolors";
import type { LogLevel } from "../core/types.ts";

/**
 * Log level priority (lower = more verbose)
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface RunLoggerOptions {
  /** Directory for the two log files; null logs to the console only */
  logDir: string | null;
  consoleLevel?: LogLevel;
  quiet?: boolean;
  verbose?: boolean;
  /** Unix seconds used in the log file names */
  stamp?: number;
  /** Console sink, console.log unless overridden */
  write?: (line: string) => void;
}

/**
 * Something drawn on the current terminal line, such as a progress bar,
 * that has to be erased before a log line is printed
 */
export interface LiveLine {
  clear(): void;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export class RunLogger {
  readonly logFile: string | null;
  readonly errorLogFile: string | null;

  private readonly consoleLevel: LogLevel;
  private readonly quiet: boolean;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;
  private closed = false;
  private liveLine: LiveLine | null = null;

  constructor(options: RunLoggerOptions) {
    this.consoleLevel = options.consoleLevel ?? "warn";
    this.quiet = options.quiet ?? false;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line) => console.log(line));

    if (options.logDir) {
      const stamp = options.stamp ?? Math.floor(Date.now() / 1000);
      mkdirSync(options.logDir, { recursive: true });
      this.logFile = join(options.logDir, `opusify_${stamp}.log`);
      this.errorLogFile = join(options.logDir, `opusify_${stamp}.errors.log`);
    } else {
      this.logFile = null;
      this.errorLogFile = null;
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  /**
   * Log an error with stack trace
   */
  exception(message: string, error: unknown): void {
    const errorData: Record<string, unknown> = {};
    if (error instanceof Error) {
      errorData.name = error.name;
      errorData.message = error.message;
      errorData.stack = error.stack;
    } else {
      errorData.error = String(error);
    }
    this.log("error", message, errorData);
  }

  /**
   * Erase this line before every console write. It redraws itself on its
   * next update.
   */
  attachLiveLine(line: LiveLine | null): void {
    this.liveLine = line;
  }

  /**
   * Stop writing to the log files. Console output keeps working.
   */
  close(): void {
    this.closed = true;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.writeToFiles(level, message, data);

    if (this.shouldLogToConsole(level)) {
      this.liveLine?.clear();
      this.write(formatConsole(level, message));
      if (data && (this.verbose || level === "error")) {
        this.write(pc.dim(JSON.stringify(data, null, 2)));
      }
    }
  }

  private shouldLogToConsole(level: LogLevel): boolean {
    if (this.quiet && level !== "error") return false;
    if (this.verbose) return true;
    return LOG_LEVELS[level] >= LOG_LEVELS[this.consoleLevel];
  }

  private writeToFiles(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.closed || !this.logFile || !this.errorLogFile) return;
    if (LOG_LEVELS[level] < LOG_LEVELS.info) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data && { data }),
    };
    const line = JSON.stringify(entry) + "\n";

    try {
      appendFileSync(this.logFile, line);
      if (level === "error") {
        appendFileSync(this.errorLogFile, line);
      }
    } catch {
      // A full disk or vanished log dir must not abort the run
    }
  }
}

function formatConsole(level: LogLevel, message: string): string {
  const prefix = {
    debug: pc.dim("[debug]"),
    info: pc.blue("[info]"),
    warn: pc.yellow("[warn]"),
    error: pc.red("[error]"),
  };
  return `${prefix[level]} ${message}`;
}

/**
 * Logger that writes nowhere, for callers that have no run context
 */
export function createSilentLogger(): RunLogger {
  return new RunLogger({ logDir: null, quiet: true, write: () => {} });
}
