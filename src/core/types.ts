/**
 * Core types and schemas for opusify
 */

import { z } from "zod";

/**
 * Log levels
 */
export const LogLevel = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevel>;

/**
 * Encoder bitrate, e.g. "192k"
 */
export const BITRATE_PATTERN = /^[0-9]+k$/;

const Extension = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, "must look like .ext");

/**
 * Configuration schema (config.toml + OPUSIFY_* environment)
 */
export const ConfigSchema = z.object({
  // Encoding
  bitrate: z.string().regex(BITRATE_PATTERN, "must look like 192k").default("192k"),
  encoder: z.string().min(1).default("opusenc"),

  // Files
  source_extension: Extension.default(".flac"),
  target_extension: Extension.default(".opus"),

  // Scheduling
  jobs: z.number().int().min(1).optional(),
  kill_timeout_ms: z.number().int().min(0).default(5000),

  // Logging
  log_level: LogLevel.default("warn"),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * What happens to a discovered file
 */
export const JobKind = z.enum(["transcode", "copy"]);
export type JobKind = z.infer<typeof JobKind>;

/**
 * Closed set of per-job results
 */
export const Outcome = z.enum(["success", "failed", "skipped", "dry-run"]);
export type Outcome = z.infer<typeof Outcome>;

export const OUTCOMES: readonly Outcome[] = Outcome.options;

/**
 * One unit of work. Created during discovery and never mutated.
 */
export interface Job {
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly kind: JobKind;
}

export type ResultTally = Record<Outcome, number>;

/**
 * Tallies kept per job kind so transcodes and copies are summarized apart
 */
export type RunTally = Record<JobKind, ResultTally>;

/**
 * Structured record of a finished job, for logging and summaries
 */
export interface JobReport {
  job: Job;
  outcome: Outcome;
  durationMs: number;
  sourceBytes?: number;
  destinationBytes?: number;
  error?: Error;
}

/**
 * CLI options that can override config
 */
export interface CliOptions {
  bitrate?: string;
  jobs?: string;
  dryRun?: boolean;
  encoder?: string;
  logDir?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function emptyTally(): ResultTally {
  return { success: 0, failed: 0, skipped: 0, "dry-run": 0 };
}

export function emptyRunTally(): RunTally {
  return { transcode: emptyTally(), copy: emptyTally() };
}

export function tallyTotal(tally: ResultTally): number {
  return OUTCOMES.reduce((sum, outcome) => sum + tally[outcome], 0);
}
