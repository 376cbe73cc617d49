/**
 * A complete opusify run: pre-flight checks, discovery, scheduling and
 * cancellation wiring.
 */

import { availableParallelism } from "os";
import { resolve } from "path";
import { classifyTree } from "./classifier.ts";
import { buildJobs } from "./paths.ts";
import { createJobExecutor } from "./jobs.ts";
import { runJobs, validateWorkerCount, TallyCollector, type SchedulerResult } from "./scheduler.ts";
import { ProcessRunner, findExecutable } from "./runner.ts";
import { CancellationCoordinator, CancellationToken } from "./cancellation.ts";
import { ConfigError } from "./errors.ts";
import { BITRATE_PATTERN, type JobReport, type LogLevel, type RunTally } from "./types.ts";
import { RunLogger } from "../ui/logger.ts";
import { createProgressBar } from "../ui/progress.ts";

export interface TranscodeOptions {
  sourceDir: string;
  destinationDir: string;
  bitrate: string;
  encoder: string;
  /** Worker count; undefined picks one per available core */
  jobs?: number;
  dryRun: boolean;
  sourceExtension: string;
  targetExtension: string;
  killTimeoutMs: number;
  /** Where the run logs go; defaults to the destination root */
  logDir?: string;
  consoleLevel?: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
}

export interface TranscodeDeps {
  runner?: ProcessRunner;
  token?: CancellationToken;
  /** Console sink for the run logger */
  write?: (line: string) => void;
  /** Terminal sink for the progress bar */
  progressWrite?: (chunk: string) => void;
  installSignalHandlers?: boolean;
  detectParallelism?: () => number;
  /** Called once the coordinator exists, e.g. to interrupt from outside */
  onCoordinator?: (coordinator: CancellationCoordinator) => void;
}

export interface RunResult {
  tally: RunTally;
  reports: JobReport[];
  cancelled: boolean;
  total: number;
  workers: number;
  logFile: string | null;
  errorLogFile: string | null;
  elapsedMs: number;
}

export function validateBitrate(bitrate: string): string {
  if (!BITRATE_PATTERN.test(bitrate)) {
    throw new ConfigError(`Invalid bitrate format '${bitrate}'. Expected something like '192k'.`);
  }
  return bitrate;
}

/**
 * Parse a --jobs value. Undefined means auto-detect.
 */
export function parseJobs(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const jobs = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(jobs) || jobs < 1) {
    throw new ConfigError(`--jobs requires a positive integer, got '${raw}'.`);
  }
  return jobs;
}

export function resolveWorkerCount(jobs: number | undefined, detect: () => number = availableParallelism): number {
  if (jobs === undefined) {
    return Math.max(1, detect());
  }
  return validateWorkerCount(jobs);
}

export async function runTranscode(options: TranscodeOptions, deps: TranscodeDeps = {}): Promise<RunResult> {
  const startedAt = Date.now();

  // Pre-flight: nothing is touched until these pass
  const bitrate = validateBitrate(options.bitrate);
  const workers = resolveWorkerCount(options.jobs, deps.detectParallelism);
  const encoder = findExecutable(options.encoder);
  if (!encoder) {
    throw new ConfigError(
      `'${options.encoder}' not found. Please install 'opus-tools' and ensure it's in your PATH.`
    );
  }

  const sourceRoot = resolve(options.sourceDir);
  const destinationRoot = resolve(options.destinationDir);
  const files = await classifyTree(sourceRoot, {
    sourceExtension: options.sourceExtension,
    // Never walk into our own output when it sits inside the source
    exclude: destinationRoot === sourceRoot ? [] : [destinationRoot],
  });

  // A dry run leaves the destination alone, logs included
  const logDir = options.logDir ? resolve(options.logDir) : options.dryRun ? null : destinationRoot;
  const logger = new RunLogger({
    logDir,
    consoleLevel: options.consoleLevel,
    verbose: options.verbose,
    quiet: options.quiet,
    write: deps.write,
  });

  const token = deps.token ?? new CancellationToken();
  const runner = deps.runner ?? new ProcessRunner();
  const coordinator = new CancellationCoordinator(token, runner.processes, {
    killTimeoutMs: options.killTimeoutMs,
    logger,
  });
  deps.onCoordinator?.(coordinator);

  try {
    logger.info(`Transcoding started at ${new Date(startedAt).toISOString()}`);
    logger.info(`Source Directory        : ${sourceRoot}`);
    logger.info(`Destination Directory   : ${destinationRoot}`);
    logger.info(`Bitrate                 : ${bitrate}`);
    logger.info(`Encoder                 : ${encoder}`);
    logger.info(`Dry-run Mode            : ${options.dryRun}`);
    logger.info(
      options.jobs === undefined
        ? `No jobs specified, auto-detected ${workers} jobs.`
        : `Number of parallel jobs set to: ${workers}`
    );
    logger.info(workers === 1 ? "Single-threaded mode." : `Parallel mode with ${workers} jobs.`);

    const { jobs, rejected } = buildJobs(files, {
      sourceRoot,
      destinationRoot,
      targetExtension: options.targetExtension,
    });
    const total = jobs.length + rejected.length;
    logger.info(`Total ${options.sourceExtension} files found: ${files.transcode.length}`);
    logger.info(`Other files found: ${files.copy.length}`);

    // Unmappable paths never reach a worker, so they do not advance the bar
    const progress = createProgressBar({
      total: jobs.length,
      label: "Transcoding",
      quiet: options.quiet,
      write: deps.progressWrite,
    });
    logger.attachLiveLine(progress);

    if (deps.installSignalHandlers ?? true) {
      coordinator.install();
    }

    let result: SchedulerResult;
    try {
      result = await runJobs(jobs, {
        workers,
        token,
        execute: createJobExecutor({
          bitrate,
          encoder,
          dryRun: options.dryRun,
          runner,
          token,
          logger,
        }),
        onReport: () => progress.tick(),
      });

      if (token.cancelled) {
        // Returns the drain already in progress
        await coordinator.interrupt();
      }
    } finally {
      logger.attachLiveLine(null);
      progress.finish();
      coordinator.uninstall();
    }

    // Unmappable paths still count, as failures
    const collector = new TallyCollector();
    for (const report of result.reports) collector.record(report);
    for (const { sourcePath, kind, error } of rejected) {
      logger.error(`Cannot map '${sourcePath}' into the destination: ${error.message}`);
      collector.record({ job: { sourcePath, destinationPath: "", kind }, outcome: "failed", durationMs: 0, error });
    }

    const elapsedMs = Date.now() - startedAt;
    logger.info(`Transcoding ended at ${new Date().toISOString()}`);
    if (!token.cancelled) {
      logger.info("All done!");
    }

    return {
      tally: collector.tally,
      reports: collector.reports,
      cancelled: token.cancelled,
      total,
      workers,
      logFile: logger.logFile,
      errorLogFile: logger.errorLogFile,
      elapsedMs,
    };
  } finally {
    logger.close();
  }
}
