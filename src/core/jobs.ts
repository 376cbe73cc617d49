/**
 * Executes a single job. Every failure is turned into a JobReport; nothing
 * thrown here reaches the scheduler.
 */

import { copyFile, mkdir, rm, stat, utimes } from "fs/promises";
import { dirname } from "path";
import { MTIME_TOLERANCE_MS, checkFreshness } from "./freshness.ts";
import { encoderArgs, type ProcessResult, type ProcessRunner } from "./runner.ts";
import { InterruptedError, ProcessExitError } from "./errors.ts";
import type { CancellationToken } from "./cancellation.ts";
import type { Job, JobReport, Outcome } from "./types.ts";
import type { RunLogger } from "../ui/logger.ts";

export interface ExecutorOptions {
  bitrate: string;
  /** Encoder executable, already resolved */
  encoder: string;
  dryRun: boolean;
  runner: ProcessRunner;
  token: CancellationToken;
  logger: RunLogger;
}

export type JobExecutor = (job: Job) => Promise<JobReport>;

type Finish = (outcome: Outcome, extra?: Partial<Omit<JobReport, "job" | "outcome">>) => JobReport;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function sizeOf(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch {
    return undefined;
  }
}

/**
 * Remove whatever an interrupted or failed encoder left behind, so the
 * next run does not take it for finished output.
 * Returns true if there was a partial file.
 */
async function removePartialOutput(path: string): Promise<boolean> {
  const existed = (await sizeOf(path)) !== undefined;
  await rm(path, { force: true });
  return existed;
}

export function createJobExecutor(options: ExecutorOptions): JobExecutor {
  const { bitrate, encoder, dryRun, runner, token, logger } = options;

  async function interrupted(job: Job, finish: Finish, signal: NodeJS.Signals | null): Promise<JobReport> {
    const error = new InterruptedError(signal);
    const partial = await removePartialOutput(job.destinationPath);
    logger.error(`Transcoding '${job.sourcePath}' was interrupted.`, { partialOutputRemoved: partial });
    return finish(partial ? "failed" : "skipped", { error });
  }

  async function encoderFailed(job: Job, finish: Finish, error: ProcessExitError): Promise<JobReport> {
    const partial = await removePartialOutput(job.destinationPath);
    const reason = error.signal ? `Encoder was killed by ${error.signal}.` : `Encoder exited with code ${error.exitCode}.`;
    logger.error(`Failed to transcode '${job.sourcePath}' to '${job.destinationPath}'. ${reason}`, {
      stderr: error.stderr,
      partialOutputRemoved: partial,
    });
    return finish("failed", { error });
  }

  async function transcode(job: Job, finish: Finish): Promise<JobReport> {
    const { sourcePath, destinationPath } = job;
    const result: ProcessResult = await runner.run(encoder, encoderArgs(bitrate, sourcePath, destinationPath), {
      signal: token.signal,
    });

    switch (result.status) {
      case "aborted":
        return finish("skipped", { error: new InterruptedError(null) });

      case "start-failed":
        logger.error(`Failed to start subprocess for '${sourcePath}': ${result.error.message}`);
        return finish("failed", { error: result.error });

      case "signalled":
        if (token.cancelled) {
          return interrupted(job, finish, result.signal);
        }
        return encoderFailed(job, finish, new ProcessExitError(encoder, null, result.stderr, result.signal));

      case "exited":
        if (result.code !== 0) {
          if (token.cancelled) {
            return interrupted(job, finish, null);
          }
          return encoderFailed(job, finish, new ProcessExitError(encoder, result.code, result.stderr));
        }
    }

    const sourceBytes = await sizeOf(sourcePath);
    const destinationBytes = await sizeOf(destinationPath);
    const report = finish("success", { sourceBytes, destinationBytes });

    logger.info(`Successfully transcoded '${sourcePath}' to '${destinationPath}'.`);
    logger.info(
      `File Size: Source=${sourceBytes ?? "N/A"} bytes, Destination=${destinationBytes ?? "N/A"} bytes.`
    );
    logger.info(`Conversion Duration: ${(report.durationMs / 1000).toFixed(2)} seconds.`);
    return report;
  }

  async function copy(job: Job, finish: Finish): Promise<JobReport> {
    const { sourcePath, destinationPath } = job;
    await copyFile(sourcePath, destinationPath);
    const source = await stat(sourcePath);
    await utimes(destinationPath, source.atime, source.mtime);

    logger.info(`Copied '${sourcePath}' to '${destinationPath}'.`);
    return finish("success", { sourceBytes: source.size, destinationBytes: source.size });
  }

  return async function execute(job: Job): Promise<JobReport> {
    const startedAt = Date.now();
    const finish: Finish = (outcome, extra) => ({
      job,
      outcome,
      durationMs: Date.now() - startedAt,
      ...extra,
    });
    const verb = job.kind === "transcode" ? "transcode" : "copy";

    try {
      // Only copies get their mtime from utimes, which can round it down
      const tolerance = job.kind === "copy" ? MTIME_TOLERANCE_MS : 0;
      if ((await checkFreshness(job.sourcePath, job.destinationPath, tolerance)) === "up-to-date") {
        logger.info(`Skipping '${job.sourcePath}' as '${job.destinationPath}' is up-to-date.`);
        return finish("skipped");
      }

      if (dryRun) {
        const detail = job.kind === "transcode" ? ` with bitrate ${bitrate}` : "";
        logger.info(`Dry-run: Would ${verb} '${job.sourcePath}' to '${job.destinationPath}'${detail}.`);
        return finish("dry-run");
      }

      await mkdir(dirname(job.destinationPath), { recursive: true });
      return job.kind === "transcode" ? await transcode(job, finish) : await copy(job, finish);
    } catch (error) {
      logger.exception(`Unexpected error trying to ${verb} '${job.sourcePath}'`, error);
      return finish("failed", { error: toError(error) });
    }
  };
}
