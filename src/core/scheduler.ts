/**
 * Job scheduler
 *
 * W workers pull the next unclaimed job from a shared cursor. W = 1 is a
 * plain loop. Every job ends up with exactly one report, including jobs
 * that were never started because the run was cancelled.
 */

import { ConfigError, InterruptedError } from "./errors.ts";
import { emptyRunTally, type Job, type JobReport, type RunTally } from "./types.ts";
import type { CancellationToken } from "./cancellation.ts";
import type { JobExecutor } from "./jobs.ts";

export interface SchedulerOptions {
  workers: number;
  token: CancellationToken;
  execute: JobExecutor;
  /** Called once per job, in completion order */
  onReport?: (report: JobReport) => void;
}

export interface SchedulerResult {
  tally: RunTally;
  reports: JobReport[];
  cancelled: boolean;
}

/**
 * The only writer of the tally. Workers hand it finished reports.
 */
export class TallyCollector {
  readonly tally: RunTally = emptyRunTally();
  readonly reports: JobReport[] = [];

  constructor(private readonly onReport?: (report: JobReport) => void) {}

  record(report: JobReport): void {
    this.tally[report.job.kind][report.outcome] += 1;
    this.reports.push(report);
    this.onReport?.(report);
  }
}

export function validateWorkerCount(workers: number): number {
  if (!Number.isInteger(workers) || workers < 1) {
    throw new ConfigError(`Worker count must be a positive integer, got ${workers}`);
  }
  return workers;
}

export async function runJobs(jobs: readonly Job[], options: SchedulerOptions): Promise<SchedulerResult> {
  const workers = validateWorkerCount(options.workers);
  const { token, execute } = options;
  const collector = new TallyCollector(options.onReport);

  const skip = (job: Job) => {
    collector.record({ job, outcome: "skipped", durationMs: 0, error: new InterruptedError(null) });
  };

  const runOne = async (job: Job) => {
    let report: JobReport;
    try {
      report = await execute(job);
    } catch (error) {
      report = {
        job,
        outcome: "failed",
        durationMs: 0,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
    collector.record(report);
  };

  if (workers === 1) {
    for (const job of jobs) {
      if (token.cancelled) {
        skip(job);
      } else {
        await runOne(job);
      }
    }
  } else {
    let cursor = 0;
    const claim = (): Job | undefined => (cursor < jobs.length ? jobs[cursor++] : undefined);

    const worker = async () => {
      for (let job = claim(); job !== undefined; job = claim()) {
        if (token.cancelled) {
          skip(job);
        } else {
          await runOne(job);
        }
      }
    };

    const poolSize = Math.min(workers, jobs.length);
    await Promise.all(Array.from({ length: poolSize }, () => worker()));
  }

  return {
    tally: collector.tally,
    reports: collector.reports,
    cancelled: token.cancelled,
  };
}
