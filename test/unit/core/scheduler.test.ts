import { describe, test, expect, vi } from "vitest";
import { runJobs, TallyCollector } from "../../../src/core/scheduler.ts";
import { CancellationToken } from "../../../src/core/cancellation.ts";
import { ConfigError, InterruptedError } from "../../../src/core/errors.ts";
import { tallyTotal, type Job, type JobReport, type Outcome } from "../../../src/core/types.ts";
import type { JobExecutor } from "../../../src/core/jobs.ts";
import { deferred } from "../../helpers/test-utils.ts";

function makeJobs(count: number, kind: Job["kind"] = "transcode"): Job[] {
  return Array.from({ length: count }, (_, i) => ({
    sourcePath: `/src/${i}.flac`,
    destinationPath: `/dst/${i}.opus`,
    kind,
  }));
}

/**
 * Executor that resolves after a tick with an outcome picked from the path
 */
function outcomeExecutor(pick: (job: Job) => Outcome = () => "success") {
  const calls: string[] = [];
  const execute: JobExecutor = async (job) => {
    calls.push(job.sourcePath);
    await new Promise((r) => setTimeout(r, 1));
    return { job, outcome: pick(job), durationMs: 1 };
  };
  return { execute, calls };
}

describe("runJobs", () => {
  test("executes every job exactly once", async () => {
    const jobs = makeJobs(25);
    const { execute, calls } = outcomeExecutor();

    const result = await runJobs(jobs, { workers: 4, token: new CancellationToken(), execute });

    expect(calls.slice().sort()).toEqual(jobs.map((job) => job.sourcePath).sort());
    expect(result.reports).toHaveLength(25);
    expect(result.tally.transcode).toEqual({ success: 25, failed: 0, skipped: 0, "dry-run": 0 });
    expect(result.cancelled).toBe(false);
  });

  test("single worker runs jobs in order", async () => {
    const jobs = makeJobs(5);
    const { execute, calls } = outcomeExecutor();

    await runJobs(jobs, { workers: 1, token: new CancellationToken(), execute });

    expect(calls).toEqual(jobs.map((job) => job.sourcePath));
  });

  test("one worker and many workers produce the same tally", async () => {
    const jobs = [...makeJobs(9), ...makeJobs(4, "copy")];
    const pick = (job: Job): Outcome => (job.sourcePath.startsWith("/src/1") ? "failed" : "success");

    const sequential = await runJobs(jobs, {
      workers: 1,
      token: new CancellationToken(),
      execute: outcomeExecutor(pick).execute,
    });
    const parallel = await runJobs(jobs, {
      workers: 6,
      token: new CancellationToken(),
      execute: outcomeExecutor(pick).execute,
    });

    expect(parallel.tally).toEqual(sequential.tally);
    expect(sequential.tally.transcode).toEqual({ success: 8, failed: 1, skipped: 0, "dry-run": 0 });
    expect(sequential.tally.copy).toEqual({ success: 3, failed: 1, skipped: 0, "dry-run": 0 });
  });

  test("never runs more than W jobs at once", async () => {
    let running = 0;
    let peak = 0;
    const execute: JobExecutor = async (job) => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running -= 1;
      return { job, outcome: "success", durationMs: 5 };
    };

    await runJobs(makeJobs(12), { workers: 3, token: new CancellationToken(), execute });

    expect(peak).toBe(3);
  });

  test("handles fewer jobs than workers and no jobs at all", async () => {
    const token = new CancellationToken();
    const { execute } = outcomeExecutor();

    const few = await runJobs(makeJobs(2), { workers: 8, token, execute });
    const none = await runJobs([], { workers: 8, token, execute });

    expect(tallyTotal(few.tally.transcode)).toBe(2);
    expect(none.reports).toEqual([]);
  });

  test("converts executor exceptions into failures", async () => {
    const execute: JobExecutor = async (job) => {
      if (job.sourcePath === "/src/1.flac") {
        throw new Error("executor bug");
      }
      return { job, outcome: "success", durationMs: 0 };
    };

    const result = await runJobs(makeJobs(3), { workers: 2, token: new CancellationToken(), execute });

    expect(result.tally.transcode).toEqual({ success: 2, failed: 1, skipped: 0, "dry-run": 0 });
    const failed = result.reports.find((report) => report.outcome === "failed");
    expect(failed?.error?.message).toBe("executor bug");
  });

  test("jobs not yet claimed at cancellation are skipped without running", async () => {
    const token = new CancellationToken();
    const calls: string[] = [];
    const execute: JobExecutor = async (job) => {
      calls.push(job.sourcePath);
      if (job.sourcePath === "/src/1.flac") {
        token.cancel("stop");
      }
      return { job, outcome: "success", durationMs: 0 };
    };

    const result = await runJobs(makeJobs(6), { workers: 1, token, execute });

    expect(calls).toEqual(["/src/0.flac", "/src/1.flac"]);
    expect(result.cancelled).toBe(true);
    expect(result.tally.transcode).toEqual({ success: 2, failed: 0, skipped: 4, "dry-run": 0 });
    const skipped = result.reports.filter((report) => report.outcome === "skipped");
    expect(skipped.every((report) => report.error instanceof InterruptedError)).toBe(true);
  });

  test("in-flight jobs finish and still count after cancellation", async () => {
    const token = new CancellationToken();
    const gate = deferred();
    let started = 0;
    const execute: JobExecutor = async (job) => {
      started += 1;
      await gate.promise;
      return { job, outcome: token.cancelled ? "failed" : "success", durationMs: 0 };
    };

    const pending = runJobs(makeJobs(10), { workers: 3, token, execute });
    await new Promise((r) => setTimeout(r, 5));
    token.cancel("stop");
    gate.resolve();
    const result = await pending;

    expect(started).toBe(3);
    expect(result.tally.transcode).toEqual({ success: 0, failed: 3, skipped: 7, "dry-run": 0 });
    expect(tallyTotal(result.tally.transcode)).toBe(10);
  });

  test("reports each job through onReport", async () => {
    const onReport = vi.fn();
    const { execute } = outcomeExecutor();

    await runJobs(makeJobs(4), { workers: 2, token: new CancellationToken(), execute, onReport });

    expect(onReport).toHaveBeenCalledTimes(4);
  });

  test.each([0, -1, 1.5, Number.NaN])("rejects worker count %s", async (workers) => {
    const { execute } = outcomeExecutor();
    await expect(runJobs(makeJobs(1), { workers, token: new CancellationToken(), execute })).rejects.toBeInstanceOf(
      ConfigError
    );
  });
});

describe("TallyCollector", () => {
  test("counts per kind and outcome", () => {
    const collector = new TallyCollector();
    const [transcode] = makeJobs(1);
    const [copy] = makeJobs(1, "copy");
    const report = (job: Job, outcome: Outcome): JobReport => ({ job, outcome, durationMs: 0 });

    collector.record(report(transcode, "success"));
    collector.record(report(transcode, "dry-run"));
    collector.record(report(copy, "skipped"));

    expect(collector.tally).toEqual({
      transcode: { success: 1, failed: 0, skipped: 0, "dry-run": 1 },
      copy: { success: 0, failed: 0, skipped: 1, "dry-run": 0 },
    });
    expect(collector.reports).toHaveLength(3);
  });
});
