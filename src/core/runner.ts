/**
 * External encoder processes
 *
 * Every live child is tracked in an ActiveProcessSet so an interrupt can
 * reach it. A handle is added right after a successful spawn and removed
 * as soon as its close event is seen; both happen synchronously, never
 * across an await.
 */

import { spawn, type ChildProcess } from "child_process";
import { accessSync, constants, statSync } from "fs";
import { delimiter, isAbsolute, join, resolve } from "path";
import { ProcessStartError } from "./errors.ts";
import type { RunLogger } from "../ui/logger.ts";

/**
 * How much stderr is kept for the error log
 */
const STDERR_LIMIT = 4096;

export type ProcessResult =
  | { status: "exited"; code: number; stderr: string }
  | { status: "signalled"; signal: NodeJS.Signals; stderr: string }
  | { status: "start-failed"; error: ProcessStartError }
  /** Cancellation was already requested; nothing was started */
  | { status: "aborted" };

export interface RunOptions {
  signal?: AbortSignal;
}

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

export class ActiveProcessSet {
  private readonly handles = new Set<ChildProcess>();
  private readonly closed = new WeakMap<ChildProcess, Promise<void>>();

  get size(): number {
    return this.handles.size;
  }

  add(child: ChildProcess): void {
    this.handles.add(child);
    this.closed.set(
      child,
      new Promise((resolveClosed) => {
        child.once("close", () => resolveClosed());
      })
    );
  }

  delete(child: ChildProcess): void {
    this.handles.delete(child);
  }

  snapshot(): ChildProcess[] {
    return [...this.handles];
  }

  /**
   * SIGTERM every live process, give each up to timeoutMs to exit, then
   * SIGKILL whatever is left. The grace periods run concurrently.
   * Resolves once every process in the set has closed.
   */
  async terminateAll(timeoutMs: number, logger: RunLogger): Promise<void> {
    const targets = this.snapshot();
    if (targets.length === 0) {
      return;
    }

    for (const child of targets) {
      if (isRunning(child)) {
        try {
          child.kill("SIGTERM");
          logger.info(`Terminated subprocess with PID ${child.pid}.`);
        } catch (error) {
          logger.exception(`Failed to terminate subprocess ${child.pid}`, error);
        }
      }
    }

    await Promise.all(targets.map((child) => this.awaitExit(child, timeoutMs, logger)));
  }

  private async awaitExit(child: ChildProcess, timeoutMs: number, logger: RunLogger): Promise<void> {
    const closed = this.closed.get(child);
    if (!closed || !this.handles.has(child)) {
      return;
    }

    if (await settlesWithin(closed, timeoutMs)) {
      logger.info(`Subprocess with PID ${child.pid} has exited.`);
      return;
    }

    logger.warn(`Subprocess with PID ${child.pid} did not terminate in time. Killing it.`);
    child.kill("SIGKILL");
    await closed;
  }
}

function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  return new Promise((resolveSettled) => {
    const timer = setTimeout(() => resolveSettled(false), timeoutMs);
    void promise.then(() => {
      clearTimeout(timer);
      resolveSettled(true);
    });
  });
}

export class ProcessRunner {
  constructor(readonly processes: ActiveProcessSet = new ActiveProcessSet()) {}

  /**
   * Run an executable to completion. Never rejects: start failures and
   * bad exits come back as a ProcessResult.
   */
  run(executable: string, args: string[], options: RunOptions = {}): Promise<ProcessResult> {
    if (options.signal?.aborted) {
      return Promise.resolve({ status: "aborted" });
    }

    let child: ChildProcess;
    try {
      child = spawn(executable, args, {
        stdio: ["ignore", "ignore", "pipe"],
      });
    } catch (error) {
      return Promise.resolve({ status: "start-failed", error: new ProcessStartError(executable, error) });
    }

    return new Promise((resolveResult) => {
      // Spawn errors (ENOENT, EACCES) arrive asynchronously with no pid
      if (child.pid === undefined) {
        child.once("error", (error) => {
          resolveResult({ status: "start-failed", error: new ProcessStartError(executable, error) });
        });
        return;
      }

      this.processes.add(child);

      let stderr = "";
      child.stderr?.setEncoding("utf-8");
      child.stderr?.on("data", (chunk: string) => {
        stderr = (stderr + chunk).slice(-STDERR_LIMIT);
      });

      // A failed kill() lands here; the close event still follows
      child.on("error", (error) => {
        stderr = (stderr + `\n${error.message}`).slice(-STDERR_LIMIT);
      });

      child.once("close", (code, signal) => {
        this.processes.delete(child);
        if (signal) {
          resolveResult({ status: "signalled", signal, stderr });
        } else {
          resolveResult({ status: "exited", code: code ?? 0, stderr });
        }
      });
    });
  }
}

/**
 * Resolve a command the way a shell would: explicit paths are checked
 * directly, bare names are searched on PATH.
 */
export function findExecutable(command: string, pathEnv: string = process.env.PATH ?? ""): string | null {
  const candidates =
    isAbsolute(command) || command.includes("/")
      ? [resolve(command)]
      : pathEnv
          .split(delimiter)
          .filter((dir) => dir.length > 0)
          .map((dir) => join(dir, command));

  for (const candidate of candidates) {
    try {
      accessSync(candidate, constants.X_OK);
      if (statSync(candidate).isFile()) {
        return candidate;
      }
    } catch {
      // Not here, keep looking
    }
  }
  return null;
}

/**
 * Encoder command line: <encoder> --bitrate <B> <source> <destination>
 */
export function encoderArgs(bitrate: string, sourcePath: string, destinationPath: string): string[] {
  return ["--bitrate", bitrate, sourcePath, destinationPath];
}
