/**
 * Cancellation for a run
 *
 * The token is a one-way switch: once cancelled it stays cancelled.
 * Workers check it before claiming a job and the runner refuses to start
 * a process after it flips.
 *
 * Usage:
 *   const coordinator = new CancellationCoordinator(token, processes, { killTimeoutMs, logger });
 *   coordinator.install();           // Ctrl-C / SIGTERM now interrupt the run
 *   await coordinator.interrupt();   // or trigger it directly
 *   coordinator.uninstall();
 */

import type { ActiveProcessSet } from "./runner.ts";
import type { RunLogger } from "../ui/logger.ts";

export type CancelListener = (reason: string) => void;

export class CancellationToken {
  private readonly controller = new AbortController();
  private readonly listeners = new Set<CancelListener>();
  private cancelReason: string | null = null;

  get cancelled(): boolean {
    return this.cancelReason !== null;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  /**
   * Aborted when the token is cancelled, for APIs that take an AbortSignal
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Flip the token. Returns true only for the call that flipped it.
   */
  cancel(reason: string): boolean {
    if (this.cancelReason !== null) {
      return false;
    }
    this.cancelReason = reason;
    this.controller.abort(reason);

    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }

  /**
   * Register a listener; it runs at most once. Returns an unsubscribe function.
   */
  onCancel(listener: CancelListener): () => void {
    if (this.cancelReason !== null) {
      listener(this.cancelReason);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export interface CoordinatorOptions {
  /** Grace period between SIGTERM and SIGKILL */
  killTimeoutMs: number;
  logger: RunLogger;
}

const HANDLED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export class CancellationCoordinator {
  private drain: Promise<void> | null = null;
  private readonly handler = (signal: NodeJS.Signals) => this.onSignal(signal);
  private installed = false;

  constructor(
    readonly token: CancellationToken,
    private readonly processes: ActiveProcessSet,
    private readonly options: CoordinatorOptions
  ) {
    // Cancelling the token directly drains processes too
    token.onCancel((reason) => {
      this.interrupt(reason).catch((error: unknown) => {
        options.logger.exception("Failed to terminate subprocesses", error);
      });
    });
  }

  /**
   * Stop dispatching, terminate every live encoder and wait until all of
   * them are gone. Repeat calls share the first call's drain.
   */
  interrupt(reason: string = "Interrupted by user"): Promise<void> {
    if (!this.drain) {
      // Assigned before cancel() so the token listener sees a drain in progress
      this.drain = Promise.resolve().then(() => this.terminate());
      this.token.cancel(reason);
    }
    return this.drain;
  }

  private async terminate(): Promise<void> {
    const { logger, killTimeoutMs } = this.options;
    logger.error(`${this.token.reason ?? "Interrupted"}. Terminating subprocesses...`, {
      active: this.processes.size,
    });
    await this.processes.terminateAll(killTimeoutMs, logger);
    logger.error("All subprocesses terminated.");
  }

  /**
   * Route SIGINT and SIGTERM to interrupt()
   */
  install(): void {
    if (this.installed) return;
    this.installed = true;
    for (const signal of HANDLED_SIGNALS) {
      process.on(signal, this.handler);
    }
  }

  uninstall(): void {
    if (!this.installed) return;
    this.installed = false;
    for (const signal of HANDLED_SIGNALS) {
      process.off(signal, this.handler);
    }
  }

  private onSignal(signal: NodeJS.Signals): void {
    if (this.drain) {
      this.options.logger.warn(`Received ${signal} again, still waiting for subprocesses to exit.`);
      return;
    }
    const reason = signal === "SIGINT" ? "Interrupted by user (Ctrl-C)" : `Received ${signal}`;
    this.interrupt(reason).catch((error: unknown) => {
      this.options.logger.exception("Failed to terminate subprocesses", error);
    });
  }
}
