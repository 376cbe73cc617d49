import { describe, test, expect, vi } from "vitest";
import { CancellationCoordinator, CancellationToken } from "../../../src/core/cancellation.ts";
import { ProcessRunner } from "../../../src/core/runner.ts";
import { RunLogger, createSilentLogger } from "../../../src/ui/logger.ts";

describe("CancellationToken", () => {
  test("starts uncancelled", () => {
    const token = new CancellationToken();

    expect(token.cancelled).toBe(false);
    expect(token.reason).toBeNull();
    expect(token.signal.aborted).toBe(false);
  });

  test("flips exactly once", () => {
    const token = new CancellationToken();

    expect(token.cancel("first")).toBe(true);
    expect(token.cancel("second")).toBe(false);
    expect(token.cancelled).toBe(true);
    expect(token.reason).toBe("first");
    expect(token.signal.aborted).toBe(true);
  });

  test("runs listeners once with the first reason", () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    token.onCancel(listener);

    token.cancel("stop");
    token.cancel("stop again");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("stop");
  });

  test("calls late listeners immediately", () => {
    const token = new CancellationToken();
    token.cancel("done");
    const listener = vi.fn();

    token.onCancel(listener);

    expect(listener).toHaveBeenCalledWith("done");
  });

  test("unsubscribed listeners are not called", () => {
    const token = new CancellationToken();
    const listener = vi.fn();
    const unsubscribe = token.onCancel(listener);

    unsubscribe();
    token.cancel("stop");

    expect(listener).not.toHaveBeenCalled();
  });
});

describe("CancellationCoordinator", () => {
  function setup(logger: RunLogger = createSilentLogger()) {
    const token = new CancellationToken();
    const runner = new ProcessRunner();
    const coordinator = new CancellationCoordinator(token, runner.processes, { killTimeoutMs: 1000, logger });
    return { token, runner, coordinator };
  }

  test("interrupt flips the token and drains live processes", async () => {
    const { token, runner, coordinator } = setup();
    const pending = runner.run("/bin/sh", ["-c", "exec sleep 30"]);

    await coordinator.interrupt("Interrupted by test");

    expect(token.cancelled).toBe(true);
    expect(token.reason).toBe("Interrupted by test");
    expect(runner.processes.size).toBe(0);
    expect(await pending).toEqual({ status: "signalled", signal: "SIGTERM", stderr: "" });
  });

  test("repeat interrupts share one drain", () => {
    const { coordinator } = setup();

    const first = coordinator.interrupt();
    const second = coordinator.interrupt();

    expect(second).toBe(first);
    return first;
  });

  test("cancelling the token directly also terminates processes", async () => {
    const { token, runner, coordinator } = setup();
    const pending = runner.run("/bin/sh", ["-c", "exec sleep 30"]);

    token.cancel("external");

    expect(coordinator.token.cancelled).toBe(true);
    expect((await pending).status).toBe("signalled");
    await coordinator.interrupt();
    expect(runner.processes.size).toBe(0);
  });

  test("logs the reason to the error log", async () => {
    const lines: string[] = [];
    const logger = new RunLogger({ logDir: null, write: (line) => lines.push(line) });
    const { coordinator } = setup(logger);

    await coordinator.interrupt("Interrupted by user (Ctrl-C)");

    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain("Interrupted by user (Ctrl-C). Terminating subprocesses...");
    expect(lines[2]).toContain("All subprocesses terminated.");
  });

  test("install and uninstall manage the signal listeners", () => {
    const { coordinator } = setup();
    const before = process.listenerCount("SIGINT");

    coordinator.install();
    coordinator.install();
    expect(process.listenerCount("SIGINT")).toBe(before + 1);
    expect(process.listenerCount("SIGTERM")).toBeGreaterThanOrEqual(1);

    coordinator.uninstall();
    expect(process.listenerCount("SIGINT")).toBe(before);
  });
});
