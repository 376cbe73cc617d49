/**
 * Error taxonomy for opusify.
 *
 * Only ConfigError escapes to the CLI. Everything else is raised inside a
 * job and turned into an Outcome by the worker that ran it.
 */

export type ErrorCode =
  | "CONFIG"
  | "PATH"
  | "PROCESS_START"
  | "PROCESS_EXIT"
  | "INTERRUPTED";

export abstract class OpusifyError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad bitrate, bad job count, missing encoder or source directory.
 * Fatal before any job runs.
 */
export class ConfigError extends OpusifyError {
  readonly code = "CONFIG";
}

/**
 * Source path is not contained under the source root
 */
export class PathError extends OpusifyError {
  readonly code = "PATH";

  constructor(
    readonly sourcePath: string,
    readonly sourceRoot: string
  ) {
    super(`'${sourcePath}' is not inside '${sourceRoot}'`);
  }
}

/**
 * Encoder could not be spawned (missing binary, permission denied)
 */
export class ProcessStartError extends OpusifyError {
  readonly code = "PROCESS_START";

  constructor(
    readonly executable: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to start '${executable}': ${reason}`, { cause });
  }
}

/**
 * Encoder ran but did not finish cleanly: a non-zero exit code, or a
 * signal that did not come from our own cancellation.
 */
export class ProcessExitError extends OpusifyError {
  readonly code = "PROCESS_EXIT";

  constructor(
    readonly executable: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly signal: NodeJS.Signals | null = null
  ) {
    super(signal ? `'${executable}' was killed by ${signal}` : `'${executable}' exited with code ${exitCode}`);
  }
}

/**
 * The job was in flight when the run was cancelled
 */
export class InterruptedError extends OpusifyError {
  readonly code = "INTERRUPTED";

  constructor(readonly signal: NodeJS.Signals | null) {
    super(signal ? `Interrupted (${signal})` : "Interrupted");
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
