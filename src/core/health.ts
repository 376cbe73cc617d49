/**
 * Health checks for opusify
 *
 * Answers "will a run start?" before pointing it at a library.
 */

import { accessSync, constants, existsSync, readFileSync } from "fs";
import TOML from "@iarna/toml";
import { CONFIG_PATH, OPUSIFY_DIR } from "./config.ts";
import { findExecutable } from "./runner.ts";
import { ConfigSchema, type Config } from "./types.ts";

/**
 * Individual health check result
 */
export interface HealthCheck {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Overall health report
 */
export interface HealthReport {
  overall: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  checks: HealthCheck[];
  summary: string;
}

export interface HealthOptions {
  config: Config;
  configPath?: string;
  configDir?: string;
  pathEnv?: string;
}

/**
 * Run all health checks and return aggregated report
 */
export function runHealthChecks(options: HealthOptions): HealthReport {
  const checks: HealthCheck[] = [
    checkEncoder(options.config.encoder, options.pathEnv),
    checkConfigFile(options.configPath ?? CONFIG_PATH),
    checkConfigDir(options.configDir ?? OPUSIFY_DIR),
  ];

  const failCount = checks.filter((c) => c.status === "fail").length;
  const warnCount = checks.filter((c) => c.status === "warn").length;

  let overall: HealthReport["overall"];
  if (failCount > 0) {
    overall = "unhealthy";
  } else if (warnCount > 0) {
    overall = "degraded";
  } else {
    overall = "healthy";
  }

  const summary =
    checks
      .filter((c) => c.status !== "pass")
      .map((c) => c.message)
      .join("; ") || "All systems operational";

  return {
    overall,
    timestamp: new Date().toISOString(),
    checks,
    summary,
  };
}

export function checkEncoder(encoder: string, pathEnv?: string): HealthCheck {
  const resolved = findExecutable(encoder, pathEnv);
  if (!resolved) {
    return {
      name: "Encoder",
      status: "fail",
      message: `'${encoder}' not found on PATH (install opus-tools)`,
    };
  }
  return {
    name: "Encoder",
    status: "pass",
    message: resolved,
    details: { encoder: resolved },
  };
}

export function checkConfigFile(configPath: string): HealthCheck {
  if (!existsSync(configPath)) {
    return { name: "Config", status: "pass", message: "No config file, using defaults" };
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = TOML.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      name: "Config",
      status: "fail",
      message: `${configPath} is not valid TOML`,
      details: { error: error instanceof Error ? error.message : String(error) },
    };
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    return {
      name: "Config",
      status: "warn",
      message: `${configPath} has invalid values, defaults will be used`,
      details: { issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
    };
  }
  return { name: "Config", status: "pass", message: configPath };
}

export function checkConfigDir(dir: string): HealthCheck {
  if (!existsSync(dir)) {
    return { name: "Config directory", status: "pass", message: `${dir} (not created yet)` };
  }
  try {
    accessSync(dir, constants.W_OK);
    return { name: "Config directory", status: "pass", message: dir };
  } catch {
    return { name: "Config directory", status: "warn", message: `${dir} is not writable` };
  }
}
