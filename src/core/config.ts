/**
 * Configuration loading and management
 *
 * Loads config from ~/.opusify/config.toml with fallback to defaults.
 * Environment variables override config file values.
 */

import { existsSync, readFileSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import TOML from "@iarna/toml";
import { ConfigSchema, DEFAULT_CONFIG, LogLevel, type Config } from "./types.ts";

/**
 * Base directory for opusify configuration
 */
export const OPUSIFY_DIR = process.env.OPUSIFY_HOME ?? join(homedir(), ".opusify");

/**
 * Path to configuration file
 */
export const CONFIG_PATH = join(OPUSIFY_DIR, "config.toml");

/**
 * Expand ~ to home directory in paths
 */
export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Ensure the .opusify directory exists
 */
export function ensureOpusifyDir(): void {
  if (!existsSync(OPUSIFY_DIR)) {
    mkdirSync(OPUSIFY_DIR, { recursive: true });
  }
}

/**
 * Load configuration from TOML file
 * Returns null if file doesn't exist
 */
function loadConfigFile(configPath: string): Record<string, unknown> | null {
  if (!existsSync(configPath)) {
    return null;
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return TOML.parse(content);
  } catch (error) {
    console.error(`Warning: Failed to parse config file: ${error}`);
    return null;
  }
}

function parseInteger(value: string): number | undefined {
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Load configuration from environment variables
 * Uses OPUSIFY_ prefix (e.g., OPUSIFY_BITRATE, OPUSIFY_JOBS)
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.OPUSIFY_BITRATE) {
    config.bitrate = env.OPUSIFY_BITRATE;
  }
  if (env.OPUSIFY_ENCODER) {
    config.encoder = env.OPUSIFY_ENCODER;
  }
  if (env.OPUSIFY_SOURCE_EXTENSION) {
    config.source_extension = env.OPUSIFY_SOURCE_EXTENSION;
  }
  if (env.OPUSIFY_TARGET_EXTENSION) {
    config.target_extension = env.OPUSIFY_TARGET_EXTENSION;
  }
  if (env.OPUSIFY_JOBS) {
    const jobs = parseInteger(env.OPUSIFY_JOBS);
    if (jobs !== undefined) config.jobs = jobs;
  }
  if (env.OPUSIFY_KILL_TIMEOUT_MS) {
    const timeout = parseInteger(env.OPUSIFY_KILL_TIMEOUT_MS);
    if (timeout !== undefined) config.kill_timeout_ms = timeout;
  }
  if (env.OPUSIFY_LOG_LEVEL) {
    const level = LogLevel.safeParse(env.OPUSIFY_LOG_LEVEL);
    if (level.success) config.log_level = level.data;
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 * Priority: CLI options > Environment > Config file > Defaults
 */
export function loadConfig(
  configPath: string = CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Config {
  // Start with defaults
  let config: Record<string, unknown> = { ...DEFAULT_CONFIG };

  // Layer 1: Config file (if exists)
  const fileConfig = loadConfigFile(configPath);
  if (fileConfig) {
    config = { ...config, ...fileConfig };
  }

  // Layer 2: Environment variables
  config = { ...config, ...loadEnvConfig(env) };

  // Validate and return
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    console.error("Warning: Invalid configuration values, using defaults");
    console.error(result.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n"));
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Generate default config file content
 */
export function generateDefaultConfig(): string {
  return `# opusify configuration
# Location: ~/.opusify/config.toml

# Encoder bitrate, digits followed by "k"
bitrate = "192k"

# Encoder executable (name on PATH or absolute path)
encoder = "opusenc"

# Files with this extension are transcoded, everything else is copied
source_extension = ".flac"
target_extension = ".opus"

# Parallel encoder processes (omit to use every available core)
# jobs = 4

# How long an interrupted encoder gets to exit before it is killed
kill_timeout_ms = 5000

# Console log level: "debug", "info", "warn", "error"
log_level = "warn"
`;
}
