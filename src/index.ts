#!/usr/bin/env tsx
/**
 * opusify - Mirror a lossless music library into Opus
 *
 * Entry point for the opusify CLI tool.
 */

import { Command } from "commander";
import pc from "picocolors";
import { existsSync, writeFileSync } from "fs";
import {
  loadConfig,
  CONFIG_PATH,
  ensureOpusifyDir,
  expandPath,
  generateDefaultConfig,
} from "./core/config.ts";
import { isConfigError } from "./core/errors.ts";
import type { CliOptions, Config } from "./core/types.ts";

const VERSION = "1.0.0";

/**
 * Exit status of a run cancelled by the user (128 + SIGINT)
 */
const EXIT_INTERRUPTED = 130;

// Load configuration at startup
const config: Config = loadConfig();

const program = new Command();

program
  .name("opusify")
  .description("Transcode every FLAC file under <source> to Opus under <destination>, copying everything else")
  .version(VERSION)
  .argument("<source>", "Source directory containing FLAC files")
  .argument("<destination>", "Destination directory for Opus files")
  .option("-b, --bitrate <rate>", "Opus bitrate, e.g. 192k", config.bitrate)
  .option("-j, --jobs <n>", "Number of parallel jobs (default: one per CPU core)", config.jobs?.toString())
  .option("-d, --dry-run", "Show what would be done without touching the destination")
  .option("-e, --encoder <path>", "Encoder executable", config.encoder)
  .option("--log-dir <dir>", "Directory for the run logs (default: destination)")
  .option("--verbose", "Show detailed progress")
  .option("--quiet", "Suppress all output except errors and the summary")
  .action(async (source: string, destination: string, options: CliOptions) => {
    const { runTranscode, parseJobs } = await import("./core/transcode.ts");
    const { renderSummary } = await import("./ui/summary.ts");

    try {
      const result = await runTranscode({
        sourceDir: expandPath(source),
        destinationDir: expandPath(destination),
        bitrate: options.bitrate ?? config.bitrate,
        encoder: expandPath(options.encoder ?? config.encoder),
        jobs: parseJobs(options.jobs),
        dryRun: options.dryRun ?? false,
        sourceExtension: config.source_extension,
        targetExtension: config.target_extension,
        killTimeoutMs: config.kill_timeout_ms,
        logDir: options.logDir ? expandPath(options.logDir) : undefined,
        consoleLevel: config.log_level,
        verbose: options.verbose,
        quiet: options.quiet,
      });

      console.log(
        renderSummary({
          transcode: result.tally.transcode,
          copy: result.tally.copy,
          logFile: result.logFile,
          errorLogFile: result.errorLogFile,
          cancelled: result.cancelled,
        })
      );

      process.exit(result.cancelled ? EXIT_INTERRUPTED : 0);
    } catch (error) {
      if (isConfigError(error)) {
        console.error(pc.red(`Error: ${error.message}`));
        process.exit(1);
      }
      throw error;
    }
  });

// Subcommand: config
program
  .command("config")
  .description("Show current configuration")
  .option("--init", "Create default config file")
  .action((options: { init?: boolean }) => {
    if (options.init) {
      ensureOpusifyDir();
      if (existsSync(CONFIG_PATH)) {
        console.log(pc.yellow(`Config file already exists: ${CONFIG_PATH}`));
        return;
      }
      writeFileSync(CONFIG_PATH, generateDefaultConfig());
      console.log(pc.green(`Created config file: ${CONFIG_PATH}`));
      return;
    }

    console.log(pc.cyan("Current Configuration:\n"));
    console.log(pc.dim(`  Config file: ${CONFIG_PATH}`));
    console.log(pc.dim(`  File exists: ${existsSync(CONFIG_PATH) ? "yes" : "no (using defaults)"}\n`));

    console.log("  " + pc.bold("bitrate") + ": " + config.bitrate);
    console.log("  " + pc.bold("encoder") + ": " + config.encoder);
    console.log("  " + pc.bold("source_extension") + ": " + config.source_extension);
    console.log("  " + pc.bold("target_extension") + ": " + config.target_extension);
    console.log("  " + pc.bold("jobs") + ": " + (config.jobs ?? "(auto)"));
    console.log("  " + pc.bold("kill_timeout_ms") + ": " + config.kill_timeout_ms);
    console.log("  " + pc.bold("log_level") + ": " + config.log_level);
  });

// Subcommand: health
program
  .command("health")
  .description("Check that a run can start")
  .option("--json", "Output as JSON")
  .action(async (options: { json?: boolean }) => {
    const { runHealthChecks } = await import("./core/health.ts");

    const report = runHealthChecks({ config });

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      const statusIcon = {
        healthy: pc.green("✓"),
        degraded: pc.yellow("⚠"),
        unhealthy: pc.red("✗"),
      };

      console.log(`\n${statusIcon[report.overall]} System: ${report.overall.toUpperCase()}\n`);

      for (const check of report.checks) {
        const icon =
          check.status === "pass"
            ? pc.green("✓")
            : check.status === "warn"
              ? pc.yellow("⚠")
              : pc.red("✗");
        console.log(`  ${icon} ${check.name}: ${check.message}`);
      }

      console.log();
    }

    process.exit(report.overall === "unhealthy" ? 1 : 0);
  });

// Parse arguments
await program.parseAsync();
