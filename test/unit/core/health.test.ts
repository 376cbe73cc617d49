import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { join } from "path";
import { checkConfigDir, checkConfigFile, checkEncoder, runHealthChecks } from "../../../src/core/health.ts";
import { DEFAULT_CONFIG } from "../../../src/core/types.ts";
import { createTempDir, cleanupTempDir, createTempFile, writeFakeEncoder } from "../../helpers/test-utils.ts";

describe("core/health.ts", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  describe("checkEncoder", () => {
    test("passes when the encoder is on PATH", () => {
      const encoder = writeFakeEncoder(dir, "ok", "opusenc");

      const check = checkEncoder("opusenc", dir);

      expect(check.status).toBe("pass");
      expect(check.message).toBe(encoder.path);
    });

    test("fails when it is not", () => {
      const check = checkEncoder("opusenc", dir);

      expect(check).toEqual({
        name: "Encoder",
        status: "fail",
        message: "'opusenc' not found on PATH (install opus-tools)",
      });
    });
  });

  describe("checkConfigFile", () => {
    test("a missing file means defaults", () => {
      expect(checkConfigFile(join(dir, "config.toml")).message).toBe("No config file, using defaults");
    });

    test("valid file passes", () => {
      const path = createTempFile(dir, "config.toml", 'bitrate = "128k"\n');
      expect(checkConfigFile(path)).toEqual({ name: "Config", status: "pass", message: path });
    });

    test("invalid values warn", () => {
      const path = createTempFile(dir, "config.toml", 'bitrate = "fast"\n');
      const check = checkConfigFile(path);

      expect(check.status).toBe("warn");
      expect(check.details?.issues).toHaveLength(1);
    });

    test("broken TOML fails", () => {
      const path = createTempFile(dir, "config.toml", "bitrate = \n");
      expect(checkConfigFile(path).status).toBe("fail");
    });
  });

  describe("checkConfigDir", () => {
    test("a directory that does not exist yet is fine", () => {
      const missing = join(dir, "nope");
      expect(checkConfigDir(missing).message).toBe(`${missing} (not created yet)`);
    });

    test("writable directory passes", () => {
      expect(checkConfigDir(dir)).toEqual({ name: "Config directory", status: "pass", message: dir });
    });
  });

  describe("runHealthChecks", () => {
    test("healthy when everything passes", () => {
      writeFakeEncoder(dir, "ok", "opusenc");

      const report = runHealthChecks({
        config: DEFAULT_CONFIG,
        configPath: join(dir, "config.toml"),
        configDir: dir,
        pathEnv: dir,
      });

      expect(report.overall).toBe("healthy");
      expect(report.summary).toBe("All systems operational");
      expect(report.checks.map((c) => c.name)).toEqual(["Encoder", "Config", "Config directory"]);
    });

    test("unhealthy without an encoder", () => {
      const report = runHealthChecks({
        config: DEFAULT_CONFIG,
        configPath: join(dir, "config.toml"),
        configDir: dir,
        pathEnv: dir,
      });

      expect(report.overall).toBe("unhealthy");
      expect(report.summary).toBe("'opusenc' not found on PATH (install opus-tools)");
    });

    test("degraded with invalid config values", () => {
      writeFakeEncoder(dir, "ok", "opusenc");
      const configPath = createTempFile(dir, "config.toml", "jobs = 0\n");

      const report = runHealthChecks({ config: DEFAULT_CONFIG, configPath, configDir: dir, pathEnv: dir });

      expect(report.overall).toBe("degraded");
    });
  });
});
