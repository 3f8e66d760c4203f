/**
 * Unit tests for configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { expandEnvVars, loadConfig, parseConfig } from "../../src/config/loader.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), "reqlog-test-" + Date.now() + "-" + Math.random().toString(36).slice(2));
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env.REQLOG_TEST_LEVEL;
  });

  it("uses defaults and warns when no config file exists", async () => {
    const path = join(dir, "missing.yml");
    const { config, warnings } = await loadConfig(path);

    expect(config).toEqual({
      logging: { enable: true, level: "info", backtraces: true, color: "auto", maxPendingWrites: 0 },
      server: { host: "127.0.0.1", port: 8080 },
    });
    expect(warnings).toEqual([`Config file not found at ${path}; using defaults.`]);
  });

  it("reads logging and server settings", async () => {
    const path = join(dir, "reqlog.yml");
    writeFileSync(
      path,
      [
        "logging:",
        "  enable: false",
        "  level: warning",
        "  backtraces: false",
        "  color: never",
        "  max_pending_writes: 100",
        "server:",
        "  host: 0.0.0.0",
        "  port: 9000",
      ].join("\n"),
    );

    const { config, warnings } = await loadConfig(path);

    expect(warnings).toEqual([]);
    expect(config.logging).toEqual({ enable: false, level: "warning", backtraces: false, color: "never", maxPendingWrites: 100 });
    expect(config.server).toEqual({ host: "0.0.0.0", port: 9000 });
  });

  it("expands environment variables", async () => {
    process.env.REQLOG_TEST_LEVEL = "debug";
    const path = join(dir, "reqlog.yml");
    writeFileSync(path, 'logging:\n  level: "${REQLOG_TEST_LEVEL}"\n  color: "${REQLOG_UNSET_COLOR:-always}"\n');

    const { config } = await loadConfig(path);

    expect(config.logging.level).toBe("debug");
    expect(config.logging.color).toBe("always");
  });

  it("rejects malformed YAML", async () => {
    const path = join(dir, "reqlog.yml");
    writeFileSync(path, "logging: [unclosed\n");

    await expect(loadConfig(path)).rejects.toThrow(`Failed to parse config file at ${path}`);
  });
});

describe("parseConfig", () => {
  it("returns defaults for an empty document", () => {
    expect(parseConfig("").logging.level).toBe("info");
  });

  it("rejects an unknown level", () => {
    expect(() => parseConfig("logging:\n  level: verbose\n")).toThrow(
      "Invalid logging.level: verbose. Must be one of: error, warning, info, debug",
    );
  });

  it("rejects a port out of range", () => {
    expect(() => parseConfig("server:\n  port: 70000\n")).toThrow("Invalid server.port: 70000. Must be between 0 and 65535.");
  });

  it("rejects a non-boolean flag", () => {
    expect(() => parseConfig("logging:\n  enable: sometimes\n")).toThrow("Invalid logging.enable: sometimes. Must be true or false.");
  });

  it("rejects a negative pending write limit", () => {
    expect(() => parseConfig("logging:\n  max_pending_writes: -1\n")).toThrow(
      "Invalid logging.max_pending_writes: -1. Must be between 0 and 1000000.",
    );
  });
});

describe("expandEnvVars", () => {
  it("substitutes empty text for unset variables without a default", () => {
    expect(expandEnvVars("a${REQLOG_SURELY_UNSET}b")).toBe("ab");
  });
});
