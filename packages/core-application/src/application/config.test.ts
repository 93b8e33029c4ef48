import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { describe, it, expect } from "vitest";

import { loadConfig, storeExists } from "./config";
import { ConfigError } from "./errors";

describe("config", () => {
  it("falls back to defaults under the home directory", () => {
    const config = loadConfig({ env: {}, homeDir: "/home/tester" });

    expect(config).toEqual({
      storeDir: path.resolve("/home/tester/.password-store"),
      clipTimeSeconds: 45,
      resyncIntervalMs: 5000,
      watch: true,
      passBin: "pass",
      logLevel: "info",
    });
  });

  it("reads overrides and expands ~", () => {
    const config = loadConfig({
      homeDir: "/home/tester",
      env: {
        PASSWORD_STORE_DIR: "~/secrets/main",
        PASSWORD_STORE_CLIP_TIME: "10",
        PASSDECK_RESYNC_INTERVAL_MS: "250",
        PASSDECK_WATCH: "off",
        PASSDECK_PASS_BIN: "/usr/local/bin/pass",
        PASSDECK_LOG_LEVEL: "DEBUG",
      },
    });

    expect(config.storeDir).toBe(path.resolve("/home/tester/secrets/main"));
    expect(config.clipTimeSeconds).toBe(10);
    expect(config.resyncIntervalMs).toBe(250);
    expect(config.watch).toBe(false);
    expect(config.passBin).toBe("/usr/local/bin/pass");
    expect(config.logLevel).toBe("debug");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ env: { PASSWORD_STORE_CLIP_TIME: "  ", PASSDECK_WATCH: "" }, homeDir: "/h" });
    expect(config.clipTimeSeconds).toBe(45);
    expect(config.watch).toBe(true);
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({
        env: { PASSDECK_RESYNC_INTERVAL_MS: "fast", PASSDECK_WATCH: "maybe", PASSWORD_STORE_CLIP_TIME: "0" },
        homeDir: "/h",
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toContain("PASSDECK_RESYNC_INTERVAL_MS: Expected an integer");
    expect(issues).toContain("PASSWORD_STORE_CLIP_TIME: Must be >= 1");
    expect(issues).toContain(
      "PASSDECK_WATCH: Accepted boolean values: '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'"
    );
  });

  it("checks that the store directory exists", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "passdeck-config-"));
    try {
      expect(await storeExists({ storeDir: dir })).toBe(true);
      expect(await storeExists({ storeDir: path.join(dir, "missing") })).toBe(false);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
