import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";

import { ConfigError } from "./errors";
import type { LogLevel } from "../ports/logger";

export type EnvSource = Record<string, string | undefined>;

export type PassdeckConfig = {
  storeDir: string;
  clipTimeSeconds: number;
  resyncIntervalMs: number;
  watch: boolean;
  passBin: string;
  logLevel: LogLevel;
};

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function integerVar(defaultValue: number, min: number) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const value = nonBlank(raw);
      if (value === undefined) return defaultValue;

      const parsed = Number(value);
      if (!Number.isInteger(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected an integer" });
        return z.NEVER;
      }
      if (parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Must be >= ${min}` });
        return z.NEVER;
      }
      return parsed;
    });
}

function booleanVar(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const value = nonBlank(raw);
      if (value === undefined) return defaultValue;

      const normalized = value.toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;

      const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((v) => `'${v}'`).join(", ");
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Accepted boolean values: ${accepted}`,
      });
      return z.NEVER;
    });
}

function expandHome(dir: string, home: string): string {
  if (dir === "~") return home;
  if (dir.startsWith("~/")) return path.join(home, dir.slice(2));
  return dir;
}

function envSchema(home: string) {
  return z.object({
    PASSWORD_STORE_DIR: z
      .string()
      .optional()
      .transform((raw) => {
        const value = nonBlank(raw);
        return path.resolve(value === undefined ? path.join(home, ".password-store") : expandHome(value, home));
      }),
    PASSWORD_STORE_CLIP_TIME: integerVar(45, 1),
    PASSDECK_RESYNC_INTERVAL_MS: integerVar(5000, 100),
    PASSDECK_WATCH: booleanVar(true),
    PASSDECK_PASS_BIN: z
      .string()
      .optional()
      .transform((raw) => nonBlank(raw) ?? "pass"),
    PASSDECK_LOG_LEVEL: z
      .string()
      .optional()
      .transform((raw) => (nonBlank(raw) ?? "info").toLowerCase())
      .pipe(z.enum(["debug", "info", "warn", "error"])),
  });
}

export type LoadConfigOptions = {
  env?: EnvSource;
  homeDir?: string;
};

export function loadConfig(options: LoadConfigOptions = {}): PassdeckConfig {
  const env = options.env ?? process.env;
  const result = envSchema(options.homeDir ?? os.homedir()).safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${location}: ${issue.message}`;
    });
    throw new ConfigError(
      `Invalid environment configuration\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      issues
    );
  }

  const data = result.data;
  return {
    storeDir: data.PASSWORD_STORE_DIR,
    clipTimeSeconds: data.PASSWORD_STORE_CLIP_TIME,
    resyncIntervalMs: data.PASSDECK_RESYNC_INTERVAL_MS,
    watch: data.PASSDECK_WATCH,
    passBin: data.PASSDECK_PASS_BIN,
    logLevel: data.PASSDECK_LOG_LEVEL,
  };
}

export async function storeExists(config: Pick<PassdeckConfig, "storeDir">): Promise<boolean> {
  try {
    const stat = await fs.stat(config.storeDir);
    return stat.isDirectory();
  } catch {
    return false;
  }
}
