import "dotenv/config";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_ORG: z.string().optional(),
  GITHUB_REPO: z.string().optional(),
  GITHUB_PER_PAGE: z.coerce.number().int().positive().max(100).optional(),
  GITHUB_SSH_HOST: z.string().optional(),
  RATE_LIMIT_LOW_WATER_MARK: z.coerce.number().int().nonnegative().optional(),
  GPG_KEY_ID: z.string().optional(),
  DRY_RUN: z.string().optional(),
  TIMEZONE: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional(),
  LOG_DIR: z.string().optional()
});

export type CliOverrides = {
  org?: string;
  repo?: string;
  dryRun?: boolean;
  token?: string;
  gpgKey?: string;
  logDir?: string;
};

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(
  overrides: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env
) {
  const parsedEnv = envSchema.parse(env);
  const fileConfig = fileConfigSchema.parse(defaultConfig);

  const token = nonEmpty(overrides.token) ?? nonEmpty(parsedEnv.GITHUB_TOKEN) ?? fileConfig.github.token;
  if (!token) {
    throw new Error("Missing GITHUB_TOKEN (--token or env).");
  }

  return {
    github: {
      token,
      org: nonEmpty(overrides.org) ?? nonEmpty(parsedEnv.GITHUB_ORG) ?? fileConfig.github.org,
      repo: nonEmpty(overrides.repo) ?? nonEmpty(parsedEnv.GITHUB_REPO),
      perPage: parsedEnv.GITHUB_PER_PAGE ?? fileConfig.github.perPage,
      sshHost: parsedEnv.GITHUB_SSH_HOST ?? fileConfig.github.sshHost,
      lowWaterMark: parsedEnv.RATE_LIMIT_LOW_WATER_MARK ?? fileConfig.github.lowWaterMark
    },
    update: {
      dryRun: overrides.dryRun || resolveBool(parsedEnv.DRY_RUN, fileConfig.update.dryRun),
      signingKey: nonEmpty(overrides.gpgKey) ?? nonEmpty(parsedEnv.GPG_KEY_ID)
    },
    logging: {
      level: parsedEnv.LOG_LEVEL ?? fileConfig.logging.level,
      format: parsedEnv.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(parsedEnv.LOG_COLOR, fileConfig.logging.color),
      timeZone: parsedEnv.TIMEZONE ?? fileConfig.logging.timeZone,
      dir: nonEmpty(overrides.logDir) ?? nonEmpty(parsedEnv.LOG_DIR) ?? fileConfig.logging.dir
    }
  };
}

export const fileConfigSchema = z.object({
  github: z
    .object({
      token: z.string().optional(),
      org: z.string().default("MyOrg"),
      perPage: z.coerce.number().int().positive().max(100).default(100),
      sshHost: z.string().default("github.com"),
      lowWaterMark: z.coerce.number().int().nonnegative().default(100)
    })
    .default({}),
  update: z
    .object({
      dryRun: z.boolean().default(false)
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      format: z.enum(["json", "pretty"]).default("pretty"),
      color: z.boolean().default(false),
      timeZone: z.string().optional(),
      dir: z.string().default("logs")
    })
    .default({})
});

export type ConfigFile = z.input<typeof fileConfigSchema>;

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}

function nonEmpty(value: string | undefined) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
