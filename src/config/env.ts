/**
 * Environment-sourced settings for the lint report bot
 * Reads .env files and the process environment once, at startup
 */

import dotenv from "dotenv";
import fs from "fs-extra";
import { join } from "node:path";
import { ConfigurationError, MissingConfigurationError } from "../errors.ts";
import { DEFAULT_COMPLETION_MODEL } from "../llm/openai-completion.ts";
import { Logger } from "../logger/mod.ts";

export type Environment = Record<string, string | undefined>;

/** Later files override earlier ones */
export const ENV_FILES = [".env", ".env.local"] as const;

export interface LintReportConfig {
  openai: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };
  /** Absent in dry-run mode */
  github?: {
    token: string;
    repository: string;
    pullNumber: number;
  };
}

export interface LintReportConfigOptions {
  dryRun?: boolean;
  /** Overrides LINT_REPORT_MODEL */
  model?: string;
}

const log = Logger.create("config");

/**
 * Merge .env files from cwd with process.env.
 * process.env wins; the files fill in what it lacks.
 */
export async function readEnvironment(
  cwd: string = process.cwd(),
  processEnv: Environment = process.env,
): Promise<Environment> {
  let fromFiles: Environment = {};

  for (const file of ENV_FILES) {
    const path = join(cwd, file);
    if (await fs.pathExists(path)) {
      const parsed = dotenv.parse(await fs.readFile(path, "utf-8"));
      fromFiles = { ...fromFiles, ...parsed };
      log.debug("Loaded environment file", { path });
    }
  }

  const merged: Environment = { ...fromFiles };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

/**
 * Build the bot's configuration, failing on the first missing setting.
 */
export function loadLintReportConfig(
  env: Environment,
  options: LintReportConfigOptions = {},
): LintReportConfig {
  const config: LintReportConfig = {
    openai: {
      apiKey: requireEnv(env, "OPENAI_API_KEY"),
      model: options.model || env.LINT_REPORT_MODEL || DEFAULT_COMPLETION_MODEL,
    },
  };

  const baseUrl = env.OPENAI_BASE_URL?.trim();
  if (baseUrl) config.openai.baseUrl = baseUrl;

  if (!options.dryRun) {
    config.github = {
      token: requireEnv(env, "GITHUB_TOKEN"),
      repository: requireEnv(env, "REPO_NAME"),
      pullNumber: parsePullNumber(requireEnv(env, "PR_NUMBER")),
    };
  }

  return config;
}

function requireEnv(env: Environment, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new MissingConfigurationError(key);
  }
  return value;
}

export function parsePullNumber(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(
      `PR_NUMBER must be a positive integer, got: ${value}`,
      "PR_NUMBER",
    );
  }
  const pullNumber = Number.parseInt(value, 10);
  if (pullNumber < 1 || !Number.isSafeInteger(pullNumber)) {
    throw new ConfigurationError(
      `PR_NUMBER must be a positive integer, got: ${value}`,
      "PR_NUMBER",
    );
  }
  return pullNumber;
}
