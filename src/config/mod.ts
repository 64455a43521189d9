/**
 * Config Module
 *
 * Environment-sourced configuration for repo-automation.
 */

export type {
  Environment,
  LintReportConfig,
  LintReportConfigOptions,
} from "./env.ts";

export {
  ENV_FILES,
  loadLintReportConfig,
  parsePullNumber,
  readEnvironment,
} from "./env.ts";
