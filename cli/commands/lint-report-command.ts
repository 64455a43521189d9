/**
 * Lint report command - explains lint findings on a pull request
 * @module cli/commands/lint-report
 */

import type { Command } from "commander";
import {
  type Environment,
  loadLintReportConfig,
  readEnvironment,
} from "../../src/config/mod.ts";
import {
  DryRunCommentService,
  GitHubCommentService,
} from "../../src/github/mod.ts";
import {
  type LintPromptOptions,
  type LintReportServices,
  runLintReport,
} from "../../src/lint/mod.ts";
import { OpenAICompletionService } from "../../src/llm/mod.ts";
import { log, reportError } from "../helpers/logging.ts";

export interface LintReportOptions {
  input: string;
  model?: string;
  tool?: string;
  language?: string;
  dryRun?: boolean;
}

export const DEFAULT_LINT_OUTPUT_PATH = "lint_output.txt";

/**
 * Build the real services from the environment. Fails on the first missing
 * setting.
 */
export function connectServices(
  env: Environment,
  options: LintReportOptions,
): LintReportServices {
  const dryRun = options.dryRun ?? false;
  const config = loadLintReportConfig(env, {
    dryRun,
    ...(options.model !== undefined && { model: options.model }),
  });

  const prompt: LintPromptOptions = {};
  if (options.tool) prompt.tool = options.tool;
  if (options.language) prompt.language = options.language;

  const completion = new OpenAICompletionService({ ...config.openai, prompt });

  if (dryRun || !config.github) {
    return {
      completion,
      comments: new DryRunCommentService(),
      target: {
        repository: env.REPO_NAME?.trim() || "local/preview",
        pullNumber: Number.parseInt(env.PR_NUMBER ?? "", 10) || 0,
      },
    };
  }

  return {
    completion,
    comments: new GitHubCommentService({ token: config.github.token }),
    target: {
      repository: config.github.repository,
      pullNumber: config.github.pullNumber,
    },
  };
}

/**
 * Run the lint report; returns the process exit code
 */
export async function handleLintReport(
  options: LintReportOptions,
  connect?: () => LintReportServices,
): Promise<number> {
  try {
    const connectFn = connect ?? await defaultConnect(options);
    const outcome = await runLintReport(options.input, connectFn);

    if (outcome.status === "skipped") {
      log.success("No lint issues found. No comment will be created.");
    } else if (outcome.comment.url) {
      log.success(`Lint report posted: ${outcome.comment.url}`);
    } else {
      log.success("Lint report rendered (dry run)");
    }
    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}

async function defaultConnect(
  options: LintReportOptions,
): Promise<() => LintReportServices> {
  const env = await readEnvironment();
  return () => connectServices(env, options);
}

export function registerLintReportCommand(cli: Command): void {
  cli
    .command("lint-report")
    .description(
      "Explain lint findings with a language model and comment on the pull request",
    )
    .option("-i, --input <path>", "Lint output file", DEFAULT_LINT_OUTPUT_PATH)
    .option("--model <id>", "Completion model (default: LINT_REPORT_MODEL or gpt-4o-mini)")
    .option("--tool <name>", "Name of the linter that produced the findings")
    .option("--language <name>", "Language of the reviewed code")
    .option("--dry-run", "Print the comment instead of posting it")
    .addHelpText(
      "after",
      "\nEnvironment:\n  OPENAI_API_KEY, GITHUB_TOKEN, REPO_NAME (owner/name), PR_NUMBER",
    )
    .action(async (options: LintReportOptions) => {
      process.exitCode = await handleLintReport(options);
    });
}
