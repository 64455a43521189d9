/**
 * Lint report pipeline: findings -> explanation -> pull request comment
 * @module src/lint/report
 */

import { Logger } from "../logger/mod.ts";
import type { CompletionService } from "../llm/types.ts";
import type {
  CommentService,
  PostedComment,
  PullRequestTarget,
} from "../github/types.ts";
import { formatLintComment } from "./comment.ts";
import { readLintOutput } from "./reader.ts";

export interface LintReportServices {
  completion: CompletionService;
  comments: CommentService;
  target: PullRequestTarget;
}

export type LintReportOutcome =
  | { status: "skipped" }
  | {
    status: "posted";
    summary: string;
    body: string;
    comment: PostedComment;
  };

const log = Logger.create("lint:report");

/**
 * Run the lint report once.
 *
 * `connect` is only invoked when there are findings, so an empty findings
 * file needs no credentials and makes no network calls.
 */
export async function runLintReport(
  findingsPath: string,
  connect: () => LintReportServices,
): Promise<LintReportOutcome> {
  const findings = await readLintOutput(findingsPath);
  if (findings === null) {
    log.debug("No lint issues found, no comment will be created");
    return { status: "skipped" };
  }

  log.info("Lint findings loaded", {
    path: findingsPath,
    lines: findings.split("\n").length,
  });

  const { completion, comments, target } = connect();

  log.info("Requesting explanation", { service: completion.name });
  const summary = await completion.summarize(findings);

  const body = formatLintComment(summary);
  const comment = await comments.post(
    target.repository,
    target.pullNumber,
    body,
  );

  return { status: "posted", summary, body, comment };
}
