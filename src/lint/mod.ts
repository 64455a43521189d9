/**
 * Lint report bot
 * @module src/lint
 */

export { readLintOutput } from "./reader.ts";
export {
  buildLintPrompt,
  DEFAULT_LINT_LANGUAGE,
  DEFAULT_LINT_TOOL,
} from "./prompt.ts";
export type { LintPromptOptions } from "./prompt.ts";
export {
  formatLintComment,
  LINT_COMMENT_HEADING,
  LINT_COMMENT_SUGGESTIONS,
} from "./comment.ts";
export { runLintReport } from "./report.ts";
export type { LintReportOutcome, LintReportServices } from "./report.ts";
