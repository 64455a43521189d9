/**
 * Pull request comment wrapper around the model's explanation
 * @module src/lint/comment
 */

export const LINT_COMMENT_HEADING = "### 🔍 Lint issues found by CI";

export const LINT_COMMENT_SUGGESTIONS = [
  "Fix the reported issues to keep the code quality and conventions consistent.",
  "Run `make lint` locally to validate before pushing new changes.",
  "Use `make lint-fix` to automatically fix some formatting issues.",
] as const;

export function formatLintComment(summary: string): string {
  const suggestions = LINT_COMMENT_SUGGESTIONS.map((s) => `- ${s}`).join("\n");
  return `${LINT_COMMENT_HEADING}\n\n${summary}\n\n**💡 Suggestions:**\n\n${suggestions}`;
}
