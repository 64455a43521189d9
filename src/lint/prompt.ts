/**
 * Prompt template for explaining lint findings
 * @module src/lint/prompt
 */

export interface LintPromptOptions {
  /** Name of the tool that produced the findings */
  tool?: string;
  /** Language of the reviewed code */
  language?: string;
}

export const DEFAULT_LINT_TOOL = "golangci-lint";
export const DEFAULT_LINT_LANGUAGE = "Go";

/**
 * Build the completion prompt. The findings are embedded verbatim.
 */
export function buildLintPrompt(
  findings: string,
  options: LintPromptOptions = {},
): string {
  const tool = options.tool ?? DEFAULT_LINT_TOOL;
  const language = options.language ?? DEFAULT_LINT_LANGUAGE;

  return `
You are a senior software engineer reviewing a pull request. CI ran ${tool} and found the following ${language} code quality issues.

For each issue, write a clear and objective technical comment explaining:

* **🔍 Description:** What is wrong and why it matters to fix it
* **📍 Location:** File and line where the issue occurs
* **🛠️ Solution:** How to fix it, including code examples when relevant
* **⚡ Priority:** High/Medium/Low based on impact

**Issues found by ${tool}:**
\`\`\`
${findings}
\`\`\`

Format your answer as a numbered markdown list, grouping similar issues when possible. Be concise but informative.
`;
}
