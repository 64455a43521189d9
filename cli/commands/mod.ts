/**
 * Command modules barrel export
 * @module cli/commands
 */

export { registerDocsInitCommand } from "./docs-init-command.ts";
export { registerDocsReadmeCommand } from "./docs-readme-command.ts";
export { registerLintReportCommand } from "./lint-report-command.ts";
