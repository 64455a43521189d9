/**
 * Documentation README generation command
 * @module cli/commands/docs-readme
 */

import type { Command } from "commander";
import { generateReadme } from "../../src/docs/mod.ts";
import { log, reportError } from "../helpers/logging.ts";

export interface DocsReadmeOptions {
  config: string;
  output: string;
}

export const DEFAULT_README_PATH = "docs/README.md";

/**
 * Generate the README; returns the process exit code
 */
export async function handleDocsReadme(
  options: DocsReadmeOptions,
): Promise<number> {
  try {
    const result = await generateReadme(options.config, options.output);
    log.success(`Generated ${result.outputPath}`);
    log.summary("Documentation README generated successfully!");
    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}

export function registerDocsReadmeCommand(cli: Command): void {
  cli
    .command("docs-readme")
    .description("Render the documentation README from a YAML configuration")
    .option("-c, --config <path>", "Documentation configuration", "docs.yaml")
    .option("-o, --output <path>", "README to write", DEFAULT_README_PATH)
    .addHelpText(
      "after",
      "\nExample:\n  repo-automation docs-readme --config docs.yaml --output docs/README.md",
    )
    .action(async (options: DocsReadmeOptions) => {
      process.exitCode = await handleDocsReadme(options);
    });
}
