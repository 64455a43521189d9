/**
 * Sample docs.yaml command
 * @module cli/commands/docs-init
 */

import type { Command } from "commander";
import { log, reportError } from "../helpers/logging.ts";
import {
  DEFAULT_DOCS_CONFIG_PATH,
  initializeDocsConfig,
} from "../services/docs-actions.ts";

export interface DocsInitOptions {
  output: string;
  force?: boolean;
}

export async function handleDocsInit(options: DocsInitOptions): Promise<number> {
  try {
    const result = await initializeDocsConfig({
      targetPath: options.output,
      force: options.force ?? false,
    });
    if (!result.success) {
      log.warn(result.message);
      return 1;
    }
    log.success(result.message);
    return 0;
  } catch (error) {
    reportError(error);
    return 1;
  }
}

export function registerDocsInitCommand(cli: Command): void {
  cli
    .command("docs-init")
    .description("Write a sample documentation configuration")
    .option("-o, --output <path>", "File to create", DEFAULT_DOCS_CONFIG_PATH)
    .option("--force", "Replace an existing file")
    .action(async (options: DocsInitOptions) => {
      process.exitCode = await handleDocsInit(options);
    });
}
