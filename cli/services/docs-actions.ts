/**
 * Docs action functions - return results instead of printing
 */

import fs from "fs-extra";
import {
  generateSampleDocsConfig,
  writeOutputFile,
} from "../../src/docs/mod.ts";

/**
 * Result of an action operation
 */
export interface ActionResult {
  success: boolean;
  message: string;
  path: string;
}

export interface InitDocsConfigOptions {
  targetPath?: string;
  /** Replace an existing file */
  force?: boolean;
}

export const DEFAULT_DOCS_CONFIG_PATH = "docs.yaml";

/**
 * Write the sample docs.yaml
 */
export async function initializeDocsConfig(
  options: InitDocsConfigOptions = {},
): Promise<ActionResult> {
  const path = options.targetPath ?? DEFAULT_DOCS_CONFIG_PATH;

  if (await fs.pathExists(path) && !options.force) {
    return {
      success: false,
      message: `Configuration file already exists: ${path} (use --force to replace it)`,
      path,
    };
  }

  await writeOutputFile(path, generateSampleDocsConfig());
  return {
    success: true,
    message: `Created sample configuration: ${path}`,
    path,
  };
}
