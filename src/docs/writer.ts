/**
 * Writes the generated README to disk
 * @module src/docs/writer
 */

import fs from "fs-extra";
import { basename, dirname, join } from "node:path";
import { errorMessage, WriteError } from "../errors.ts";
import { Logger } from "../logger/mod.ts";
import { loadDocsConfig } from "./loader.ts";
import { renderReadme } from "./renderer.ts";
import type { GenerateReadmeResult } from "./types.ts";

const log = Logger.create("docs:writer");

/**
 * Write content to outputPath, replacing any existing file.
 *
 * Parent directories are created. The text goes to a temporary sibling
 * first and is renamed into place, so readers never see a partial file.
 */
export async function writeOutputFile(
  outputPath: string,
  content: string,
): Promise<number> {
  const dir = dirname(outputPath);
  const tempPath = join(dir, `.${basename(outputPath)}.${process.pid}.tmp`);

  try {
    await fs.ensureDir(dir);
    await fs.writeFile(tempPath, content, "utf-8");
    // rename replaces the destination in one step; the old file stays until then
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.remove(tempPath).catch((cleanupError: unknown) => {
      log.debug("Temporary file not removed", {
        path: tempPath,
        error: errorMessage(cleanupError),
      });
    });
    throw new WriteError(outputPath, error);
  }

  const bytes = Buffer.byteLength(content, "utf-8");
  log.debug("Wrote file", { path: outputPath, bytes });
  return bytes;
}

/**
 * Load docs.yaml, render it and write the README
 */
export async function generateReadme(
  configPath: string,
  outputPath: string,
): Promise<GenerateReadmeResult> {
  const config = await loadDocsConfig(configPath);
  const content = renderReadme(config);
  const bytes = await writeOutputFile(outputPath, content);
  return { outputPath, bytes };
}
