/**
 * Reads static-analysis output
 * @module src/lint/reader
 */

import fs from "fs-extra";
import { FindingsReadError } from "../errors.ts";

/**
 * Read and trim the findings file.
 * @returns the findings, or null when there is nothing to report
 */
export async function readLintOutput(path: string): Promise<string | null> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    throw new FindingsReadError(path, error);
  }

  const findings = content.trim();
  return findings.length > 0 ? findings : null;
}
