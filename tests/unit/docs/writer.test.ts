/**
 * Unit tests for README writing
 */

import fs from "fs-extra";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { generateReadme, writeOutputFile } from "../../../src/docs/writer.ts";
import { ConfigNotFoundError, WriteError } from "../../../src/errors.ts";
import {
  cleanupTempDir,
  createTempDir,
  writeFixture,
} from "../../utils/test-helpers.ts";

describe("writeOutputFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it("creates missing parent directories", async () => {
    const outputPath = join(tempDir, "nested", "docs", "README.md");

    const bytes = await writeOutputFile(outputPath, "# Title\n");

    expect(await fs.readFile(outputPath, "utf-8")).toBe("# Title\n");
    expect(bytes).toBe(8);
  });

  it("overwrites an existing file and leaves no temporary file", async () => {
    const outputPath = await writeFixture(tempDir, "README.md", "old content");

    await writeOutputFile(outputPath, "new");

    expect(await fs.readFile(outputPath, "utf-8")).toBe("new");
    expect(await fs.readdir(tempDir)).toEqual(["README.md"]);
  });

  it("counts bytes, not characters", async () => {
    const bytes = await writeOutputFile(join(tempDir, "out.md"), "## 🚀");
    expect(bytes).toBe(7);
  });

  it("throws WriteError when the destination cannot be written", async () => {
    // A regular file where a directory is expected
    const blocker = await writeFixture(tempDir, "blocker", "x");
    const outputPath = join(blocker, "README.md");

    const error = await writeOutputFile(outputPath, "text").catch((e: unknown) =>
      e
    );

    expect(error).toBeInstanceOf(WriteError);
    expect(error).toMatchObject({ code: "WRITE_ERROR", outputPath });
  });

  it("keeps the existing file when the rename fails", async () => {
    const outputPath = await writeFixture(tempDir, "README.md", "OLD");
    vi.spyOn(fs, "rename").mockRejectedValueOnce(new Error("EXDEV"));

    await expect(writeOutputFile(outputPath, "NEW")).rejects.toBeInstanceOf(
      WriteError,
    );

    expect(await fs.readFile(outputPath, "utf-8")).toBe("OLD");
    expect(await fs.readdir(tempDir)).toEqual(["README.md"]);
  });
});

describe("generateReadme", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it("renders docs.yaml into the output file", async () => {
    const configPath = await writeFixture(
      tempDir,
      "docs.yaml",
      "header:\n  title: Guide\nsections:\n  - title: A\n    file: a.md\n",
    );
    const outputPath = join(tempDir, "docs", "README.md");

    const result = await generateReadme(configPath, outputPath);

    const expected = [
      "# Guide",
      "",
      "## 📚 Documentation Sections",
      "",
      "- [A](./a.md)",
      "",
    ].join("\n");
    expect(await fs.readFile(outputPath, "utf-8")).toBe(expected);
    expect(result).toEqual({
      outputPath,
      bytes: Buffer.byteLength(expected, "utf-8"),
    });
  });

  it("produces byte-identical output on repeated runs", async () => {
    const configPath = await writeFixture(
      tempDir,
      "docs.yaml",
      "header:\n  title: Guide\n  image:\n    alt: Logo\n",
    );
    const outputPath = join(tempDir, "docs", "README.md");

    await generateReadme(configPath, outputPath);
    const first = await fs.readFile(outputPath);
    await generateReadme(configPath, outputPath);
    const second = await fs.readFile(outputPath);

    expect(second.equals(first)).toBe(true);
  });

  it("writes nothing when the configuration is missing", async () => {
    const outputPath = join(tempDir, "docs", "README.md");

    await expect(
      generateReadme(join(tempDir, "docs.yaml"), outputPath),
    ).rejects.toBeInstanceOf(ConfigNotFoundError);
    expect(await fs.pathExists(outputPath)).toBe(false);
  });
});
