/**
 * Unit tests for the docs.yaml loader
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { join } from "node:path";
import {
  loadDocsConfig,
  parseDocsConfig,
} from "../../../src/docs/loader.ts";
import { renderHeader } from "../../../src/docs/renderer.ts";
import { ConfigNotFoundError, ConfigParseError } from "../../../src/errors.ts";
import {
  cleanupTempDir,
  createTempDir,
  writeFixture,
} from "../../utils/test-helpers.ts";

describe("loadDocsConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it("loads and normalizes a configuration file", async () => {
    const path = await writeFixture(
      tempDir,
      "docs.yaml",
      [
        "header:",
        "  title: Handbook",
        "  image:",
        "    width: 150",
        "styling:",
        "  show_image: false",
        "sections:",
        "  - title: Setup",
        "    file: setup.md",
        "quick_links:",
        "  - title: Home",
        "    url: https://example.com",
      ].join("\n"),
    );

    const config = await loadDocsConfig(path);

    expect(config).toEqual({
      header: { title: "Handbook", image: { width: "150" } },
      styling: { show_image: false },
      sections: [{ title: "Setup", file: "setup.md" }],
      quick_links: [{ title: "Home", url: "https://example.com" }],
    });
  });

  it("throws ConfigNotFoundError for a missing file", async () => {
    const path = join(tempDir, "missing.yaml");
    const error = await loadDocsConfig(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigNotFoundError);
    expect(error).toMatchObject({
      code: "CONFIG_NOT_FOUND",
      configPath: path,
      message: `Configuration file ${path} not found`,
    });
  });

  it("throws ConfigParseError for malformed YAML", async () => {
    const path = await writeFixture(tempDir, "docs.yaml", "header: [unclosed\n");

    const error = await loadDocsConfig(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigParseError);
    expect(error).toMatchObject({ code: "CONFIG_PARSE_ERROR", configPath: path });
  });
});

describe("parseDocsConfig", () => {
  it("rejects an empty document", () => {
    expect(() => parseDocsConfig("", "docs.yaml")).toThrow(
      "Error parsing docs.yaml: document is empty",
    );
  });

  it("rejects a top-level sequence", () => {
    expect(() => parseDocsConfig("- a\n- b\n", "docs.yaml")).toThrow(
      ConfigParseError,
    );
  });

  it("accepts an empty mapping", () => {
    expect(parseDocsConfig("{}", "docs.yaml")).toEqual({});
  });

  it("stringifies numeric and boolean scalars", () => {
    const config = parseDocsConfig(
      "sections:\n  - title: 2024\n    file: notes.md\n    description: true\n",
      "docs.yaml",
    );
    expect(config.sections).toEqual([
      { title: "2024", file: "notes.md", description: "true" },
    ]);
  });

  it("drops values of the wrong shape", () => {
    const config = parseDocsConfig(
      [
        "header:",
        "  title: [not, text]",
        "  subtitle: null",
        "styling:",
        "  show_image: sometimes",
        "sections: not-a-list",
        "quick_links:",
        "  - just a string",
        "  - title: Ok",
        "    url: https://ok.test",
      ].join("\n"),
      "docs.yaml",
    );

    expect(config).toEqual({
      header: {},
      styling: {},
      quick_links: [{ title: "Ok", url: "https://ok.test" }],
    });
  });

  for (const value of ["no", "off", "No", "OFF"]) {
    it(`reads show_image: ${value} as false`, () => {
      const config = parseDocsConfig(
        `header:\n  image:\n    src: a.png\nstyling:\n  show_image: ${value}\n`,
        "docs.yaml",
      );

      expect(config.styling).toEqual({ show_image: false });
      expect(renderHeader(config)).toEqual(["# Documentation", ""]);
    });
  }

  for (const value of ["yes", "on"]) {
    it(`reads show_image: ${value} as true`, () => {
      const config = parseDocsConfig(
        `styling:\n  show_image: ${value}\n`,
        "docs.yaml",
      );

      expect(config.styling).toEqual({ show_image: true });
    });
  }

  it("treats an empty image mapping as no image", () => {
    const config = parseDocsConfig("header:\n  image: {}\n", "docs.yaml");
    expect(config.header).toEqual({});
  });
});
