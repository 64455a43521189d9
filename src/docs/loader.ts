/**
 * Documentation configuration loader
 *
 * Parses docs.yaml and normalizes it into a DocsConfig. Values of the wrong
 * shape are dropped rather than rejected so rendering can fall back to
 * defaults.
 */

import fs from "fs-extra";
import { parse, YAMLParseError } from "yaml";
import { ConfigNotFoundError, ConfigParseError } from "../errors.ts";
import { Logger } from "../logger/mod.ts";
import type {
  DocsConfig,
  DocsHeader,
  DocsImage,
  DocsSection,
  DocsStyling,
  QuickLink,
} from "./types.ts";

const log = Logger.create("docs:loader");

/**
 * Load a documentation configuration from a YAML file
 */
export async function loadDocsConfig(configPath: string): Promise<DocsConfig> {
  if (!await fs.pathExists(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  const content = await fs.readFile(configPath, "utf-8");
  const config = parseDocsConfig(content, configPath);
  log.debug("Loaded configuration", {
    path: configPath,
    sections: config.sections?.length ?? 0,
    quickLinks: config.quick_links?.length ?? 0,
  });
  return config;
}

/**
 * Parse YAML text into a DocsConfig
 */
export function parseDocsConfig(
  content: string,
  configPath: string,
): DocsConfig {
  let raw: unknown;
  try {
    raw = parse(content, { version: "1.1" });
  } catch (error) {
    const message = error instanceof YAMLParseError
      ? error.message
      : String(error);
    throw new ConfigParseError(message, configPath, error);
  }

  if (raw === null || raw === undefined) {
    throw new ConfigParseError("document is empty", configPath);
  }
  if (!isRecord(raw)) {
    throw new ConfigParseError(
      "top-level value must be a mapping",
      configPath,
    );
  }

  return normalizeDocsConfig(raw);
}

export function normalizeDocsConfig(raw: Record<string, unknown>): DocsConfig {
  const config: DocsConfig = {};

  const header = isRecord(raw.header) ? normalizeHeader(raw.header) : undefined;
  if (header) config.header = header;

  if (isRecord(raw.styling)) {
    const styling: DocsStyling = {};
    if (typeof raw.styling.show_image === "boolean") {
      styling.show_image = raw.styling.show_image;
    }
    config.styling = styling;
  }

  if (Array.isArray(raw.sections)) {
    config.sections = raw.sections.filter(isRecord).map(normalizeSection);
  }

  if (Array.isArray(raw.quick_links)) {
    config.quick_links = raw.quick_links.filter(isRecord).map(
      normalizeQuickLink,
    );
  }

  return config;
}

function normalizeHeader(raw: Record<string, unknown>): DocsHeader {
  const header: DocsHeader = {};
  assignText(header, "title", raw.title);
  assignText(header, "subtitle", raw.subtitle);
  // An empty image mapping counts as no image
  if (isRecord(raw.image) && Object.keys(raw.image).length > 0) {
    const image: DocsImage = {};
    assignText(image, "src", raw.image.src);
    assignText(image, "alt", raw.image.alt);
    assignText(image, "width", raw.image.width);
    assignText(image, "height", raw.image.height);
    assignText(image, "caption", raw.image.caption);
    header.image = image;
  }
  return header;
}

function normalizeSection(raw: Record<string, unknown>): DocsSection {
  const section: DocsSection = {};
  assignText(section, "title", raw.title);
  assignText(section, "file", raw.file);
  assignText(section, "description", raw.description);
  return section;
}

function normalizeQuickLink(raw: Record<string, unknown>): QuickLink {
  const link: QuickLink = {};
  assignText(link, "title", raw.title);
  assignText(link, "url", raw.url);
  return link;
}

/**
 * Copy a YAML scalar onto a text field. Numbers and booleans are
 * stringified; nulls, sequences and mappings leave the field unset.
 */
function assignText<K extends string>(
  target: { [P in K]?: string },
  key: K,
  value: unknown,
): void {
  const text = toText(value);
  if (text !== undefined) {
    target[key] = text;
  }
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
