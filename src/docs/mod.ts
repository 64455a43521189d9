/**
 * Documentation README generator
 * @module src/docs
 */

export type {
  DocsConfig,
  DocsHeader,
  DocsImage,
  DocsSection,
  DocsStyling,
  GenerateReadmeResult,
  QuickLink,
} from "./types.ts";

export { loadDocsConfig, normalizeDocsConfig, parseDocsConfig } from "./loader.ts";
export {
  DEFAULT_IMAGE,
  DEFAULT_TITLE,
  QUICK_LINKS_HEADING,
  renderHeader,
  renderQuickLinks,
  renderReadme,
  renderSections,
  SECTIONS_HEADING,
} from "./renderer.ts";
export { generateReadme, writeOutputFile } from "./writer.ts";
export { generateSampleDocsConfig } from "./sample.ts";
