/**
 * Renders a DocsConfig into README markdown
 * @module src/docs/renderer
 */

import type { DocsConfig } from "./types.ts";

export const DEFAULT_TITLE = "Documentation";

export const DEFAULT_IMAGE = {
  src: "./images/deco_gopher.png",
  alt: "Go Gopher Artist",
  width: "200",
  height: "200",
} as const;

export const SECTIONS_HEADING = "## 📚 Documentation Sections";
export const QUICK_LINKS_HEADING = "## 🚀 Quick Links";

/**
 * Title, optional centered image block, optional subtitle
 */
export function renderHeader(config: DocsConfig): string[] {
  const header = config.header ?? {};
  const showImage = config.styling?.show_image ?? true;
  const lines: string[] = [];

  lines.push(`# ${header.title ?? DEFAULT_TITLE}`);
  lines.push("");

  const image = header.image;
  if (showImage && image) {
    const src = image.src ?? DEFAULT_IMAGE.src;
    const alt = image.alt ?? DEFAULT_IMAGE.alt;
    const width = image.width ?? DEFAULT_IMAGE.width;
    const height = image.height ?? DEFAULT_IMAGE.height;

    lines.push('<div align="center">');
    lines.push(
      `  <img src="${src}" alt="${alt}" width="${width}" height="${height}">`,
    );
    lines.push("  <br>");
    if (image.caption) {
      lines.push(`  <em>${image.caption}</em>`);
    }
    lines.push("</div>");
    lines.push("");
  }

  if (header.subtitle) {
    lines.push(header.subtitle);
    lines.push("");
  }

  return lines;
}

/**
 * One bullet per section that has both a title and a file
 */
export function renderSections(config: DocsConfig): string[] {
  const sections = config.sections ?? [];
  if (sections.length === 0) {
    return [];
  }

  const lines: string[] = [SECTIONS_HEADING, ""];

  for (const section of sections) {
    if (!section.title || !section.file) continue;

    let link = `- [${section.title}](./${section.file})`;
    if (section.description) {
      link += ` - ${section.description}`;
    }
    lines.push(link);
  }

  lines.push("");
  return lines;
}

/**
 * One bullet per link that has both a title and a url
 */
export function renderQuickLinks(config: DocsConfig): string[] {
  const links = config.quick_links ?? [];
  if (links.length === 0) {
    return [];
  }

  const lines: string[] = [QUICK_LINKS_HEADING, ""];

  for (const link of links) {
    if (link.title && link.url) {
      lines.push(`- [${link.title}](${link.url})`);
    }
  }

  lines.push("");
  return lines;
}

/**
 * Full README text: header, sections, quick links
 */
export function renderReadme(config: DocsConfig): string {
  return [
    ...renderHeader(config),
    ...renderSections(config),
    ...renderQuickLinks(config),
  ].join("\n");
}
