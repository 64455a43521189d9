/**
 * Documentation set configuration, as read from docs.yaml
 * @module src/docs/types
 */

export interface DocsImage {
  src?: string;
  alt?: string;
  width?: string;
  height?: string;
  caption?: string;
}

export interface DocsHeader {
  title?: string;
  subtitle?: string;
  image?: DocsImage;
}

export interface DocsStyling {
  /** Render the header image block (default: true) */
  show_image?: boolean;
}

export interface DocsSection {
  title?: string;
  /** Path relative to the generated README's directory */
  file?: string;
  description?: string;
}

export interface QuickLink {
  title?: string;
  url?: string;
}

/**
 * Normalized configuration. Every key is optional; renderers fall back to
 * defaults or skip incomplete entries.
 */
export interface DocsConfig {
  header?: DocsHeader;
  styling?: DocsStyling;
  sections?: DocsSection[];
  quick_links?: QuickLink[];
}

export interface GenerateReadmeResult {
  outputPath: string;
  bytes: number;
}
