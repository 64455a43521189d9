/**
 * Sample docs.yaml shipped by `repo-automation docs-init`
 * @module src/docs/sample
 */

export function generateSampleDocsConfig(): string {
  return `# Documentation README configuration
# Render with: repo-automation docs-readme --config docs.yaml --output docs/README.md

header:
  title: Project Documentation
  subtitle: Guides and references for working on this project.
  image:
    src: ./images/logo.png        # Relative to the generated README
    alt: Project logo
    width: 200
    height: 200
    caption: Built with care      # Optional, rendered in italics

styling:
  show_image: true                # Set to false to drop the image block

# Each entry needs title and file; description is optional
sections:
  - title: Getting Started
    file: getting-started.md
    description: Install, configure and run the project
  - title: Configuration
    file: configuration.md
    description: Every setting and its default

# Each entry needs title and url
quick_links:
  - title: Issue Tracker
    url: https://example.com/issues
  - title: Changelog
    url: ./CHANGELOG.md
`;
}
