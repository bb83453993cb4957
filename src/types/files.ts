/**
 * Post-related type definitions
 */

/**
 * A Markdown post as read from disk
 * Created once per file and never modified
 */
export interface RawPost {
  readonly sourcePath: string;
  readonly rawText: string;
}

export interface PostMetadata {
  isoDate: string; // Always a valid calendar date (YYYY-MM-DD)
  title: string; // Falls back to frontmatter.defaultTitle
  tagsLiteral: string; // Raw bracketed list text, e.g. `["a", "b"]`, never parsed
}

export interface RenderedPost {
  metadata: PostMetadata;
  bodyHtml: string;
  // `<isoDate>-<slug>.html`, not unique until resolved against the output directory
  outputBaseName: string;
}

export interface PostDescriptor {
  // Scanner fills these fields:
  sourcePath: string; // Absolute path to source Markdown
  relativePath: string; // Relative path from input root

  // Processor fills these fields (after processing):
  outputPath?: string; // Resolved, collision-free output path
  title?: string;
  written?: boolean; // True after the post has been written to disk
}
