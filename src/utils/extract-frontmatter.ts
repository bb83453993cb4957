/**
 * Frontmatter Extractor
 * Pulls date/title/tags out of a post by pattern search
 *
 * Matching is line-based over the whole text rather than a parse of the
 * `---` block, so a field line anywhere in the post is picked up and a
 * malformed header still yields metadata.
 */

import type { DateNormalizer } from "./date-normalizer";
import type { FrontmatterConfig, PostMetadata } from "../types";

const DATE_LINE = /^date:\s*["']?(.+?)["']?\s*$/m;
const TITLE_LINE = /^title:\s*["'](.+?)["']/m;
const TAGS_LINE = /^tags:\s*(\[[^\]]*\])/m;

// Leading `---` block plus the whitespace after it
const FRONTMATTER_BLOCK = /^\uFEFF?\s*---[\s\S]*?---\s*/;

const DEFAULTS: FrontmatterConfig = {
  defaultTitle: "Untitled Post",
  defaultTags: "[]",
};

export function extractFrontmatter(
  rawText: string,
  normalizer: DateNormalizer,
  defaults: FrontmatterConfig = DEFAULTS,
): PostMetadata {
  const dateMatch = DATE_LINE.exec(rawText);
  const titleMatch = TITLE_LINE.exec(rawText);
  const tagsMatch = TAGS_LINE.exec(rawText);

  return {
    isoDate: normalizer.normalize(dateMatch?.[1]),
    title: titleMatch ? titleMatch[1].trim() : defaults.defaultTitle,
    tagsLiteral: tagsMatch ? tagsMatch[1].trim() : defaults.defaultTags,
  };
}

/**
 * Remove the leading frontmatter block, if the text starts with one
 *
 * @example
 * stripFrontmatter('---\ntitle: "Hi"\n---\n# Hello') // "# Hello"
 */
export function stripFrontmatter(rawText: string): string {
  return rawText.replace(FRONTMATTER_BLOCK, "");
}
