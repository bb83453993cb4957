/**
 * Assemble the output document: regenerated frontmatter followed by the HTML body
 */

import type { PostMetadata } from "../types";

/**
 * @example
 * composeDocument({ isoDate: "2020-01-01", title: "Hi", tagsLiteral: "[]" }, "<h1>Hello</h1>\n")
 * // ---
 * // title: "Hi"
 * // date: "2020-01-01"
 * // tags: []
 * // layout: post
 * // ---
 * //
 * // <h1>Hello</h1>
 */
export function composeDocument(
  metadata: PostMetadata,
  bodyHtml: string,
  layout = "post",
): string {
  return [
    "---",
    `title: "${metadata.title}"`,
    `date: "${metadata.isoDate}"`,
    `tags: ${metadata.tagsLiteral}`,
    `layout: ${layout}`,
    "---",
    "",
    bodyHtml.trimEnd(),
    "",
  ].join("\n");
}

/**
 * Fallback body when the Markdown renderer fails
 */
export function preformatted(text: string): string {
  return `<pre>${text}</pre>`;
}
