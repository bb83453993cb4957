/**
 * Markdown Renderer
 * Sets up marked for post bodies: GFM (tables, fenced code, strikethrough)
 * plus the "extra" syntax legacy exports use, footnotes and definition lists
 */

import { Marked } from "marked";
import markedFootnote from "marked-footnote";
import { highlightWrapper } from "./code-block";
import { definitionLists } from "./definition-list";
import type { MarkdownConfig } from "../types";

export interface MarkdownRenderer {
  /** Render Markdown to HTML; throws when the renderer fails */
  render(markdown: string): string;
}

export function createMarkdownRenderer(config: MarkdownConfig): MarkdownRenderer {
  const marked = new Marked({
    gfm: config.gfm,
    breaks: config.breaks,
    async: false,
  });

  marked.use(highlightWrapper(), definitionLists(), markedFootnote());

  return {
    render(markdown: string): string {
      const html = marked.parse(markdown, { async: false });
      if (typeof html !== "string") {
        throw new Error("Markdown renderer returned a promise");
      }
      return html;
    },
  };
}

export { escapeHtml } from "./code-block";
