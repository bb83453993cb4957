/**
 * Fenced code blocks wrapped the way Jekyll/Rouge themes expect:
 * <div class="highlight"><pre><code class="language-ts">…</code></pre></div>
 */

import type { MarkedExtension, Tokens } from "marked";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function highlightWrapper(): MarkedExtension {
  return {
    renderer: {
      code({ text, lang, escaped }: Tokens.Code): string {
        const language = lang?.match(/^\S*/)?.[0] ?? "";
        const body = escaped ? text : escapeHtml(text);
        const classAttr = language
          ? ` class="language-${escapeHtml(language)}"`
          : "";
        return `<div class="highlight"><pre><code${classAttr}>${body}\n</code></pre></div>\n`;
      },
    },
  };
}
