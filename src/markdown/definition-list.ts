/**
 * Definition lists in the Markdown Extra style:
 *
 *   Apple
 *   :   A red fruit
 *
 * renders as <dl><dt>Apple</dt><dd>A red fruit</dd></dl>. Groups may be
 * separated by a blank line and a term may carry several definitions.
 */

import type {
  MarkedExtension,
  Token,
  TokenizerAndRendererExtension,
  Tokens,
} from "marked";

const LIST =
  /^(?:[^\s:][^\n]*\n(?::[ \t]+[^\n]*(?:\n|$))+(?:\n(?=[^\s:][^\n]*\n:[ \t]))?)+/;
const LIST_START = /^[^\s:][^\n]*\n:[ \t]/m;
const DEFINITION_LINE = /^:[ \t]+(.*)$/;

interface DefinitionItem extends Tokens.Generic {
  type: "dt" | "dd";
  tokens: Token[];
}

function isDefinitionItem(token: Token): token is DefinitionItem {
  return (
    (token.type === "dt" || token.type === "dd") &&
    "tokens" in token &&
    Array.isArray(token.tokens)
  );
}

const definitionList: TokenizerAndRendererExtension = {
  name: "definitionList",
  level: "block",
  start(src) {
    return LIST_START.exec(src)?.index;
  },
  tokenizer(src) {
    const match = LIST.exec(src);
    if (!match) return undefined;

    const items: DefinitionItem[] = [];
    for (const line of match[0].split("\n")) {
      if (!line.trim()) continue;

      const definition = DEFINITION_LINE.exec(line);
      items.push({
        type: definition ? "dd" : "dt",
        raw: line,
        tokens: this.lexer.inline((definition ? definition[1] : line).trim()),
      });
    }

    return { type: "definitionList", raw: match[0], tokens: items };
  },
  renderer(token) {
    const body = (token.tokens ?? [])
      .filter(isDefinitionItem)
      .map(
        (item) =>
          `<${item.type}>${this.parser.parseInline(item.tokens)}</${item.type}>\n`,
      )
      .join("");
    return `<dl>\n${body}</dl>\n`;
  },
};

export function definitionLists(): MarkedExtension {
  return { extensions: [definitionList] };
}
