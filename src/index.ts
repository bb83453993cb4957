/**
 * Library entry point
 */

export { Converter } from "./converter";
export type { ConverterOptions, ConversionResult } from "./converter";
export { createMarkdownRenderer } from "./markdown";
export type { MarkdownRenderer } from "./markdown";
export {
  DateNormalizer,
  OutputPathResolver,
  extractFrontmatter,
  stripFrontmatter,
  slugify,
  composeDocument,
  loadConfig,
  loadDefaultConfig,
  detectNaturalDateParser,
  Logger,
  Tracker,
} from "./utils";
export type { NaturalDateParser, CalendarDate } from "./utils";
export * from "./types";
