/**
 * Utility exports
 */

// Date utilities
export { DateNormalizer, stripTimezone } from "./date-normalizer";
export type { DateNormalizerOptions } from "./date-normalizer";
export { parseDateFormat, parseFirstDateFormat } from "./date-format";
export {
  formatIsoDate,
  isValidCalendarDate,
  localCalendarDate,
} from "./calendar-date";
export type { CalendarDate } from "./calendar-date";
export {
  detectNaturalDateParser,
  createChronoParser,
} from "./natural-date-parser";
export type { NaturalDateParser } from "./natural-date-parser";

// Post utilities
export { extractFrontmatter, stripFrontmatter } from "./extract-frontmatter";
export { slugify } from "./slugify";
export { composeDocument, preformatted } from "./compose-document";

// Filesystem utilities
export { isDirectory } from "./fs";
export { OutputPathResolver } from "./output-path-resolver";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
