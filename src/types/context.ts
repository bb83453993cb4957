/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { PostDescriptor } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { NaturalDateParser } from "../utils/natural-date-parser";
import type { MarkdownRenderer } from "../markdown";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;

  // Unified tracking for stats and issues
  tracker: Tracker;
  logger: Logger;

  // Free-form date parser detected at startup, null when unavailable
  naturalDateParser: NaturalDateParser | null;

  // Defaults to marked configured from config.markdown
  renderer?: MarkdownRenderer;

  dryRun?: boolean;
  verbose?: boolean;

  posts?: PostDescriptor[]; // Filled by the scanner
}
