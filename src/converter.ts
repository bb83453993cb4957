/**
 * Converter - Pipeline orchestrator
 * Coordinates the conversion pipeline with zero business logic
 */

import type {
  ConversionConfig,
  ConversionContext,
  PostDescriptor,
  ProcessingStats,
} from "./types";
import type { MarkdownRenderer } from "./markdown";
import {
  Logger,
  Tracker,
  detectNaturalDateParser,
  type NaturalDateParser,
} from "./utils";
import * as modules from "./modules";

export interface ConverterOptions {
  logger?: Logger;
  renderer?: MarkdownRenderer;
  // Omit to detect chrono-node; pass null to disable natural-language parsing
  naturalDateParser?: NaturalDateParser | null;
  dryRun?: boolean;
}

export interface ConversionResult {
  stats: ProcessingStats;
  posts: PostDescriptor[];
}

export class Converter {
  constructor(
    private config: ConversionConfig,
    private options: ConverterOptions = {},
  ) {}

  /**
   * Run the conversion pipeline
   * Pure orchestration - just calls modules in sequence
   */
  async run(): Promise<ConversionResult> {
    const naturalDateParser =
      this.options.naturalDateParser === undefined
        ? await detectNaturalDateParser()
        : this.options.naturalDateParser;

    const ctx: ConversionContext = {
      config: this.config,
      tracker: new Tracker(),
      logger: this.options.logger ?? new Logger(this.config.logging.level),
      naturalDateParser,
      renderer: this.options.renderer,
      dryRun: this.options.dryRun,
    };

    await modules.scan(ctx);
    await modules.process(ctx);

    return {
      stats: ctx.tracker.getStats(),
      posts: ctx.posts ?? [],
    };
  }
}
