/**
 * Processor Module
 * Converts posts one at a time: read, render, extract metadata, write
 */

import { readFile, writeFile, mkdir } from "fs/promises";
import { basename, dirname, resolve } from "node:path";
import { createMarkdownRenderer } from "../markdown";
import {
  DateNormalizer,
  OutputPathResolver,
  composeDocument,
  extractFrontmatter,
  preformatted,
  slugify,
  stripFrontmatter,
} from "../utils";
import type {
  ConversionContext,
  PostDescriptor,
  RawPost,
  RenderedPost,
} from "../types";

// ============================================================================
// Main Processor Function
// ============================================================================

export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.posts) {
    throw new Error("Scanner must run before processor");
  }

  // ============================================================================
  // Shared State (closure variables)
  // ============================================================================

  const { config, posts, tracker, logger, naturalDateParser, dryRun } = ctx;
  const renderer = ctx.renderer ?? createMarkdownRenderer(config.markdown);
  const resolver = new OutputPathResolver(resolve(config.output.directory));

  // ============================================================================
  // Processing Functions
  // ============================================================================

  async function readPost(post: PostDescriptor): Promise<RawPost> {
    // Invalid byte sequences decode to U+FFFD
    const rawText = await readFile(post.sourcePath, {
      encoding: config.input.encoding,
    });
    return { sourcePath: post.sourcePath, rawText };
  }

  function renderBody(post: PostDescriptor, markdown: string): string {
    try {
      return renderer.render(markdown);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(
        `Markdown conversion failed for ${post.relativePath}: ${message}. Writing raw body instead.`,
      );
      tracker.trackFileError(post.relativePath, error, "render");
      return preformatted(markdown);
    }
  }

  function renderPost(post: PostDescriptor, raw: RawPost): RenderedPost {
    const normalizer = new DateNormalizer({
      naturalParser: naturalDateParser,
      logger,
      onUnrecognized: (rawDate) =>
        tracker.trackDateFallback(post.relativePath, rawDate),
    });

    const bodyHtml = renderBody(post, stripFrontmatter(raw.rawText));
    const metadata = extractFrontmatter(
      raw.rawText,
      normalizer,
      config.frontmatter,
    );
    const slug = slugify(
      metadata.title,
      config.slug.maxLength,
      config.slug.fallback,
    );

    return {
      metadata,
      bodyHtml,
      outputBaseName: `${metadata.isoDate}-${slug}${config.output.extension}`,
    };
  }

  async function writePost(
    post: PostDescriptor,
    rendered: RenderedPost,
  ): Promise<void> {
    const outputPath = resolver.resolve(rendered.outputBaseName);
    post.outputPath = outputPath;
    post.title = rendered.metadata.title;

    if (dryRun) {
      logger.info(`Would convert: ${post.relativePath} → ${basename(outputPath)}`);
      return;
    }

    const document = composeDocument(
      rendered.metadata,
      rendered.bodyHtml,
      config.output.layout,
    );
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, document, "utf-8");
    post.written = true;
    logger.info(`Converted: ${post.relativePath} → ${basename(outputPath)}`);
  }

  // ============================================================================
  // Main Orchestration
  // ============================================================================

  tracker.setTotalFiles(posts.length);

  for (const post of posts) {
    let raw: RawPost;
    try {
      raw = await readPost(post);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to read ${post.relativePath}: ${message}`, error);
      tracker.trackFileError(post.relativePath, error, "read");
      tracker.incrementSkipped();
      continue;
    }

    let rendered: RenderedPost;
    try {
      rendered = renderPost(post, raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to convert ${post.relativePath}: ${message}`, error);
      tracker.trackFileError(post.relativePath, error, "convert");
      tracker.incrementFailed();
      continue;
    }

    try {
      await writePost(post, rendered);
      tracker.incrementConverted();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to write ${post.outputPath}: ${message}`, error);
      tracker.trackFileError(post.outputPath ?? post.relativePath, error, "write");
      tracker.incrementFailed();
    }
  }
}
