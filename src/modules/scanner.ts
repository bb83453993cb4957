/**
 * Scanner Module
 * Discovers Markdown posts in the input directory
 */

import glob from "fast-glob";
import path from "node:path";
import { isDirectory } from "../utils";
import type { ConversionContext, PostDescriptor } from "../types";

/**
 * Scans the input directory (top level only) for `.md` files, any case
 *
 * Writes to context:
 * - posts: One descriptor per post, sorted by file name
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const inputDir = path.resolve(ctx.config.input.directory);

  if (!(await isDirectory(inputDir))) {
    throw new Error(`Input directory not found: ${inputDir}`);
  }

  const markdownFiles = await glob("*.md", {
    cwd: inputDir,
    absolute: true,
    onlyFiles: true,
    caseSensitiveMatch: false,
    dot: true,
  });

  // Collision suffixes depend on processing order, so keep it stable
  const sortedFiles = markdownFiles.sort((a, b) => {
    const nameA = path.basename(a);
    const nameB = path.basename(b);
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
  });

  ctx.posts = sortedFiles.map(
    (sourcePath): PostDescriptor => ({
      sourcePath,
      relativePath: path.relative(inputDir, sourcePath),
    }),
  );

  ctx.logger.debug(`Found ${ctx.posts.length} posts in ${inputDir}`);
}
