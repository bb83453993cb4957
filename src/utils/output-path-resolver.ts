/**
 * Output Path Resolver
 * Assigns each post a file name no other post in the run will get
 */

import { existsSync } from "node:fs";
import path from "node:path";

export class OutputPathResolver {
  private readonly claimed = new Set<string>();

  constructor(private readonly outputDir: string) {}

  /**
   * Resolve a base file name to a free path in the output directory
   *
   * A name is free when no file exists at that path and no earlier call
   * in this run returned it. Taken names get `-1`, `-2`, … before the
   * extension. The returned path is claimed for the rest of the run.
   *
   * @example
   * resolver.resolve("2020-01-01-post.html") // "<dir>/2020-01-01-post.html"
   * resolver.resolve("2020-01-01-post.html") // "<dir>/2020-01-01-post-1.html"
   */
  resolve(baseName: string): string {
    const { name, ext } = path.parse(baseName);

    let candidate = path.join(this.outputDir, baseName);
    for (let counter = 1; this.isTaken(candidate); counter++) {
      candidate = path.join(this.outputDir, `${name}-${counter}${ext}`);
    }

    this.claimed.add(candidate);
    return candidate;
  }

  private isTaken(candidate: string): boolean {
    return this.claimed.has(candidate) || existsSync(candidate);
  }
}
