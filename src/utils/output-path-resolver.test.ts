import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OutputPathResolver } from "./output-path-resolver";

describe("OutputPathResolver", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "md2post-resolver-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns the base name when it is free", () => {
    const resolver = new OutputPathResolver(dir);
    expect(resolver.resolve("2020-01-01-post.html")).toBe(
      join(dir, "2020-01-01-post.html"),
    );
  });

  it("appends -1 when the base name exists", async () => {
    await writeFile(join(dir, "2020-01-01-post.html"), "old");
    const resolver = new OutputPathResolver(dir);

    expect(resolver.resolve("2020-01-01-post.html")).toBe(
      join(dir, "2020-01-01-post-1.html"),
    );
  });

  it("probes counters in order", async () => {
    await writeFile(join(dir, "2020-01-01-post.html"), "old");
    await writeFile(join(dir, "2020-01-01-post-1.html"), "old");
    const resolver = new OutputPathResolver(dir);

    expect(resolver.resolve("2020-01-01-post.html")).toBe(
      join(dir, "2020-01-01-post-2.html"),
    );
  });

  it("never hands out the same name twice in a run", () => {
    const resolver = new OutputPathResolver(dir);

    expect(resolver.resolve("a.html")).toBe(join(dir, "a.html"));
    expect(resolver.resolve("a.html")).toBe(join(dir, "a-1.html"));
    expect(resolver.resolve("a.html")).toBe(join(dir, "a-2.html"));
  });

  it("handles names without an extension", async () => {
    await writeFile(join(dir, "README"), "old");
    const resolver = new OutputPathResolver(dir);

    expect(resolver.resolve("README")).toBe(join(dir, "README-1"));
  });
});
