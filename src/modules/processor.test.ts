import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { scan } from "./scanner";
import { process } from "./processor";
import { Logger, Tracker, loadDefaultConfig, mergeConfig } from "../utils";
import type { MarkdownRenderer } from "../markdown";
import type { ConversionContext } from "../types";

describe("process", () => {
  let root: string;
  let input: string;
  let output: string;
  let logger: Logger;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "md2post-process-"));
    input = join(root, "_posts");
    output = join(root, "html_posts");
    await mkdir(input);

    logger = new Logger("error");
    vi.spyOn(logger, "info").mockImplementation(() => {});
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rm(root, { recursive: true, force: true });
  });

  async function writeFileIn(dir: string, name: string, content: string) {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, name), content);
  }

  async function createContext(
    overrides: Partial<ConversionContext> = {},
  ): Promise<ConversionContext> {
    const config = mergeConfig(await loadDefaultConfig(), {
      input: { directory: input },
      output: { directory: output },
    });
    return {
      config,
      tracker: new Tracker(),
      logger,
      naturalDateParser: null,
      ...overrides,
    };
  }

  async function run(ctx: ConversionContext): Promise<void> {
    await scan(ctx);
    await process(ctx);
  }

  it("writes one document per post with regenerated frontmatter", async () => {
    await writeFileIn(
      input,
      "hi.md",
      '---\ntitle: "Hi"\ndate: "2020-01-01"\ntags: []\n---\n# Hello',
    );

    const ctx = await createContext();
    await run(ctx);

    expect(await readdir(output)).toEqual(["2020-01-01-hi.html"]);
    expect(await readFile(join(output, "2020-01-01-hi.html"), "utf-8")).toBe(
      '---\ntitle: "Hi"\ndate: "2020-01-01"\ntags: []\nlayout: post\n---\n\n<h1>Hello</h1>\n',
    );
    expect(logger.info).toHaveBeenCalledWith(
      "Converted: hi.md → 2020-01-01-hi.html",
    );
    expect(ctx.tracker.getStats().convertedFiles).toBe(1);
  });

  it("fills in defaults when a post has no metadata", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2024, 4, 15, 12));
    await writeFileIn(input, "bare.md", "Just *words*.\n");

    await run(await createContext());

    expect(
      await readFile(join(output, "2024-05-15-untitled-post.html"), "utf-8"),
    ).toBe(
      '---\ntitle: "Untitled Post"\ndate: "2024-05-15"\ntags: []\nlayout: post\n---\n\n<p>Just <em>words</em>.</p>\n',
    );
  });

  it("keeps the tags literal as written", async () => {
    await writeFileIn(
      input,
      "tagged.md",
      'title: "Tagged"\ndate: 2021-06-01\ntags: ["js", "node"]\n\nBody',
    );

    await run(await createContext());

    const document = await readFile(
      join(output, "2021-06-01-tagged.html"),
      "utf-8",
    );
    expect(document.split("\n")[3]).toBe('tags: ["js", "node"]');
  });

  it("gives posts with the same title and date distinct names", async () => {
    const post = '---\ntitle: "Same"\ndate: 2020-01-01\n---\nBody';
    await writeFileIn(input, "a.md", post);
    await writeFileIn(input, "b.md", post);
    await writeFileIn(output, "2020-01-01-same.html", "existing");

    const ctx = await createContext();
    await run(ctx);

    expect(ctx.posts?.map((p) => p.outputPath)).toEqual([
      join(output, "2020-01-01-same-1.html"),
      join(output, "2020-01-01-same-2.html"),
    ]);
    expect(await readFile(join(output, "2020-01-01-same.html"), "utf-8")).toBe(
      "existing",
    );
  });

  it("skips a post that cannot be read and converts the rest", async () => {
    await writeFileIn(input, "one.md", 'title: "One"\ndate: 2020-01-01');
    await writeFileIn(input, "two.md", 'title: "Two"\ndate: 2020-01-02');
    await writeFileIn(input, "three.md", 'title: "Three"\ndate: 2020-01-03');

    const ctx = await createContext();
    await scan(ctx);
    await rm(join(input, "two.md"));
    await process(ctx);

    expect((await readdir(output)).sort()).toEqual([
      "2020-01-01-one.html",
      "2020-01-03-three.html",
    ]);

    const stats = ctx.tracker.getStats();
    expect(stats.convertedFiles).toBe(2);
    expect(stats.skippedFiles).toBe(1);
    expect(ctx.tracker.getIssues("file")).toMatchObject([
      { type: "file", path: "two.md", reason: "read-error" },
    ]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("writes the raw body in a <pre> block when rendering fails", async () => {
    await writeFileIn(input, "post.md", '---\ntitle: "Broken"\ndate: 2020-01-01\n---\n# Hello');
    const renderer: MarkdownRenderer = {
      render: () => {
        throw new Error("renderer exploded");
      },
    };

    const ctx = await createContext({ renderer });
    await run(ctx);

    const document = await readFile(
      join(output, "2020-01-01-broken.html"),
      "utf-8",
    );
    expect(document.endsWith("---\n\n<pre># Hello</pre>\n")).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      "Markdown conversion failed for post.md: renderer exploded. Writing raw body instead.",
    );
    expect(ctx.tracker.getStats().renderFallbacks).toBe(1);
    expect(ctx.tracker.getStats().convertedFiles).toBe(1);
  });

  it("records a date fallback for the post it came from", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2024, 4, 15, 12));
    await writeFileIn(input, "odd.md", 'title: "Odd"\ndate: whenever');

    const ctx = await createContext();
    await run(ctx);

    expect(existsSync(join(output, "2024-05-15-odd.html"))).toBe(true);
    expect(ctx.tracker.getIssues("date")).toEqual([
      {
        type: "date",
        path: "odd.md",
        reason: "unrecognized-format",
        details: "whenever",
      },
    ]);
  });

  it("keeps converting when the natural date parser throws", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date(2024, 4, 15, 12));
    await writeFileIn(input, "a.md", 'title: "A"\ndate: weird');
    await writeFileIn(input, "b.md", 'title: "B"\ndate: 2020-01-02');

    const ctx = await createContext({
      naturalDateParser: {
        parse: (text) => {
          if (text === "weird") throw new RangeError("boom");
          return null;
        },
      },
    });
    await run(ctx);

    expect((await readdir(output)).sort()).toEqual([
      "2020-01-02-b.html",
      "2024-05-15-a.html",
    ]);
    expect(ctx.tracker.getStats().convertedFiles).toBe(2);
    expect(ctx.tracker.getIssues("date")).toMatchObject([
      { path: "a.md", details: "weird" },
    ]);
  });

  it("replaces invalid UTF-8 bytes instead of failing", async () => {
    await writeFile(
      join(input, "bytes.md"),
      Buffer.concat([
        Buffer.from('title: "Bytes"\ndate: 2020-01-01\n\nbad '),
        Buffer.from([0xff, 0xfe]),
        Buffer.from(" end\n"),
      ]),
    );

    const ctx = await createContext();
    await run(ctx);

    const document = await readFile(
      join(output, "2020-01-01-bytes.html"),
      "utf-8",
    );
    expect(document).toContain("<p>bad \uFFFD\uFFFD end</p>");
    expect(ctx.tracker.getStats().convertedFiles).toBe(1);
    expect(ctx.tracker.getIssues("file")).toEqual([]);
  });

  it("continues past write failures", async () => {
    await writeFileIn(input, "one.md", 'title: "One"\ndate: 2020-01-01');
    await writeFileIn(input, "two.md", 'title: "Two"\ndate: 2020-01-02');
    // A regular file where the output directory should be
    await writeFile(output, "not a directory");

    const ctx = await createContext();
    await run(ctx);

    const stats = ctx.tracker.getStats();
    expect(stats.failedFiles).toBe(2);
    expect(stats.convertedFiles).toBe(0);
    expect(ctx.tracker.getIssues("file").map((i) => i.reason)).toEqual([
      "write-error",
      "write-error",
    ]);
  });

  it("writes nothing on a dry run but still assigns distinct names", async () => {
    const post = 'title: "Same"\ndate: 2020-01-01';
    await writeFileIn(input, "a.md", post);
    await writeFileIn(input, "b.md", post);

    const ctx = await createContext({ dryRun: true });
    await run(ctx);

    expect(existsSync(output)).toBe(false);
    expect(ctx.posts?.map((p) => p.outputPath)).toEqual([
      join(output, "2020-01-01-same.html"),
      join(output, "2020-01-01-same-1.html"),
    ]);
    expect(ctx.posts?.every((p) => !p.written)).toBe(true);
  });

  it("requires the scanner to run first", async () => {
    await expect(process(await createContext())).rejects.toThrow(
      "Scanner must run before processor",
    );
  });
});
