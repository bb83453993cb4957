import { describe, it, expect } from "vitest";
import { slugify } from "./slugify";

describe("slugify", () => {
  it("lowercases and hyphenates words", () => {
    expect(slugify("Hello, World!")).toBe("hello-world");
  });

  it("strips accents", () => {
    expect(slugify("Crème brûlée")).toBe("creme-brulee");
  });

  it("collapses whitespace, underscores and hyphens", () => {
    expect(slugify("  --Lots   of -- space--  ")).toBe("lots-of-space");
    expect(slugify("snake_case_title")).toBe("snake-case-title");
  });

  it.each(["", "!!!", "你好"])("falls back for %j", (title) => {
    expect(slugify(title)).toBe("untitled-post");
  });

  it("truncates to 50 characters", () => {
    expect(slugify("a".repeat(60))).toBe("a".repeat(50));
  });

  it("trims a hyphen left at the cut", () => {
    expect(slugify(`${"x".repeat(49)} yz`)).toBe("x".repeat(49));
  });

  it("honors a custom length and fallback", () => {
    expect(slugify("one two three", 7)).toBe("one-two");
    expect(slugify("???", 50, "post")).toBe("post");
  });

  const titles = [
    "Hello, World!",
    "Crème brûlée",
    "",
    "A Very Long Title That Keeps Going And Going Past Fifty Characters",
    "2012: A Year_in Review -- Part 2",
    "   ",
  ];

  it.each(titles)("produces a safe slug for %j", (title) => {
    const slug = slugify(title);
    expect(slug).toMatch(/^[a-z0-9-]+$/);
    expect(slug.length).toBeGreaterThanOrEqual(1);
    expect(slug.length).toBeLessThanOrEqual(50);
  });

  it.each(titles)("is idempotent for %j", (title) => {
    const slug = slugify(title);
    expect(slugify(slug)).toBe(slug);
  });
});
