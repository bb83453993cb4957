/**
 * Turn a post title into a filesystem-safe filename fragment
 * Result matches [a-z0-9]+(-[a-z0-9]+)* and is at most `maxLength` long
 *
 * @example
 * slugify("Hello, World!") // "hello-world"
 * slugify("Crème brûlée") // "creme-brulee"
 * slugify("!!!") // "untitled-post"
 */
export function slugify(
  title: string,
  maxLength = 50,
  fallback = "untitled-post",
): string {
  const slug = title
    .normalize("NFKD")
    .replace(/[^A-Za-z0-9_\s-]/g, "") // Drops combining marks left by NFKD too
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .toLowerCase()
    .slice(0, maxLength)
    .replace(/-+$/, "");

  return slug || fallback;
}
