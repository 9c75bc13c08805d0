/**
 * slug derivation — title to URL-safe filename stem.
 * word characters are unicode-aware, so accented titles keep their letters.
 */

const NON_SLUG_CHARS = /[^\p{L}\p{N}\p{M}_\s-]/gu;

export function toSlug(title: string): string {
  return title
    .replace(NON_SLUG_CHARS, "")
    .trim()
    .replaceAll(" ", "-")
    .replace(/-+/g, "-")
    .toLowerCase();
}

export function toFilename(title: string): string {
  return `${toSlug(title)}.md`;
}
