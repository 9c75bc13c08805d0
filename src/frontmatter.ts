/**
 * front matter synthesis — fills a site template with note fields.
 *
 * rendering never fails: a field that cannot be computed or a placeholder the
 * template asks for but nobody supplies is reported as a warning and its token
 * is left in place. one malformed note should not sink the batch.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { ok, err, type Result } from "neverthrow";
import { toSlug } from "./slug.js";
import type { SummarySubstitution } from "./config.js";

/** always stripped from rendered categories alongside the scope tag */
export const IGNORED_TAG = "blog";

export const UNCATEGORIZED = "Uncategorized";

const PLACEHOLDER_PATTERN = /\{\{(\w+)\}\}/g;

export interface FrontmatterFields {
  title: string;
  subtitle: string;
  author: string;
  /** already normalized, see normalizeDate() */
  date: string;
  tags: readonly string[];
}

export interface FrontmatterOptions {
  scopeTag: string;
  unlistedTags: readonly string[];
  summarySubstitutions: readonly SummarySubstitution[];
}

export interface SynthesizedHeader {
  lines: string[];
  warnings: string[];
}

export type TemplateError = { _tag: "template.read"; path: string; message: string };

export function templatePath(templatesDir: string, siteType: string): string {
  return join(templatesDir, `${siteType}.md`);
}

/** read fresh on every call; a final newline leaves a blank line before the body */
export function loadTemplate(templatesDir: string, siteType: string): Result<string, TemplateError> {
  const path = templatePath(templatesDir, siteType);
  try {
    return ok(readFileSync(path, "utf-8"));
  } catch (e) {
    return err({
      _tag: "template.read",
      path,
      message: e instanceof Error ? e.message : String(e),
    });
  }
}

/** removes every occurrence of every ignored tag, keeping order */
export function removeTags(tags: readonly string[], ignored: readonly string[]): string[] {
  return tags.filter((tag) => !ignored.includes(tag));
}

export function isUnlisted(tags: readonly string[], unlistedTags: readonly string[]): boolean {
  return tags.some((tag) => unlistedTags.includes(tag));
}

/** first tag bare, the rest as a yaml list continuing the template's `  - {{tag}}` line */
export function renderTags(tags: readonly string[]): string {
  const [first, ...rest] = tags;
  if (first === undefined) return UNCATEGORIZED;
  return [first, ...rest.map((tag) => `  - ${tag}`)].join("\n");
}

/**
 * first substitution whose pattern is one of the tags rewrites the title.
 * an empty summary tells the site to skip it. throws on an invalid pattern.
 */
export function renderSummary(
  title: string,
  tags: readonly string[],
  substitutions: readonly SummarySubstitution[],
): string {
  const substitution = substitutions.find((s) => tags.includes(s.pattern));
  if (!substitution) return "";
  return title.replace(new RegExp(substitution.pattern, "gi"), substitution.replacement);
}

export function synthesizeHeader(
  template: string,
  fields: FrontmatterFields,
  options: FrontmatterOptions,
): SynthesizedHeader {
  const warnings: string[] = [];
  const categories = removeTags(fields.tags, [options.scopeTag, IGNORED_TAG]);

  const producers: Record<string, () => string> = {
    title: () => fields.title,
    subtitle: () => fields.subtitle,
    author: () => fields.author,
    date: () => fields.date,
    slug: () => toSlug(fields.title),
    unlisted: () => String(isUnlisted(fields.tags, options.unlistedTags)),
    tag: () => renderTags(categories),
    summary: () => renderSummary(fields.title, categories, options.summarySubstitutions),
  };

  const values = new Map<string, string>();
  for (const [name, produce] of Object.entries(producers)) {
    try {
      values.set(name, produce());
    } catch (e) {
      warnings.push(`failed to render {{${name}}}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  const missing = new Set<string>();
  const rendered = template.replace(PLACEHOLDER_PATTERN, (token: string, name: string) => {
    const value = values.get(name);
    if (value !== undefined) return value;
    if (!Object.hasOwn(producers, name)) missing.add(name);
    return token;
  });

  for (const name of missing) {
    warnings.push(`template field {{${name}}} has no value`);
  }

  return { lines: rendered.split("\n"), warnings };
}
