/**
 * continuous notes — one container note whose body lines are independent
 * entries (a list of quotes, one-line thoughts…). each non-blank body line
 * after the title line becomes its own note carrying a copy of the container
 * header.
 *
 * numbering counts down while walking forward: with K entries the first body
 * line is "- K" and the last is "- 1". published sites already link to these
 * slugs, so the direction stays.
 */

import { HEADER_LINE_PATTERN, extractHeaderFields } from "./header.js";
import { partitionNote } from "./splitter.js";
import type { NoteLines } from "./schema.js";

export interface ContinuousOptions {
  /** tag marking a container, e.g. `scope:list` */
  tag: string;
  /** what the tag becomes in every expanded note, e.g. `list` */
  replacement: string;
  pattern?: RegExp;
}

export function isContinuousNote(lines: readonly string[], tag: string, pattern: RegExp = HEADER_LINE_PATTERN): boolean {
  return extractHeaderFields(lines, pattern).tags.includes(tag);
}

export function replaceTagInHeader(header: readonly string[], tag: string, replacement: string): NoteLines {
  return header.map((line) => (line.includes(tag) ? line.replaceAll(tag, replacement) : line));
}

/** appends `suffix` to the Title value inside the header text itself */
export function retitleHeader(header: readonly string[], suffix: string, pattern: RegExp = HEADER_LINE_PATTERN): NoteLines {
  return header.map((line) => {
    const match = pattern.exec(line);
    if (!match || (match[1] ?? "").trim() !== "Title") return line;

    const value = (match[2] ?? "").trim();
    if (value === "") return line;
    return line.replaceAll(value, () => `${value}${suffix}`);
  });
}

export function expandContinuousNote(lines: readonly string[], options: ContinuousOptions): NoteLines[] {
  const pattern = options.pattern ?? HEADER_LINE_PATTERN;
  const { header, body } = partitionNote(lines);
  const rewritten = replaceTagInHeader(header, options.tag, options.replacement);

  // first body line is the note title, heading marker or not
  const entries = body.slice(1).filter((line) => line.trim() !== "");

  return entries.map((entry, i) => [
    ...retitleHeader(rewritten, ` - ${entries.length - i}`, pattern),
    "",
    entry.trim(),
  ]);
}
