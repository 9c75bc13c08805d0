/**
 * note splitter — cuts a flat dump into notes on horizontal-rule delimiters.
 *
 * each dumped note looks like:
 *
 *   +------------------+   ← header start
 *   | Title: foo       |
 *   | Tags: a,b        |
 *   +------------------+   ← header end
 *   body…
 *
 * per note the splitter walks awaitingStart → inHeader → inBody. a delimiter
 * seen while inBody is the next note's header start. the dump has no trailing
 * delimiter, so the last note is flushed at end of input.
 */

import type { NoteLines, NoteParts } from "./schema.js";

export type NoteSection = "awaitingStart" | "inHeader" | "inBody";

const DELIMITER_SUFFIX = "-+";

export function isDelimiter(line: string): boolean {
  return line.endsWith(DELIMITER_SUFFIX);
}

/** section after a delimiter; inBody is not listed because it starts a new note */
const ON_DELIMITER: Record<Exclude<NoteSection, "inBody">, NoteSection> = {
  awaitingStart: "inHeader",
  inHeader: "inBody",
};

export function splitNotes(lines: readonly string[]): NoteLines[] {
  const notes: NoteLines[] = [];
  let current: NoteLines = [];
  let section: NoteSection = "awaitingStart";

  for (const line of lines) {
    if (isDelimiter(line)) {
      if (section === "inBody") {
        notes.push(current);
        current = [];
        section = "inHeader";
      } else {
        section = ON_DELIMITER[section];
      }
    }
    current.push(line);
  }

  notes.push(current);
  return notes;
}

/**
 * header region = everything up to and including the header end delimiter.
 * a note without a closing delimiter is all header.
 */
export function partitionNote(lines: readonly string[]): NoteParts {
  let section: NoteSection = "awaitingStart";

  for (let i = 0; i < lines.length; i++) {
    if (!isDelimiter(lines[i] ?? "")) continue;

    if (section === "awaitingStart") {
      section = "inHeader";
    } else {
      return { header: lines.slice(0, i + 1), body: lines.slice(i + 1) };
    }
  }

  if (section === "awaitingStart") {
    return { header: [], body: [...lines] };
  }
  return { header: [...lines], body: [] };
}

/** a leading `# title` line repeats the front matter title and is dropped */
export function dropTitleLine(body: readonly string[]): NoteLines {
  const [first, ...rest] = body;
  if (first !== undefined && first.startsWith("# ")) return rest;
  return [...body];
}
