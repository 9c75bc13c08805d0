/**
 * shared note types.
 *
 * a note is kept as its raw dump lines for its whole lifetime. fields are
 * derived from the header region on demand, so a rewritten header (continuous
 * expansion) is the single source of truth for title and tags.
 */

export type NoteLines = string[];

export interface HeaderFields {
  title: string;
  /** verbatim `Date` value, normalized later */
  date: string;
  /** `Tags` split on commas, in order, untrimmed */
  tags: string[];
}

export interface NoteParts {
  header: NoteLines;
  body: NoteLines;
}

export type NoteError =
  | { _tag: "note.title"; message: string }
  | { _tag: "note.date"; title: string; message: string }
  | { _tag: "note.template"; title: string; path: string; message: string };

export type NoteWriteOutcome = "written" | "unchanged";
