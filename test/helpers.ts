import { mkdtempSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

export const RULE = "+--------------------------------------------------------------+";

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `notes-to-ssg-${prefix}-`));
}

export interface DumpedNoteFields {
  title: string;
  date?: string;
  tags?: string;
  body?: string[];
}

/** lines of one dumped note, header boxed by rules like sncli prints it */
export function dumpedNote(note: DumpedNoteFields): string[] {
  return [
    RULE,
    `| Title: ${note.title} |`,
    `| Date: ${note.date ?? "Fri, 01 Sep 2023 02:33:35"} |`,
    ...(note.tags !== undefined ? [`| Tags: ${note.tags} |`] : []),
    RULE,
    ...(note.body ?? []),
  ];
}
