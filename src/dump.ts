/**
 * dump reading and validation.
 *
 * sncli mixes its own sync log into stdout, so those lines are dropped before
 * anything else looks at the dump. a dump is only trusted when every `Tags:`
 * header line carries the scope tag; sncli sometimes returns a partial sync
 * where notes outside the scope leak in or the tag list is missing entirely.
 */

import { readFile } from "fs/promises";
import { ok, err, ResultAsync, type Result } from "neverthrow";

export const NOISE_LINES = [
  "sncli database doesn't exist",
  "Starting full sync",
  "Synced new note from server",
  "Saved note to disk",
  "Full sync completed",
] as const;

export const DUMP_FILENAME = "sn_dump.md";

export type DumpError =
  | { _tag: "dump.spawn"; command: string; message: string }
  | { _tag: "dump.exit"; command: string; exitCode: number | null; message: string }
  | { _tag: "dump.read"; path: string; message: string }
  | { _tag: "dump.validate"; message: string };

export interface DumpValidation {
  tagLines: number;
}

export function stripNoise(text: string): string[] {
  return text.split("\n").filter((line) => !NOISE_LINES.some((noise) => line.includes(noise)));
}

export function isTagsLine(line: string): boolean {
  return line.includes("|") && line.includes("Tags:");
}

export function validateDump(lines: readonly string[], scopeTag: string): Result<DumpValidation, DumpError> {
  let tagLines = 0;

  for (const line of lines) {
    if (!isTagsLine(line)) continue;
    tagLines++;
    if (!line.includes(scopeTag)) {
      return err({
        _tag: "dump.validate",
        message: `did not find required tag ${scopeTag} in note with tags line ${line}`,
      });
    }
  }

  if (tagLines < 1) {
    return err({ _tag: "dump.validate", message: "did not find any tags line in dumped notes" });
  }

  return ok({ tagLines });
}

export function readDump(path: string): ResultAsync<string[], DumpError> {
  return ResultAsync.fromPromise(
    readFile(path, "utf-8"),
    (e: unknown): DumpError => ({
      _tag: "dump.read",
      path,
      message: e instanceof Error ? e.message : String(e),
    }),
  ).map(stripNoise);
}
