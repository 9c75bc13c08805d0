/**
 * note pipeline — dump lines in, one markdown file per note out.
 *
 * per-note problems (no title, bad date, missing template) skip that note and
 * are reported; they are not counted as output, so the reconciliation check
 * turns them into a failed cycle. a write error stops the batch immediately.
 */

import { ok, err, ResultAsync, type Result } from "neverthrow";
import { extractHeaderFields, normalizeDate } from "./header.js";
import { splitNotes, partitionNote, dropTitleLine } from "./splitter.js";
import { isContinuousNote, expandContinuousNote } from "./continuous.js";
import { loadTemplate, synthesizeHeader } from "./frontmatter.js";
import { toSlug, toFilename } from "./slug.js";
import type { ResolvedConfig } from "./config.js";
import type { NoteError, NoteLines, NoteWriteOutcome } from "./schema.js";
import type { NotePersistenceAdapter, NotePersistenceError } from "./persist/index.js";

export interface PipelineDependencies {
  config: Pick<ResolvedConfig, "scope" | "site">;
  persistence: NotePersistenceAdapter;
}

export interface RenderedNote {
  title: string;
  filename: string;
  content: string;
  warnings: string[];
}

export interface ProcessedNote {
  title: string;
  filename: string;
  outcome: NoteWriteOutcome;
}

export interface ProcessReport {
  /** notes after continuous expansion, containers excluded */
  inputCount: number;
  outputCount: number;
  written: number;
  unchanged: number;
  failures: NoteError[];
  startFileCount: number;
  endFileCount: number;
}

export type ReconcileError = { _tag: "sync.reconcile"; message: string };

export function renderNote(
  lines: readonly string[],
  config: PipelineDependencies["config"],
): Result<RenderedNote, NoteError> {
  const fields = extractHeaderFields(lines);
  const title = fields.title;

  if (toSlug(title) === "") {
    const firstLine = lines.find((line) => line.trim() !== "") ?? "";
    return err({ _tag: "note.title", message: `note has no usable title (starts with "${firstLine}")` });
  }

  const date = normalizeDate(fields.date, title);
  if (date.isErr()) return err(date.error);

  const template = loadTemplate(config.site.templatesDir, config.site.type);
  if (template.isErr()) {
    return err({
      _tag: "note.template",
      title,
      path: template.error.path,
      message: template.error.message,
    });
  }

  const header = synthesizeHeader(
    template.value,
    {
      title,
      subtitle: "",
      author: config.site.author,
      date: date.value,
      tags: fields.tags,
    },
    {
      scopeTag: config.scope.tag,
      unlistedTags: config.scope.unlistedTags,
      summarySubstitutions: config.scope.summarySubstitutions,
    },
  );

  const body = dropTitleLine(partitionNote(lines).body);
  const content = [...header.lines, ...body].map((line) => `${line}\n`).join("");

  return ok({ title, filename: toFilename(title), content, warnings: header.warnings });
}

/** containers are replaced by their expansions, which run after every regular note */
export function collectNotes(lines: readonly string[], config: Pick<ResolvedConfig, "scope">): NoteLines[] {
  const regular: NoteLines[] = [];
  const expanded: NoteLines[] = [];
  const continuous = config.scope.continuous;

  for (const note of splitNotes(lines)) {
    if (continuous && isContinuousNote(note, continuous.tag)) {
      const parts = expandContinuousNote(note, continuous);
      console.log(`split continuous note into ${parts.length} notes`);
      expanded.push(...parts);
      continue;
    }
    regular.push(note);
  }

  return [...regular, ...expanded];
}

export function processNote(
  lines: readonly string[],
  deps: PipelineDependencies,
): ResultAsync<ProcessedNote, NoteError | NotePersistenceError> {
  return new ResultAsync(
    (async (): Promise<Result<ProcessedNote, NoteError | NotePersistenceError>> => {
      const rendered = renderNote(lines, deps.config);
      if (rendered.isErr()) return err(rendered.error);

      const { title, filename, content, warnings } = rendered.value;
      for (const warning of warnings) {
        console.warn(`warning: '${title}': ${warning}, carrying on`);
      }

      const written = await deps.persistence.write(filename, content);
      if (written.isErr()) return err(written.error);

      return ok({ title, filename, outcome: written.value });
    })(),
  );
}

function isNoteError(e: NoteError | NotePersistenceError): e is NoteError {
  return e._tag.startsWith("note.") && !e._tag.startsWith("note.persist");
}

export function processDump(
  lines: readonly string[],
  deps: PipelineDependencies,
): ResultAsync<ProcessReport, NotePersistenceError> {
  return new ResultAsync(
    (async (): Promise<Result<ProcessReport, NotePersistenceError>> => {
      const start = await deps.persistence.countFiles();
      if (start.isErr()) return err(start.error);

      const notes = collectNotes(lines, deps.config);
      const report: ProcessReport = {
        inputCount: notes.length,
        outputCount: 0,
        written: 0,
        unchanged: 0,
        failures: [],
        startFileCount: start.value,
        endFileCount: start.value,
      };

      for (const note of notes) {
        const result = await processNote(note, deps);
        if (result.isErr()) {
          const error = result.error;
          if (!isNoteError(error)) return err(error);

          console.error(`skipping note: ${error.message}`);
          report.failures.push(error);
          continue;
        }

        report.outputCount++;
        if (result.value.outcome === "written") report.written++;
        else report.unchanged++;
      }

      const end = await deps.persistence.countFiles();
      if (end.isErr()) return err(end.error);
      report.endFileCount = end.value;

      return ok(report);
    })(),
  );
}

export function reconcile(report: ProcessReport): Result<void, ReconcileError> {
  if (report.inputCount !== report.outputCount) {
    return err({
      _tag: "sync.reconcile",
      message: `the number of notes (${report.inputCount}) does not match the number of outputted files (${report.outputCount})`,
    });
  }
  if (report.endFileCount < report.startFileCount) {
    return err({
      _tag: "sync.reconcile",
      message: `output directory shrank from ${report.startFileCount} to ${report.endFileCount} files`,
    });
  }
  return ok(undefined);
}
