/**
 * file-based note output.
 * layout: one `{slug}.md` per note, flat, in the output directory.
 * writes go to a temp file beside the target and are renamed over it.
 */

import { existsSync, readdirSync, readFileSync, writeFileSync, renameSync, rmSync } from "fs";
import { join } from "path";
import { ResultAsync, errAsync } from "neverthrow";
import { nanoid } from "nanoid";
import type { NoteWriteOutcome } from "../schema.js";
import type { NotePersistenceAdapter, NotePersistenceError } from "./index.js";

interface FileAdapterOptions {
  outputDir: string;
}

function isPlainFilename(filename: string): boolean {
  return filename.length > 0 && !filename.includes("/") && !filename.includes("\\") && filename !== "." && filename !== "..";
}

export function createFileNotePersistenceAdapter(options: FileAdapterOptions): NotePersistenceAdapter {
  const { outputDir } = options;

  return {
    outputDir,

    write(filename: string, content: string): ResultAsync<NoteWriteOutcome, NotePersistenceError> {
      const filePath = join(outputDir, filename);

      if (!isPlainFilename(filename)) {
        return errAsync({
          _tag: "note.persist.write",
          path: filePath,
          message: `invalid note filename: ${filename}`,
        });
      }

      return ResultAsync.fromPromise(
        (async (): Promise<NoteWriteOutcome> => {
          if (existsSync(filePath)) {
            const existing = readFileSync(filePath, "utf-8");
            if (existing === content) {
              console.log(`'${filePath}' already exists with the same content`);
              return "unchanged";
            }
            console.log(`content differs from '${filePath}', overwriting`);
          }

          const tempPath = join(outputDir, `.${filename}.tmp.${process.pid}.${nanoid(8)}`);
          try {
            writeFileSync(tempPath, content, "utf-8");
            renameSync(tempPath, filePath);
          } catch (e) {
            rmSync(tempPath, { force: true });
            throw e;
          }

          console.log(`'${filePath}' written`);
          return "written";
        })(),
        (e: unknown): NotePersistenceError => ({
          _tag: "note.persist.write",
          path: filePath,
          message: e instanceof Error ? e.message : String(e),
        }),
      );
    },

    countFiles(): ResultAsync<number, NotePersistenceError> {
      return ResultAsync.fromPromise(
        (async () => readdirSync(outputDir).filter((name) => name.includes(".")).length)(),
        (e: unknown): NotePersistenceError => ({
          _tag: "note.persist.count",
          path: outputDir,
          message: e instanceof Error ? e.message : String(e),
        }),
      );
    },
  };
}
