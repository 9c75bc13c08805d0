import type { ResultAsync } from "neverthrow";
import type { NoteWriteOutcome } from "../schema.js";

export type NotePersistenceError =
  | { _tag: "note.persist.write"; path: string; message: string }
  | { _tag: "note.persist.count"; path: string; message: string };

export interface NotePersistenceAdapter {
  readonly outputDir: string;
  /** no-op when the file already holds exactly `content` */
  write(filename: string, content: string): ResultAsync<NoteWriteOutcome, NotePersistenceError>;
  /** entries named like `*.*` in the output directory */
  countFiles(): ResultAsync<number, NotePersistenceError>;
}
