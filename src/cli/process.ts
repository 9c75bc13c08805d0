/**
 * notes-to-ssg process — turn an existing dump file into notes, no fetching.
 */

import { parseArgs } from "util";
import { resolve } from "path";
import { existsSync, mkdirSync } from "fs";
import { readDump } from "../dump.js";
import { processDump, reconcile } from "../pipeline.js";
import { createFileNotePersistenceAdapter } from "../persist/filesystem.js";
import { loadConfigOrExit } from "./context.js";

export async function run(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      output: { type: "string", short: "o" },
      tag: { type: "string", short: "t" },
    },
    allowPositionals: true,
    strict: true,
  });

  const file = positionals[0];
  if (!file) {
    console.error("usage: notes-to-ssg process <dump-file> [--output <dir>] [--tag <scope-tag>]");
    process.exit(1);
  }

  const config = loadConfigOrExit(values.tag ? { ...process.env, TAG_TO_DOWNLOAD: values.tag } : process.env);
  const outputDir = values.output ? resolve(values.output) : config.paths.outputDir;
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const lines = await readDump(file);
  if (lines.isErr()) {
    console.error(`error: ${lines.error.message}`);
    process.exit(1);
  }

  const result = await processDump(lines.value, {
    config,
    persistence: createFileNotePersistenceAdapter({ outputDir }),
  });
  if (result.isErr()) {
    console.error(`error: ${result.error.message}`);
    process.exit(1);
  }

  const report = result.value;
  console.log(
    `processed ${report.outputCount}/${report.inputCount} notes (${report.written} written, ${report.unchanged} unchanged, ${report.failures.length} skipped)`,
  );

  const reconciled = reconcile(report);
  if (reconciled.isErr()) {
    console.error(`error: ${reconciled.error.message}`);
    process.exit(1);
  }
}
