/**
 * notes-to-ssg validate — check an existing dump file for scope tag completeness.
 */

import { parseArgs } from "util";
import { readDump, validateDump } from "../dump.js";
import { loadConfigOrExit } from "./context.js";

export async function run(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      tag: { type: "string", short: "t" },
    },
    allowPositionals: true,
    strict: true,
  });

  const file = positionals[0];
  if (!file) {
    console.error("usage: notes-to-ssg validate <dump-file> [--tag <scope-tag>]");
    process.exit(1);
  }

  const config = loadConfigOrExit(values.tag ? { ...process.env, TAG_TO_DOWNLOAD: values.tag } : process.env);
  const scopeTag = config.scope.tag;

  const lines = await readDump(file);
  if (lines.isErr()) {
    console.error(`error: ${lines.error.message}`);
    process.exit(1);
  }

  const validation = validateDump(lines.value, scopeTag);
  if (validation.isErr()) {
    console.error(`validation failed: ${validation.error.message}`);
    process.exit(1);
  }

  console.log(`validation successful: all ${validation.value.tagLines} notes have the required tag '${scopeTag}'`);
}
