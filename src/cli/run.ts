/**
 * notes-to-ssg run — a single fetch/validate/process cycle.
 */

import { parseArgs } from "util";
import { runCycle } from "../cycle.js";
import { loadConfigOrExit, createCycleDependencies } from "./context.js";

export async function run(args: string[]) {
  parseArgs({ args, options: {}, strict: true });

  const config = loadConfigOrExit();
  const result = await runCycle(createCycleDependencies(config));

  if (result.status === "failed") {
    process.exit(1);
  }
}
