/**
 * notes-to-ssg watch — run a cycle, sleep the polling interval, repeat.
 * the first failed cycle exits 1; the supervisor restarts the process.
 */

import { parseArgs } from "util";
import { APP_NAME, runCycle } from "../cycle.js";
import { loadConfigOrExit, createCycleDependencies } from "./context.js";

export async function run(args: string[]) {
  parseArgs({ args, options: {}, strict: true });

  const config = loadConfigOrExit();
  const deps = createCycleDependencies(config);
  const interval = config.schedule.pollingIntervalSeconds;

  for (;;) {
    const result = await runCycle(deps);
    if (result.status === "failed") {
      process.exit(1);
    }

    console.log(`${APP_NAME} ran successfully! sleeping ${interval} seconds before next cycle`);
    await deps.adapters.sleep(interval * 1000);
  }
}
