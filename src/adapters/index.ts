/**
 * sync adapters — I/O boundaries for a sync cycle.
 * per INJECT AT THE BOUNDARY: adapter interfaces declared here, implementations wrap real I/O.
 */

import { setTimeout as sleep } from "timers/promises";
import type { ResultAsync } from "neverthrow";
import type { ResolvedConfig } from "../config.js";
import type { DumpError } from "../dump.js";
import { runDumpCommand } from "./dump.js";
import { sendNotification, type NotifyError } from "./notify.js";

export interface SyncAdapters {
  /** writes the dump for `scopeTag` to `outputPath` */
  dump(scopeTag: string, outputPath: string): ResultAsync<void, DumpError>;
  notify(title: string, message: string): ResultAsync<void, NotifyError>;
  sleep(ms: number): Promise<void>;
}

export function createSyncAdapters(config: Pick<ResolvedConfig, "dump" | "notify">): SyncAdapters {
  return {
    dump: (scopeTag, outputPath) =>
      runDumpCommand({
        command: config.dump.command,
        args: config.dump.args,
        scopeTag,
        outputPath,
      }),
    notify: (title, message) => sendNotification(config.notify, title, message),
    sleep: async (ms) => {
      await sleep(ms);
    },
  };
}
