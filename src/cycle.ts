/**
 * one sync cycle — wires the sync machine to real I/O and turns its final
 * state into logs, alerts and dump-file cleanup.
 *
 * the dump file is only deleted after a completed cycle; a failed cycle leaves
 * it in place for inspection.
 */

import { existsSync, mkdirSync, rmSync } from "fs";
import { join } from "path";
import { fromPromise } from "xstate";
import type { ResolvedConfig } from "./config.js";
import { DUMP_FILENAME, readDump, validateDump } from "./dump.js";
import { processDump, type ProcessReport } from "./pipeline.js";
import type { NotePersistenceAdapter } from "./persist/index.js";
import type { SyncAdapters } from "./adapters/index.js";
import {
  syncMachine,
  runSyncMachine,
  type DumpActorInput,
  type ValidateActorInput,
  type WaitActorInput,
  type ProcessActorInput,
  type ValidationOutcome,
  type SyncError,
} from "./machines/sync.js";

export const APP_NAME = "notes-to-ssg";

export interface CycleDependencies {
  config: ResolvedConfig;
  adapters: SyncAdapters;
  persistence: NotePersistenceAdapter;
}

export type CycleResult =
  | { status: "completed"; attempts: number; report: ProcessReport }
  | { status: "failed"; attempts: number; error: SyncError; report?: ProcessReport };

export function dumpPath(config: Pick<ResolvedConfig, "paths">): string {
  return join(config.paths.inputDir, DUMP_FILENAME);
}

export function ensureDirectories(config: Pick<ResolvedConfig, "paths">): void {
  for (const dir of [config.paths.inputDir, config.paths.outputDir]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

export function buildSyncMachine(deps: CycleDependencies) {
  const { config, adapters, persistence } = deps;
  const inputPath = dumpPath(config);

  return syncMachine.provide({
    actors: {
      dump: fromPromise<void, DumpActorInput>(async ({ input }) => {
        console.log(`attempting to dump notes (attempt ${input.attempt + 1}/${input.maxRetries})`);
        const result = await adapters.dump(input.scopeTag, inputPath);
        if (result.isErr()) {
          console.error(`dump attempt ${input.attempt + 1} failed: ${result.error.message}`);
          throw result.error;
        }
        console.log("dumping of notes was successful");
      }),

      validate: fromPromise<ValidationOutcome, ValidateActorInput>(async ({ input }) => {
        const lines = await readDump(inputPath);
        if (lines.isErr()) {
          console.error(`input file ${inputPath} not readable on attempt ${input.attempt + 1}: ${lines.error.message}`);
          throw lines.error;
        }

        const validation = validateDump(lines.value, input.scopeTag);
        if (validation.isErr()) {
          console.error(`validation failed: ${validation.error.message}`);
          return { valid: false, message: validation.error.message };
        }

        console.log(
          `validation successful: all ${validation.value.tagLines} notes have the required tag '${input.scopeTag}'`,
        );
        return { valid: true, lines: lines.value, tagLines: validation.value.tagLines };
      }),

      wait: fromPromise<void, WaitActorInput>(async ({ input }) => {
        console.log(
          `retrying in ${input.seconds.toFixed(2)} seconds... (attempt ${input.attempt + 2}/${input.maxRetries})`,
        );
        await adapters.sleep(input.seconds * 1000);
      }),

      process: fromPromise<ProcessReport, ProcessActorInput>(async ({ input }) => {
        const result = await processDump(input.lines, { config, persistence });
        if (result.isErr()) throw result.error;
        return result.value;
      }),
    },
  });
}

async function alert(adapters: SyncAdapters, title: string, message: string): Promise<void> {
  const sent = await adapters.notify(title, message);
  if (sent.isErr()) {
    console.error(`failed to send notification: ${sent.error.message}`);
  }
}

export async function runCycle(deps: CycleDependencies): Promise<CycleResult> {
  const { config, adapters } = deps;

  const snapshot = await runSyncMachine(buildSyncMachine(deps), {
    scopeTag: config.scope.tag,
    maxRetries: config.retry.maxRetries,
    backoff: {
      baseDelaySeconds: config.retry.baseDelaySeconds,
      maxDelaySeconds: config.retry.maxDelaySeconds,
    },
  });

  const { context } = snapshot;
  const attempts = context.attempt + 1;

  if (snapshot.value !== "completed" || !context.report) {
    const error: SyncError = context.error ?? { _tag: "sync.process", message: "sync ended without a report" };
    const message = `FATAL: ${error.message}`;
    console.error(message);
    await alert(adapters, `${APP_NAME} FATAL error`, message);
    return { status: "failed", attempts, error, ...(context.report ? { report: context.report } : {}) };
  }

  const report = context.report;
  const summary = `number of parsed vs outputted notes matches: ${report.inputCount} notes`;
  if (config.debug) {
    const message = `DEBUG: ${summary}`;
    console.log(message);
    await alert(adapters, `${APP_NAME} successful`, message);
  } else {
    console.log(summary);
  }

  console.log("deleting temporary raw notes input file");
  rmSync(dumpPath(config), { force: true });

  return { status: "completed", attempts, report };
}
