/**
 * sync machine — fetches the dump, validates it, processes it, reconciles counts.
 *
 * per INJECT AT THE BOUNDARY: every side effect is an actor provided via machine.provide().
 * one retry budget covers both dump failures and validation failures; a failed
 * validation throws the dump away and fetches again from scratch.
 *
 * states: fetching → validating → processing → reconciling → completed | failed
 *         fetching/validating ─(failure)→ retrying → backingOff → fetching
 */

import { setup, assign, fromPromise, createActor, type SnapshotFrom } from "xstate";
import { backoffDelaySeconds, type BackoffOptions } from "../backoff.js";
import { describeError, errorTag } from "../errors.js";
import { reconcile, type ProcessReport } from "../pipeline.js";

export type SyncStage = "fetch" | "validate";

export interface SyncFailure {
  stage: SyncStage;
  message: string;
}

export interface SyncError {
  _tag: "sync.fetch" | "sync.validate" | "sync.write" | "sync.process" | "sync.reconcile" | "sync.wait";
  message: string;
}

export type ValidationOutcome =
  | { valid: true; lines: string[]; tagLines: number }
  | { valid: false; message: string };

export interface SyncContext {
  scopeTag: string;
  maxRetries: number;
  backoff: BackoffOptions;
  /** 0-based index of the current fetch attempt */
  attempt: number;
  delaySeconds: number;
  lines: string[];
  tagLines: number;
  lastFailure?: SyncFailure;
  report?: ProcessReport;
  error?: SyncError;
}

export interface SyncInput {
  scopeTag: string;
  maxRetries: number;
  backoff: BackoffOptions;
}

export interface DumpActorInput {
  scopeTag: string;
  attempt: number;
  maxRetries: number;
}

export interface ValidateActorInput {
  scopeTag: string;
  attempt: number;
}

export interface WaitActorInput {
  seconds: number;
  attempt: number;
  maxRetries: number;
}

export interface ProcessActorInput {
  lines: string[];
}

const dumpActor = fromPromise<void, DumpActorInput>(async () => {
  throw new Error("dump: not provided via machine.provide()");
});

const validateActor = fromPromise<ValidationOutcome, ValidateActorInput>(async () => {
  throw new Error("validate: not provided via machine.provide()");
});

const waitActor = fromPromise<void, WaitActorInput>(async () => {
  throw new Error("wait: not provided via machine.provide()");
});

const processActor = fromPromise<ProcessReport, ProcessActorInput>(async () => {
  throw new Error("process: not provided via machine.provide()");
});

function exhaustedError(context: SyncContext): SyncError {
  const reason = context.lastFailure?.message ?? "unknown failure";
  if (context.lastFailure?.stage === "validate") {
    return {
      _tag: "sync.validate",
      message: `dumped notes don't all have the ${context.scopeTag} tag after ${context.maxRetries} attempts: ${reason}`,
    };
  }
  return {
    _tag: "sync.fetch",
    message: `failed to dump notes after ${context.maxRetries} attempts: ${reason}`,
  };
}

export const syncMachine = setup({
  types: {
    context: {} as SyncContext,
    input: {} as SyncInput,
  },
  actors: {
    dump: dumpActor,
    validate: validateActor,
    wait: waitActor,
    process: processActor,
  },
  actions: {
    assignFailure: assign({
      lastFailure: (_, params: SyncFailure) => params,
    }),
    assignDump: assign({
      lines: (_, params: { lines: string[]; tagLines: number }) => params.lines,
      tagLines: (_, params: { lines: string[]; tagLines: number }) => params.tagLines,
    }),
    assignDelay: assign({
      delaySeconds: ({ context }) => backoffDelaySeconds(context.attempt, context.backoff),
    }),
    incrementAttempt: assign({
      attempt: ({ context }) => context.attempt + 1,
    }),
    assignReport: assign({
      report: (_, params: { report: ProcessReport }) => params.report,
    }),
    assignError: assign({
      error: (_, params: SyncError) => params,
    }),
  },
  guards: {
    hasRetriesLeft: ({ context }) => context.attempt + 1 < context.maxRetries,
    isValid: (_, params: { outcome: ValidationOutcome }) => params.outcome.valid,
    reconciles: ({ context }) => context.report !== undefined && reconcile(context.report).isOk(),
  },
}).createMachine({
  id: "sync",
  initial: "fetching",
  context: ({ input }) => ({
    scopeTag: input.scopeTag,
    maxRetries: input.maxRetries,
    backoff: input.backoff,
    attempt: 0,
    delaySeconds: 0,
    lines: [],
    tagLines: 0,
  }),

  states: {
    fetching: {
      invoke: {
        id: "dump",
        src: "dump",
        input: ({ context }) => ({
          scopeTag: context.scopeTag,
          attempt: context.attempt,
          maxRetries: context.maxRetries,
        }),
        onDone: "validating",
        onError: {
          target: "retrying",
          actions: {
            type: "assignFailure",
            params: ({ event }) => ({ stage: "fetch" as const, message: describeError(event.error) }),
          },
        },
      },
    },

    validating: {
      invoke: {
        id: "validate",
        src: "validate",
        input: ({ context }) => ({ scopeTag: context.scopeTag, attempt: context.attempt }),
        onDone: [
          {
            guard: {
              type: "isValid",
              params: ({ event }) => ({ outcome: event.output }),
            },
            target: "processing",
            actions: {
              type: "assignDump",
              params: ({ event }) => {
                const outcome = event.output;
                return outcome.valid
                  ? { lines: outcome.lines, tagLines: outcome.tagLines }
                  : { lines: [], tagLines: 0 };
              },
            },
          },
          {
            target: "retrying",
            actions: {
              type: "assignFailure",
              params: ({ event }) => {
                const outcome = event.output;
                return { stage: "validate" as const, message: outcome.valid ? "" : outcome.message };
              },
            },
          },
        ],
        onError: {
          target: "retrying",
          actions: {
            type: "assignFailure",
            params: ({ event }) => ({ stage: "validate" as const, message: describeError(event.error) }),
          },
        },
      },
    },

    retrying: {
      always: [
        {
          guard: "hasRetriesLeft",
          target: "backingOff",
        },
        {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ context }) => exhaustedError(context),
          },
        },
      ],
    },

    backingOff: {
      entry: "assignDelay",
      invoke: {
        id: "wait",
        src: "wait",
        input: ({ context }) => ({
          seconds: context.delaySeconds,
          attempt: context.attempt,
          maxRetries: context.maxRetries,
        }),
        onDone: {
          target: "fetching",
          actions: "incrementAttempt",
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({ _tag: "sync.wait" as const, message: describeError(event.error) }),
          },
        },
      },
    },

    processing: {
      invoke: {
        id: "process",
        src: "process",
        input: ({ context }) => ({ lines: context.lines }),
        onDone: {
          target: "reconciling",
          actions: {
            type: "assignReport",
            params: ({ event }) => ({ report: event.output }),
          },
        },
        onError: {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ event }) => ({
              _tag: errorTag(event.error) === "note.persist.write" ? ("sync.write" as const) : ("sync.process" as const),
              message: describeError(event.error),
            }),
          },
        },
      },
    },

    reconciling: {
      always: [
        {
          guard: "reconciles",
          target: "completed",
        },
        {
          target: "failed",
          actions: {
            type: "assignError",
            params: ({ context }) => ({
              _tag: "sync.reconcile" as const,
              message: context.report
                ? reconcile(context.report).match(
                    () => "",
                    (e) => e.message,
                  )
                : "no processing report",
            }),
          },
        },
      ],
    },

    completed: {
      type: "final",
    },

    failed: {
      type: "final",
    },
  },
});

export type SyncMachine = typeof syncMachine;
export type SyncSnapshot = SnapshotFrom<SyncMachine>;

/** starts the machine and resolves with its final snapshot */
export function runSyncMachine(machine: SyncMachine, input: SyncInput): Promise<SyncSnapshot> {
  return new Promise((resolve, reject) => {
    const actor = createActor(machine, { input });
    actor.subscribe({
      next: (snapshot) => {
        if (snapshot.status === "done") {
          resolve(snapshot);
        }
      },
      error: reject,
    });
    actor.start();
  });
}
