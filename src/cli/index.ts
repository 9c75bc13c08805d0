#!/usr/bin/env node
/**
 * CLI entrypoint — routes commands to handlers.
 */

import { parseArgs } from "util";

const COMMANDS = ["run", "watch", "validate", "process"] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

async function main() {
  const { positionals } = parseArgs({
    args: process.argv.slice(2),
    strict: false,
    allowPositionals: true,
  });

  const command = positionals[0];
  const args = process.argv.slice(3);

  if (!isCommand(command)) {
    console.error(`usage: notes-to-ssg <command> [options]`);
    console.error(`commands: ${COMMANDS.join(", ")}`);
    process.exit(1);
  }

  try {
    switch (command) {
      case "run":
        await (await import("./run.js")).run(args);
        break;
      case "watch":
        await (await import("./watch.js")).run(args);
        break;
      case "validate":
        await (await import("./validate.js")).run(args);
        break;
      case "process":
        await (await import("./process.js")).run(args);
        break;
    }
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}

void main();
