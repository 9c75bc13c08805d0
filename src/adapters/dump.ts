/**
 * note-dump adapter — runs the external dump tool with the scope tag as its
 * last argument and its stdout redirected to the dump file.
 * success is exit code 0; the exit code and stderr are kept for the retry log.
 */

import { spawn } from "child_process";
import { openSync, closeSync } from "fs";
import { ResultAsync, ok, err, type Result } from "neverthrow";
import type { DumpError } from "../dump.js";

export interface DumpCommandOptions {
  command: string;
  args: readonly string[];
  scopeTag: string;
  outputPath: string;
}

export function runDumpCommand(options: DumpCommandOptions): ResultAsync<void, DumpError> {
  const { command, scopeTag, outputPath } = options;
  const args = [...options.args, scopeTag];

  return new ResultAsync(
    new Promise<Result<void, DumpError>>((resolve) => {
      let fd: number;
      try {
        fd = openSync(outputPath, "w");
      } catch (e) {
        resolve(
          err({
            _tag: "dump.spawn",
            command,
            message: `cannot open ${outputPath}: ${e instanceof Error ? e.message : String(e)}`,
          }),
        );
        return;
      }

      let settled = false;
      const settle = (result: Result<void, DumpError>) => {
        if (settled) return;
        settled = true;
        closeSync(fd);
        resolve(result);
      };

      const proc = spawn(command, args, { stdio: ["ignore", fd, "pipe"] });

      let stderr = "";
      proc.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf-8");
      });

      proc.on("error", (e) => {
        settle(err({ _tag: "dump.spawn", command, message: e.message }));
      });

      proc.on("close", (exitCode) => {
        if (exitCode === 0) {
          settle(ok(undefined));
          return;
        }
        settle(
          err({
            _tag: "dump.exit",
            command,
            exitCode,
            message: `${command} exited with code ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
          }),
        );
      });
    }),
  );
}
