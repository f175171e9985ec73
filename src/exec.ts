/**
 * Thin promise wrapper around child_process.spawn for gh, git and npm.
 */

import { spawn } from "node:child_process";
import { CommandError } from "./errors.js";

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<CommandResult>;

/** Resolves with the exit code; rejects only when the binary cannot be spawned. */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, stdio: ["pipe", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (err) => {
      reject(new Error(`Failed to spawn ${command}: ${err.message}`));
    });
    child.on("close", (code) => {
      resolve({ code, stdout, stderr });
    });

    // The input never reached the command, whatever its exit code says.
    child.stdin.on("error", (err) => {
      reject(new Error(`Failed to write to ${command}: ${err.message}`));
    });
    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });

/** Runs a command and throws CommandError on a non-zero exit. */
export async function runChecked(
  run: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<CommandResult> {
  const result = await run(command, args, options);
  if (result.code !== 0) {
    throw new CommandError([command, ...args].join(" "), result.code, result.stdout, result.stderr);
  }
  return result;
}
