/**
 * External command execution
 *
 * Every call into docker, tar, chown or sudo goes through runCommand so the
 * rest of the code only sees plain results, never thrown process errors.
 */

import { spawn } from "node:child_process";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Working directory for the child process */
  cwd?: string;
}

/** Exit code reported when the executable could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export async function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  let child: ReturnType<typeof spawn>;
  try {
    child = spawn(command, args, {
      cwd: options.cwd,
      env: process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });
  } catch (err) {
    return {
      success: false,
      stdout: "",
      stderr: err instanceof Error ? err.message : String(err),
      exitCode: SPAWN_FAILURE_EXIT_CODE,
    };
  }

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

  let spawnError: Error | null = null;
  const exitCode = await new Promise<number>((resolve) => {
    child.once("error", (err) => {
      spawnError = err;
      resolve(SPAWN_FAILURE_EXIT_CODE);
    });
    child.once("close", (code) => resolve(code ?? 1));
  });

  const stdout = Buffer.concat(stdoutChunks).toString("utf-8").trim();
  const stderrBase = Buffer.concat(stderrChunks).toString("utf-8").trim();
  const stderr = spawnError ? `${stderrBase}\n${String(spawnError)}`.trim() : stderrBase;

  return {
    success: exitCode === 0,
    stdout,
    stderr,
    exitCode,
  };
}

/**
 * Render a command line for log output
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((a) => (/[\s"']/.test(a) ? JSON.stringify(a) : a)).join(" ");
}
