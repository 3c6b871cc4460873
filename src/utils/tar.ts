/**
 * Host-side tar invocations
 */

import { type CommandResult, formatCommand, runCommand } from "./exec";
import { logger } from "./logger";

export interface TarOptions {
  /** Prefix the invocation with sudo */
  elevate?: boolean;
}

async function runTar(args: string[], options: TarOptions): Promise<CommandResult> {
  const command = options.elevate ? "sudo" : "tar";
  const finalArgs = options.elevate ? ["tar", ...args] : args;
  logger.debug(`$ ${formatCommand(command, finalArgs)}`);
  return runCommand(command, finalArgs);
}

function tarError(action: string, target: string, result: CommandResult): Error {
  const detail = result.stderr || `exit code ${result.exitCode}`;
  return new Error(`Failed to ${action} ${target}: ${detail}`);
}

/**
 * Create a gzip tarball of `members` (paths relative to `cwd`)
 */
export async function createTarball(
  archivePath: string,
  cwd: string,
  members: string[],
  options: TarOptions = {},
): Promise<void> {
  const result = await runTar(["-czf", archivePath, "-C", cwd, ...members], options);
  if (!result.success) {
    throw tarError("archive", members.join(" "), result);
  }
}

/**
 * Extract a gzip tarball into `destination`
 */
export async function extractTarball(
  archivePath: string,
  destination: string,
  options: TarOptions = {},
): Promise<void> {
  const result = await runTar(["-xzf", archivePath, "-C", destination], options);
  if (!result.success) {
    throw tarError("extract", archivePath, result);
  }
}
