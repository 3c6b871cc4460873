/**
 * Docker CLI client wrapper
 */

import { type CommandOptions, type CommandResult, formatCommand, runCommand } from "../utils/exec";
import { logger } from "../utils/logger";

export type DockerRunResult = CommandResult;

/**
 * Raised by query helpers whose output the caller cannot do without
 */
export class DockerCommandError extends Error {
  constructor(
    message: string,
    public readonly result: DockerRunResult,
  ) {
    super(result.stderr ? `${message}: ${result.stderr}` : message);
    this.name = "DockerCommandError";
  }
}

/**
 * Run a Docker command and return the result
 */
export async function dockerRun(
  args: string[],
  options: CommandOptions = {},
): Promise<DockerRunResult> {
  logger.debug(`$ ${formatCommand("docker", args)}`);
  return runCommand("docker", args, options);
}

/**
 * Run a Docker command and throw when it fails
 */
export async function dockerRunChecked(
  args: string[],
  description: string,
  options: CommandOptions = {},
): Promise<DockerRunResult> {
  const result = await dockerRun(args, options);
  if (!result.success) {
    throw new DockerCommandError(`Failed to ${description}`, result);
  }
  return result;
}

/**
 * Split line-oriented CLI output, dropping blank lines
 */
export function outputLines(stdout: string): string[] {
  return stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Check if Docker is available and running
 */
export async function isDockerAvailable(): Promise<boolean> {
  const result = await dockerRun(["info"]);
  return result.success;
}

export interface ContainerMountSpec {
  /** Volume name or absolute host path */
  source: string;
  target: string;
  readonly?: boolean;
}

/**
 * Run a container with the specified options
 */
export async function runContainer(options: {
  image: string;
  command: string[];
  volumes?: ContainerMountSpec[];
  remove?: boolean;
}): Promise<DockerRunResult> {
  const args: string[] = ["run"];

  if (options.remove !== false) {
    args.push("--rm");
  }

  if (options.volumes) {
    for (const vol of options.volumes) {
      const mountSpec = vol.readonly
        ? `${vol.source}:${vol.target}:ro`
        : `${vol.source}:${vol.target}`;
      args.push("-v", mountSpec);
    }
  }

  args.push(options.image);
  args.push(...options.command);

  return dockerRun(args);
}

/**
 * Pull a Docker image if not present
 */
export async function ensureImage(image: string): Promise<boolean> {
  const inspectResult = await dockerRun(["image", "inspect", image]);
  if (inspectResult.success) {
    return true;
  }

  logger.info(`Pulling Docker image: ${image}`);
  const pullResult = await dockerRun(["pull", image]);
  return pullResult.success;
}
