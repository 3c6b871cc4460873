/**
 * Docker Compose project labels and stack startup
 */

import * as path from "node:path";
import { logger } from "../utils/logger";
import { dockerRunChecked } from "./client";
import type { ContainerDetails } from "./container";

export const COMPOSE_WORKING_DIR_LABEL = "com.docker.compose.project.working_dir";
export const COMPOSE_CONFIG_FILES_LABEL = "com.docker.compose.project.config_files";

export interface ComposeProjectRef {
  workingDir: string;
  /** Absolute paths of the deployment descriptors */
  configFiles: string[];
}

/**
 * Read the compose project a container belongs to from its labels.
 * Returns null for containers not started by compose.
 */
export function composeProjectOf(container: ContainerDetails): ComposeProjectRef | null {
  const workingDir = container.labels[COMPOSE_WORKING_DIR_LABEL];
  if (!workingDir) {
    return null;
  }

  // Compose writes "," between files, older releases used ";"
  const configFiles = (container.labels[COMPOSE_CONFIG_FILES_LABEL] ?? "")
    .split(/[,;]/)
    .map((f) => f.trim())
    .filter(Boolean)
    .map((f) => path.resolve(workingDir, f));

  return { workingDir, configFiles };
}

/**
 * Start a compose project from its directory
 */
export async function composeUp(projectDir: string): Promise<void> {
  logger.info(`Starting compose project in ${projectDir}`);
  await dockerRunChecked(["compose", "up", "-d"], `start compose project in ${projectDir}`, {
    cwd: projectDir,
  });
}
