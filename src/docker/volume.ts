/**
 * Docker volume operations
 */

import { isPlainObject, stringField } from "../utils/json";
import { logger } from "../utils/logger";
import { dockerRun, dockerRunChecked, outputLines } from "./client";

export interface DockerVolume {
  name: string;
  driver: string;
  mountpoint: string;
  scope: string;
}

/**
 * List all Docker volumes. Throws when the listing itself fails, so callers
 * can tell "no volumes" apart from "could not ask".
 */
export async function listVolumes(): Promise<DockerVolume[]> {
  const result = await dockerRunChecked(
    ["volume", "ls", "--format", "{{json .}}"],
    "list Docker volumes",
  );

  const volumes: DockerVolume[] = [];

  for (const line of outputLines(result.stdout)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger.debug(`Failed to parse volume JSON: ${line}`);
      continue;
    }
    if (!isPlainObject(parsed) || typeof parsed.Name !== "string") {
      logger.debug(`Unexpected volume entry: ${line}`);
      continue;
    }

    volumes.push({
      name: parsed.Name,
      driver: stringField(parsed, "Driver", "local"),
      mountpoint: stringField(parsed, "Mountpoint"),
      scope: stringField(parsed, "Scope", "local"),
    });
  }

  return volumes;
}

/**
 * Check if a volume exists
 */
export async function volumeExists(name: string): Promise<boolean> {
  const result = await dockerRun(["volume", "inspect", name]);
  return result.success;
}

/**
 * Create a named volume. Creating one that already exists is a no-op.
 */
export async function createVolume(name: string): Promise<void> {
  await dockerRunChecked(["volume", "create", name], `create volume ${name}`);
}
