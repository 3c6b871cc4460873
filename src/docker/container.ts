/**
 * Container queries: running workloads, their mounts and labels
 */

import { isPlainObject, stringField, stringRecord } from "../utils/json";
import { logger } from "../utils/logger";
import { dockerRun, dockerRunChecked, outputLines } from "./client";

export interface ContainerMount {
  type: string;
  source: string;
  destination: string;
  /** Volume name for volume mounts */
  name?: string;
}

export interface ContainerDetails {
  id: string;
  /** Container name without the leading "/" */
  name: string;
  image: string;
  mounts: ContainerMount[];
  labels: Record<string, string>;
}

function parseMounts(value: unknown): ContainerMount[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const mounts: ContainerMount[] = [];
  for (const entry of value) {
    if (!isPlainObject(entry)) {
      continue;
    }
    const name = stringField(entry, "Name");
    mounts.push({
      type: stringField(entry, "Type"),
      source: stringField(entry, "Source"),
      destination: stringField(entry, "Destination"),
      ...(name ? { name } : {}),
    });
  }
  return mounts;
}

/**
 * Parse `docker inspect` output for containers
 */
export function parseContainerInspect(json: string): ContainerDetails[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    return [];
  }

  const containers: ContainerDetails[] = [];
  for (const entry of parsed) {
    if (!isPlainObject(entry)) {
      continue;
    }
    const config = isPlainObject(entry.Config) ? entry.Config : {};
    containers.push({
      id: stringField(entry, "Id"),
      name: stringField(entry, "Name").replace(/^\//, ""),
      image: stringField(config, "Image"),
      mounts: parseMounts(entry.Mounts),
      labels: stringRecord(config.Labels),
    });
  }
  return containers;
}

/**
 * IDs of running containers
 */
export async function listRunningContainerIds(): Promise<string[]> {
  const result = await dockerRunChecked(["ps", "-q"], "list running containers");
  return outputLines(result.stdout);
}

/**
 * IDs of all containers, running or not
 */
export async function listAllContainerIds(): Promise<string[]> {
  const result = await dockerRunChecked(["ps", "-aq"], "list containers");
  return outputLines(result.stdout);
}

/**
 * Raw `docker inspect` JSON for the given containers ("[]" when none)
 */
export async function inspectContainersRaw(ids: string[]): Promise<string> {
  if (ids.length === 0) {
    return "[]";
  }
  const result = await dockerRunChecked(["inspect", ...ids], "inspect containers");
  return result.stdout;
}

export async function inspectContainers(ids: string[]): Promise<ContainerDetails[]> {
  return parseContainerInspect(await inspectContainersRaw(ids));
}

/**
 * Details of every running container
 */
export async function inspectRunningContainers(): Promise<ContainerDetails[]> {
  return inspectContainers(await listRunningContainerIds());
}

/**
 * Details of one container by name or ID, or null when it does not exist
 */
export async function inspectContainer(nameOrId: string): Promise<ContainerDetails | null> {
  const result = await dockerRun(["inspect", nameOrId]);
  if (!result.success) {
    logger.debug(`Container not found: ${nameOrId}`, result.stderr);
    return null;
  }
  return parseContainerInspect(result.stdout)[0] ?? null;
}

/**
 * Unique images of running containers, sorted
 */
export async function listRunningImages(): Promise<string[]> {
  const result = await dockerRunChecked(
    ["ps", "--format", "{{.Image}}"],
    "list images of running containers",
  );
  return [...new Set(outputLines(result.stdout))].sort();
}

/**
 * "name<TAB>image" lines for every container
 */
export async function listContainerSummary(): Promise<string> {
  const result = await dockerRunChecked(
    ["ps", "-a", "--format", "{{.Names}}\t{{.Image}}"],
    "list containers",
  );
  return result.stdout;
}

/**
 * Copy a file out of a container
 */
export async function copyFromContainer(
  container: string,
  sourcePath: string,
  destination: string,
): Promise<boolean> {
  const result = await dockerRun(["cp", `${container}:${sourcePath}`, destination]);
  if (!result.success) {
    logger.debug(`docker cp ${container}:${sourcePath} failed`, result.stderr);
  }
  return result.success;
}

/**
 * Create (without starting) a container from an image and return its ID
 */
export async function createContainer(image: string): Promise<string> {
  const result = await dockerRunChecked(["create", image], `create a container from ${image}`);
  return result.stdout;
}

export async function removeContainer(id: string): Promise<boolean> {
  const result = await dockerRun(["rm", "-f", id]);
  return result.success;
}
