/**
 * Docker image operations
 */

import { logger } from "../utils/logger";
import { dockerRun, dockerRunChecked, outputLines } from "./client";

/**
 * Pull an image. Failures are reported, not thrown.
 */
export async function pullImage(image: string): Promise<boolean> {
  const result = await dockerRun(["pull", image]);
  if (!result.success) {
    logger.warn(`Failed to pull ${image}`, result.stderr);
  }
  return result.success;
}

export async function saveImages(outputPath: string, images: string[]): Promise<void> {
  await dockerRunChecked(["save", "-o", outputPath, ...images], "save images");
}

export async function loadImages(archivePath: string): Promise<void> {
  await dockerRunChecked(["load", "-i", archivePath], "load images");
}

/**
 * "repository:tag" of every local image
 */
export async function listImageRefs(): Promise<string[]> {
  const result = await dockerRunChecked(
    ["images", "--format", "{{.Repository}}:{{.Tag}}"],
    "list images",
  );
  return outputLines(result.stdout);
}

/**
 * Tags present locally for one repository
 */
export async function listImageTags(repository: string): Promise<string[]> {
  const result = await dockerRunChecked(
    ["images", repository, "--format", "{{.Tag}}"],
    `list tags of ${repository}`,
  );
  return outputLines(result.stdout).filter((tag) => tag !== "<none>");
}

/**
 * Build an image from a context directory holding a Dockerfile
 */
export async function buildImage(contextDir: string, tag: string): Promise<void> {
  await dockerRunChecked(["build", "-t", tag, contextDir], `build image ${tag}`);
}
