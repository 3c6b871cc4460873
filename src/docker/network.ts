/**
 * Docker network operations
 */

import { logger } from "../utils/logger";
import { dockerRunChecked, outputLines } from "./client";

export async function listNetworks(): Promise<string[]> {
  const result = await dockerRunChecked(["network", "ls", "--format", "{{.Name}}"], "list networks");
  return outputLines(result.stdout);
}

/**
 * Create the network unless it already exists. Returns true when it was created.
 */
export async function ensureNetwork(name: string): Promise<boolean> {
  const networks = await listNetworks();
  if (networks.includes(name)) {
    logger.debug(`Network ${name} already exists`);
    return false;
  }

  await dockerRunChecked(["network", "create", name], `create network ${name}`);
  return true;
}
