/**
 * Observational listings of the container runtime
 */

import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import {
  inspectContainersRaw,
  listAllContainerIds,
  listContainerSummary,
} from "../../docker/container";
import { listImageRefs } from "../../docker/image";
import { listNetworks } from "../../docker/network";
import { listVolumes } from "../../docker/volume";
import { logger } from "../../utils/logger";

export const MANIFEST_FILES = {
  containers: "containers.tsv",
  inspect: "containers.json",
  images: "images.txt",
  networks: "networks.txt",
  volumes: "volumes.txt",
} as const;

export interface ManifestReport {
  written: string[];
  /** Listings that could not be produced */
  warnings: string[];
}

function asLines(lines: string[]): string {
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

const MANIFEST_PRODUCERS: ReadonlyArray<[string, () => Promise<string>]> = [
  [
    MANIFEST_FILES.containers,
    async () => {
      const summary = await listContainerSummary();
      return summary ? `${summary}\n` : "";
    },
  ],
  [MANIFEST_FILES.inspect, async () => inspectContainersRaw(await listAllContainerIds())],
  [MANIFEST_FILES.images, async () => asLines(await listImageRefs())],
  [MANIFEST_FILES.networks, async () => asLines(await listNetworks())],
  [MANIFEST_FILES.volumes, async () => asLines((await listVolumes()).map((v) => v.name))],
];

/**
 * Write every listing. Each one is independent and never fails the step.
 */
export async function writeManifests(manifestsDir: string): Promise<ManifestReport> {
  const report: ManifestReport = { written: [], warnings: [] };

  for (const [fileName, produce] of MANIFEST_PRODUCERS) {
    try {
      await writeFile(path.join(manifestsDir, fileName), await produce());
      report.written.push(fileName);
    } catch (error) {
      const message = `Could not write ${fileName}: ${error instanceof Error ? error.message : String(error)}`;
      logger.warn(message);
      report.warnings.push(message);
    }
  }

  return report;
}
