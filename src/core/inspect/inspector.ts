/**
 * Capture reports for backup directories and bundle images
 */

import { existsSync } from "node:fs";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import {
  type ContainerDetails,
  copyFromContainer,
  createContainer,
  parseContainerInspect,
  removeContainer,
} from "../../docker/container";
import { listImageTags } from "../../docker/image";
import type { HomestashConfig } from "../../types";
import { logger } from "../../utils/logger";
import { ARCHIVE_EXTENSION } from "../../utils/naming";
import { loadBindMountRegistry } from "../backup/bind-mounts";
import { describeLayout } from "../backup/layout";
import { MANIFEST_FILES } from "../backup/manifest-writer";
import { errorMessage, UsageError } from "../errors";

export const DEFAULT_EXPECTED_CONTAINERS = ["pihole", "caddy", "homepage"];

export interface MountCheck {
  /** Volume name or host source path */
  source: string;
  destination: string;
  /** Archive the mount should have produced, relative to the backup */
  expected: string;
  archived: boolean;
}

export interface ContainerCapture {
  name: string;
  image: string;
  volumes: MountCheck[];
  binds: MountCheck[];
}

export interface SubtreeSummary {
  present: boolean;
  entries: string[];
}

export interface InspectionReport {
  backupDir: string;
  volumes: SubtreeSummary;
  bindMounts: SubtreeSummary;
  composeFiles: SubtreeSummary;
  manifests: SubtreeSummary;
  certs: SubtreeSummary;
  rootCertificate: boolean;
  imagesArchive: boolean;
  runningImages: string[];
  containerSummary: string[];
  /** Null when manifests/containers.json is missing or unreadable */
  containers: ContainerCapture[] | null;
  warnings: string[];
}

export interface InspectOptions {
  /** Containers listed first in the cross-check */
  expect?: string[];
  certFileName?: string;
  /** Working directory whose conventional binds are named apart, for backups without a bind index */
  workingDir?: string;
}

async function summarize(
  dir: string,
  filter: (name: string) => boolean = () => true,
): Promise<SubtreeSummary> {
  if (!existsSync(dir)) {
    return { present: false, entries: [] };
  }
  const names = await readdir(dir);
  return { present: true, entries: names.filter(filter).sort() };
}

async function readLines(file: string): Promise<string[]> {
  if (!existsSync(file)) {
    return [];
  }
  return (await readFile(file, "utf-8")).split("\n").filter(Boolean);
}

const isArchive = (name: string): boolean => name.endsWith(ARCHIVE_EXTENSION);

/**
 * Report what a backup directory captured
 */
export async function inspectBackup(
  backupDir: string,
  options: InspectOptions = {},
): Promise<InspectionReport> {
  const layout = describeLayout(backupDir);
  const expect = options.expect ?? DEFAULT_EXPECTED_CONTAINERS;
  const warnings: string[] = [];

  const volumes = await summarize(layout.volumesDir, isArchive);
  const bindMounts = await summarize(layout.bindMountsDir, isArchive);
  const certs = await summarize(layout.certsDir);

  // Older trees kept running-images.txt under manifests/
  const runningImagesFile = existsSync(layout.runningImagesFile)
    ? layout.runningImagesFile
    : path.join(layout.manifestsDir, "running-images.txt");

  const report: InspectionReport = {
    backupDir: layout.dir,
    volumes,
    bindMounts,
    composeFiles: await summarize(layout.composeDir),
    manifests: await summarize(layout.manifestsDir),
    certs,
    rootCertificate: certs.entries.includes(options.certFileName ?? "caddy-rootCA.crt"),
    imagesArchive: existsSync(layout.imagesArchive),
    runningImages: await readLines(runningImagesFile),
    containerSummary: await readLines(path.join(layout.manifestsDir, MANIFEST_FILES.containers)),
    containers: null,
    warnings,
  };

  const inspectFile = path.join(layout.manifestsDir, MANIFEST_FILES.inspect);
  if (!existsSync(inspectFile)) {
    warnings.push(`${MANIFEST_FILES.inspect} missing; per-container check skipped`);
    return report;
  }

  let parsed: ContainerDetails[];
  try {
    parsed = parseContainerInspect(await readFile(inspectFile, "utf-8"));
  } catch (error) {
    warnings.push(`Could not parse ${MANIFEST_FILES.inspect}: ${errorMessage(error)}`);
    return report;
  }

  const volumeArchives = new Set(volumes.entries);
  const bindArchives = new Set(bindMounts.entries);
  const bindNames = await loadBindMountRegistry(layout, options.workingDir);

  const captures = parsed
    .filter((c) => c.name)
    .map((container): ContainerCapture => ({
      name: container.name,
      image: container.image,
      volumes: container.mounts
        .filter((m) => m.type === "volume" && m.name)
        .map((m) => {
          const expected = `${m.name}${ARCHIVE_EXTENSION}`;
          return {
            source: m.name ?? "",
            destination: m.destination,
            expected: `volumes/${expected}`,
            archived: volumeArchives.has(expected),
          };
        }),
      binds: container.mounts
        .filter((m) => m.type === "bind" && m.source)
        .map((m) => {
          const expected = bindNames.nameFor(m.source);
          return {
            source: m.source,
            destination: m.destination,
            expected: `bind-mounts/${expected}`,
            archived: bindArchives.has(expected),
          };
        }),
    }));

  const rank = (name: string): number => {
    const index = expect.indexOf(name);
    return index === -1 ? expect.length : index;
  };
  report.containers = captures.sort(
    (a, b) => rank(a.name) - rank(b.name) || a.name.localeCompare(b.name),
  );

  return report;
}

/**
 * Newest local `<imageName>:*` tag; tags are timestamps, so the lexically last wins
 */
export async function findLatestBundleImage(imageName: string): Promise<string | null> {
  const tags = (await listImageTags(imageName)).sort();
  const latest = tags[tags.length - 1];
  return latest ? `${imageName}:${latest}` : null;
}

export const NO_IMAGE_HINTS = [
  "Build one:  homestash bundle",
  "Or list:    docker images | grep homelab-backup",
  "Or load:    docker load -i /path/to/homelab-backup-image.tar",
].join("\n");

/**
 * Extract /bundle from a bundle image and report on its backup.
 * `image` is a tag, or "auto" for the newest bundle image.
 */
export async function inspectImage(
  config: HomestashConfig,
  image: string,
  options: InspectOptions = {},
): Promise<{ image: string; report: InspectionReport }> {
  const resolved = image === "auto" ? await findLatestBundleImage(config.bundle.imageName) : image;
  if (!resolved) {
    throw new UsageError("No backup image found", NO_IMAGE_HINTS);
  }

  logger.info(`Using image: ${resolved}`);
  const tmp = await mkdtemp(path.join(os.tmpdir(), "bundle-inspect-"));
  let containerId: string | null = null;

  try {
    try {
      containerId = await createContainer(resolved);
    } catch (error) {
      const available = (await listImageTags(config.bundle.imageName)).map(
        (tag) => `  - ${config.bundle.imageName}:${tag}`,
      );
      const hint = available.length > 0 ? `Available images:\n${available.join("\n")}` : NO_IMAGE_HINTS;
      throw new UsageError(`Could not create a container from ${resolved}: ${errorMessage(error)}`, hint);
    }

    if (!(await copyFromContainer(containerId, "/bundle", tmp))) {
      throw new Error(`/bundle not found inside ${resolved}. Is this a backup image?`);
    }

    const bundleDir = path.join(tmp, "bundle");
    if (!existsSync(bundleDir)) {
      throw new Error(`/bundle not found inside ${resolved}. Is this a backup image?`);
    }

    const report = await inspectBackup(path.join(bundleDir, "backup"), {
      certFileName: config.certs.fileName,
      ...options,
    });
    return { image: resolved, report };
  } finally {
    if (containerId) {
      await removeContainer(containerId);
    }
    await rm(tmp, { recursive: true, force: true });
  }
}
