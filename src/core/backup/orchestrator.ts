/**
 * Backup orchestration
 */

import { isDockerAvailable } from "../../docker/client";
import { type ContainerDetails, inspectRunningContainers } from "../../docker/container";
import type {
  BackupLayout,
  HomestashConfig,
  RunReport,
  StepName,
  StepOutcome,
  StepResult,
} from "../../types";
import { logger } from "../../utils/logger";
import { formatBytes, formatDuration } from "../../utils/format";
import { finalizeBackup, readLatestPointer } from "../cleanup/rotation";
import { errorMessage, PrerequisiteError, StepFailedError } from "../errors";
import {
  captureBindMounts,
  createBindMountRegistry,
  discoverBindMounts,
  writeBindIndex,
} from "./bind-mounts";
import { collectRootCertificate } from "./certs";
import { copyComposeFiles, discoverComposeFiles } from "./compose-collector";
import { snapshotImages } from "./image-snapshot";
import { createBackupLayout } from "./layout";
import { MANIFEST_FILES, writeManifests } from "./manifest-writer";
import { archiveVolumes } from "./volume-archiver";

export interface BackupOptions {
  /** Clock used for the backup identifier */
  now?: () => Date;
}

type StepBody = () => Promise<StepOutcome>;

/**
 * Runs step bodies in order, recording one result per step. In fail-fast
 * mode the first failed step raises StepFailedError.
 */
class StepRunner {
  readonly results: StepResult[] = [];

  constructor(
    private readonly layout: BackupLayout,
    private readonly failFast: boolean,
  ) {}

  async run(step: StepName, title: string, body: StepBody): Promise<StepResult> {
    logger.step(title);
    const startTime = Date.now();

    let result: StepResult;
    try {
      const outcome = await body();
      const errors = outcome.errors ?? [];
      result = {
        step,
        status: errors.length > 0 ? "failed" : (outcome.status ?? "ok"),
        summary: outcome.summary,
        errors,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Step ${step} failed: ${message}`);
      result = {
        step,
        status: "failed",
        summary: "failed",
        errors: [message],
        durationMs: Date.now() - startTime,
      };
    }

    this.results.push(result);

    if (result.status === "failed" && this.failFast) {
      throw new StepFailedError(step, result.errors, this.layout.dir);
    }
    return result;
  }

  get hasFailures(): boolean {
    return this.results.some((r) => r.status === "failed");
  }
}

/**
 * Take one backup of the stack into a fresh directory under the root.
 *
 * The run is complete only when no step failed; only then is LATEST moved
 * and the retention window applied.
 */
export async function runBackup(
  config: HomestashConfig,
  options: BackupOptions = {},
): Promise<RunReport> {
  const now = options.now ?? (() => new Date());

  logger.step("Checking the container runtime");
  if (!(await isDockerAvailable())) {
    throw new PrerequisiteError("Docker is not available. Is the daemon running?");
  }

  const startedAt = now();
  const startTime = Date.now();
  const layout = await createBackupLayout(config.paths.root, startedAt);
  logger.info(`Starting backup ${layout.backupId} in ${layout.dir}`);

  const runner = new StepRunner(layout, config.failFast);
  let containers: ContainerDetails[] | null = null;

  await runner.run("manifests", "Writing Docker manifests", async () => {
    const report = await writeManifests(layout.manifestsDir);
    return {
      summary: `${report.written.length}/${Object.keys(MANIFEST_FILES).length} listings written`,
    };
  });

  await runner.run("volumes", "Exporting named volumes", async () => {
    const report = await archiveVolumes(config, layout.volumesDir);
    const totalBytes = report.archived.reduce((sum, v) => sum + v.sizeBytes, 0);
    return {
      status: report.archived.length === 0 && report.errors.length === 0 ? "skipped" : "ok",
      summary: `${report.archived.length} volume(s), ${formatBytes(totalBytes)}`,
      errors: report.errors,
    };
  });

  await runner.run("certs", "Copying the proxy's local root CA (if present)", async () => {
    const copied = await collectRootCertificate(config.certs, layout.certsDir);
    return copied
      ? { summary: copied }
      : { status: "skipped", summary: "no root CA found" };
  });

  await runner.run("bind-mounts", "Archiving bind mounts", async () => {
    containers = await inspectRunningContainers();
    const candidates = await discoverBindMounts({
      config,
      containers,
      registry: createBindMountRegistry(config.paths.workingDir),
    });
    const report = await captureBindMounts(config, candidates, layout.bindMountsDir);
    await writeBindIndex(layout.manifestsDir, report.captured);
    return {
      status: candidates.length === 0 ? "skipped" : "ok",
      summary: `${report.captured.length} of ${candidates.length} path(s) captured`,
      errors: report.errors,
    };
  });

  await runner.run("compose-files", "Collecting compose files", async () => {
    let workloads: ContainerDetails[] = containers ?? [];
    if (containers === null) {
      try {
        workloads = await inspectRunningContainers();
      } catch (error) {
        logger.warn(`Compose labels unavailable: ${errorMessage(error)}`);
      }
    }

    const artifacts = await discoverComposeFiles(config, workloads);
    const report = await copyComposeFiles(artifacts, layout.composeDir);
    return {
      status: artifacts.length === 0 ? "skipped" : "ok",
      summary: `${report.copied.length} file(s) copied`,
      errors: report.errors,
    };
  });

  await runner.run("images", "Saving images of running containers", async () => {
    const snapshot = await snapshotImages(layout);
    if (!snapshot.archivePath) {
      return { status: "skipped", summary: "no running containers" };
    }
    const pulls =
      snapshot.pullFailures.length > 0 ? ` (${snapshot.pullFailures.length} pull(s) failed)` : "";
    return { summary: `${snapshot.images.length} image(s) saved${pulls}` };
  });

  const complete = !runner.hasFailures;
  let pruned: string[] = [];

  if (complete) {
    await runner.run("finalize", "Writing LATEST and rotating old backups", async () => {
      const rotation = await finalizeBackup(config.paths.root, layout.dir, config.retention.keep);
      pruned = rotation.pruned;
      return { summary: `kept ${rotation.kept.length}, pruned ${rotation.pruned.length}` };
    });
  } else {
    runner.results.push({
      step: "finalize",
      status: "skipped",
      summary: "run is partial; LATEST left unchanged",
      errors: [],
      durationMs: 0,
    });
  }

  const latestUpdated =
    complete && (await readLatestPointer(config.paths.root)) === layout.dir;
  const durationMs = Date.now() - startTime;

  if (!runner.hasFailures) {
    logger.info(`Backup complete at: ${layout.dir} (${formatDuration(durationMs)})`);
  } else {
    logger.warn(`Backup finished with failures at: ${layout.dir}`);
  }

  return {
    backupId: layout.backupId,
    backupDir: layout.dir,
    startedAt,
    durationMs,
    steps: runner.results,
    complete: !runner.hasFailures,
    latestUpdated,
    pruned,
  };
}
