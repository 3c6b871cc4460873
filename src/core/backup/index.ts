/**
 * Backup module exports
 */

export {
  type BindMountStrategy,
  CONVENTIONAL_BINDS,
  captureBindMounts,
  createBindMountRegistry,
  DEFAULT_STRATEGIES,
  discoverBindMounts,
} from "./bind-mounts";
export { collectRootCertificate } from "./certs";
export { copyComposeFiles, DEFAULT_COMPOSE_STRATEGIES, discoverComposeFiles } from "./compose-collector";
export { snapshotImages } from "./image-snapshot";
export { createBackupLayout, describeLayout } from "./layout";
export { MANIFEST_FILES, writeManifests } from "./manifest-writer";
export { type BackupOptions, runBackup } from "./orchestrator";
export { archiveVolumes, restoreVolumes } from "./volume-archiver";
