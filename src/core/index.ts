/**
 * Core module exports
 */

// Backup
export { type BackupOptions, runBackup } from "./backup";
// Bundle
export { type BundleResult, type PackageResult, packageBackup, runBundle } from "./bundle/builder";
// Retention
export { listBackupDirs, readLatestPointer, rotateBackups } from "./cleanup";
// Errors
export { BundleError, PrerequisiteError, StepFailedError, UsageError } from "./errors";
// Inspection
export { type BackupSummary, listBackups } from "./inspect/catalog";
export {
  DEFAULT_EXPECTED_CONTAINERS,
  type InspectionReport,
  inspectBackup,
  inspectImage,
} from "./inspect/inspector";
// Patch
export { type PatchResult, patchBackup } from "./patch/patcher";
// Restore
export { type RestoreReport, runRestore } from "./restore/orchestrator";
// Scheduler
export { Scheduler } from "./scheduler";
