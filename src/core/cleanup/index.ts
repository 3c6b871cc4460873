/**
 * Retention and LATEST pointer exports
 */

export {
  type BackupEntry,
  finalizeBackup,
  LATEST_FILE,
  listBackupDirs,
  readLatestPointer,
  type RotateOptions,
  rotateBackups,
  writeLatestPointer,
} from "./rotation";
