/**
 * Centralized type exports for homestash
 */

// Backup types
export type {
  BackupLayout,
  BindMountCandidate,
  BindMountOrigin,
  ComposeCandidate,
  ComposeOrigin,
  RotationResult,
  RunReport,
  StepName,
  StepOutcome,
  StepResult,
  StepStatus,
  VolumeArchiveResult,
} from "./backup";
// Config types
export type {
  BindMountConfig,
  BundleConfig,
  CertsConfig,
  ComposeConfig,
  DockerConfig,
  EnvironmentSnapshot,
  HomestashConfig,
  PathsConfig,
  RetentionConfig,
  ScheduleAction,
  ScheduleConfig,
} from "./config";
