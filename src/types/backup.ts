/**
 * Backup run type definitions
 */

/**
 * Directory layout of one backup
 */
export interface BackupLayout {
  backupId: string;
  /** Absolute path of <root>/<backupId> */
  dir: string;
  volumesDir: string;
  manifestsDir: string;
  certsDir: string;
  bindMountsDir: string;
  composeDir: string;
  runningImagesFile: string;
  imagesArchive: string;
}

export type StepName =
  | "manifests"
  | "volumes"
  | "certs"
  | "bind-mounts"
  | "compose-files"
  | "images"
  | "finalize";

export type StepStatus = "ok" | "skipped" | "failed";

export interface StepResult {
  step: StepName;
  status: StepStatus;
  /** One-line description of what the step produced */
  summary: string;
  /** Failures collected while the step kept going */
  errors: string[];
  durationMs: number;
}

/**
 * What a step body hands back to the driver
 */
export interface StepOutcome {
  status?: StepStatus;
  summary: string;
  errors?: string[];
}

export interface RunReport {
  backupId: string;
  backupDir: string;
  startedAt: Date;
  durationMs: number;
  steps: StepResult[];
  /** True once every step finished without a failure */
  complete: boolean;
  /** Whether LATEST now names this backup */
  latestUpdated: boolean;
  /** Backup directories deleted by rotation */
  pruned: string[];
}

/**
 * Result of archiving a single named volume
 */
export interface VolumeArchiveResult {
  volumeName: string;
  archivePath: string;
  sizeBytes: number;
}

export type BindMountOrigin = "conventional" | "mount-table";

/**
 * A host path chosen for capture, with the workloads that mount it
 */
export interface BindMountCandidate {
  /** Absolute host path; the logical resource key */
  sourcePath: string;
  origin: BindMountOrigin;
  /** Archive (or copy) name under bind-mounts/ */
  archiveName: string;
  /** "archive" tars the path, "copy" copies a single file verbatim */
  mode: "archive" | "copy";
  containers: string[];
}

export type ComposeOrigin = "labels" | "scan";

export interface ComposeCandidate {
  /** Absolute path of the compose or env file */
  sourcePath: string;
  origin: ComposeOrigin;
}

export interface RotationResult {
  kept: string[];
  pruned: string[];
}
