/**
 * Error taxonomy of the backup, restore and bundle pipelines
 */

import type { StepName } from "../types";

/**
 * A required external tool (the container runtime) is unavailable.
 * Raised before anything is created on disk.
 */
export class PrerequisiteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PrerequisiteError";
  }
}

/**
 * The command was invoked with a missing or invalid argument
 */
export class UsageError extends Error {
  constructor(
    message: string,
    public readonly usage: string,
  ) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * A step failed while the run was in fail-fast mode
 */
export class StepFailedError extends Error {
  constructor(
    public readonly step: StepName,
    public readonly errors: string[],
    public readonly backupDir: string,
  ) {
    super(`Step "${step}" failed: ${errors.join("; ")}`);
    this.name = "StepFailedError";
  }
}

export class BundleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BundleError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
