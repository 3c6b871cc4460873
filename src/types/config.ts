/**
 * Configuration type definitions for homestash
 */

/**
 * Locations the pipeline reads from and writes to. Resolved once at the CLI
 * edge so the core never consults the process environment.
 */
export interface PathsConfig {
  /** Home directory of the user whose stack is backed up */
  home: string;
  /** Directory the conventional binds (./public, ./config, ./Caddyfile) and ./stack live in */
  workingDir: string;
  /** Retention root holding the timestamped backups and LATEST */
  root: string;
}

export interface RetentionConfig {
  /** Number of most recent backup directories to keep */
  keep: number;
}

export interface DockerConfig {
  /** Image used for the short-lived tar helpers */
  helperImage: string;
  /** Shared network the reverse proxy expects */
  network: string;
}

export interface BindMountConfig {
  /** Mount sources must lie strictly under one of these to be archived */
  allowedPrefixes: string[];
  /** Prefix host tar invocations with sudo */
  elevate: boolean;
}

export interface ComposeConfig {
  /** Roots scanned for compose and .env files */
  scanRoots: string[];
  /** Maximum depth of the scan below each root */
  scanDepth: number;
}

export interface CertsConfig {
  /** Container holding the proxy's local CA */
  container: string;
  /** Path of the root certificate inside the container */
  path: string;
  /** File name under certs/ */
  fileName: string;
}

export interface BundleConfig {
  /** Repository part of the bundle image tag */
  imageName: string;
  /** Base image of the bundle */
  baseImage: string;
  /** Host restore script copied into the bundle when it exists */
  restoreScript: string;
  /** Directory the build contexts are created in */
  buildDir: string;
}

export type ScheduleAction = "backup" | "bundle";

export interface ScheduleConfig {
  cron: string;
  /** IANA timezone for the cron expression */
  timezone?: string;
  action: ScheduleAction;
}

export interface HomestashConfig {
  version: string;
  paths: PathsConfig;
  retention: RetentionConfig;
  /** Helper processes allowed in flight for volume and bind-mount archiving */
  concurrency: number;
  /** Abort the run at the first failed step instead of collecting failures */
  failFast: boolean;
  docker: DockerConfig;
  bindMounts: BindMountConfig;
  compose: ComposeConfig;
  certs: CertsConfig;
  bundle: BundleConfig;
  /** Owner the backup tree is handed back to before bundling (user or user:group) */
  targetUser?: string;
  schedules: Record<string, ScheduleConfig>;
}

/**
 * Values taken from the process environment when building defaults
 */
export interface EnvironmentSnapshot {
  home: string;
  cwd: string;
  /** Invoking user when running under sudo */
  sudoUser?: string;
  /** Home directory of the invoking sudo user */
  sudoHome?: string;
}
