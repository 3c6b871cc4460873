/**
 * Configuration validation
 */

import type { HomestashConfig } from "../types";
import { isPlainObject } from "../utils/json";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

const SCHEDULE_ACTIONS = ["backup", "bundle"];

function section(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = c[name];
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(obj: Record<string, unknown>, key: string, label: string): void {
  const value = obj[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${label} must be a non-empty string`);
  }
}

function requirePositiveInt(value: unknown, label: string): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer`);
  }
}

function requireStringArray(value: unknown, label: string): void {
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string" && v.length > 0)) {
    throw new ConfigError(`${label} must be an array of strings`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  paths: (c) => {
    const paths = section(c, "paths");
    requireString(paths, "home", "paths.home");
    requireString(paths, "workingDir", "paths.workingDir");
    requireString(paths, "root", "paths.root");
  },

  retention: (c) => {
    const retention = section(c, "retention");
    requirePositiveInt(retention.keep, "retention.keep");
  },

  concurrency: (c) => {
    requirePositiveInt(c.concurrency, "concurrency");
  },

  failFast: (c) => {
    if (typeof c.failFast !== "boolean") {
      throw new ConfigError("failFast must be a boolean");
    }
  },

  docker: (c) => {
    const docker = section(c, "docker");
    requireString(docker, "helperImage", "docker.helperImage");
    requireString(docker, "network", "docker.network");
  },

  bindMounts: (c) => {
    const bindMounts = section(c, "bindMounts");
    requireStringArray(bindMounts.allowedPrefixes, "bindMounts.allowedPrefixes");
    if (typeof bindMounts.elevate !== "boolean") {
      throw new ConfigError("bindMounts.elevate must be a boolean");
    }
  },

  compose: (c) => {
    const compose = section(c, "compose");
    requireStringArray(compose.scanRoots, "compose.scanRoots");
    requirePositiveInt(compose.scanDepth, "compose.scanDepth");
  },

  certs: (c) => {
    const certs = section(c, "certs");
    requireString(certs, "container", "certs.container");
    requireString(certs, "path", "certs.path");
    requireString(certs, "fileName", "certs.fileName");
    if (typeof certs.fileName === "string" && certs.fileName.includes("/")) {
      throw new ConfigError("certs.fileName must be a plain file name");
    }
  },

  bundle: (c) => {
    const bundle = section(c, "bundle");
    requireString(bundle, "imageName", "bundle.imageName");
    requireString(bundle, "baseImage", "bundle.baseImage");
    requireString(bundle, "restoreScript", "bundle.restoreScript");
    requireString(bundle, "buildDir", "bundle.buildDir");
  },

  targetUser: (c) => {
    if (c.targetUser !== undefined && (typeof c.targetUser !== "string" || !c.targetUser)) {
      throw new ConfigError("targetUser must be a non-empty string when set");
    }
  },

  schedules: (c) => {
    const schedules = section(c, "schedules");
    for (const [name, schedule] of Object.entries(schedules)) {
      validateSchedule(name, schedule);
    }
  },
};

function validateSchedule(name: string, schedule: unknown): void {
  if (!isPlainObject(schedule)) {
    throw new ConfigError(`schedules.${name} must be an object`);
  }
  if (!schedule.cron || typeof schedule.cron !== "string") {
    throw new ConfigError(`schedules.${name}.cron must be a string`);
  }
  if (schedule.timezone !== undefined && typeof schedule.timezone !== "string") {
    throw new ConfigError(`schedules.${name}.timezone must be a string`);
  }
  if (typeof schedule.action !== "string" || !SCHEDULE_ACTIONS.includes(schedule.action)) {
    throw new ConfigError(`schedules.${name}.action must be one of: ${SCHEDULE_ACTIONS.join(", ")}`);
  }
}

export function validateConfig(config: unknown): asserts config is HomestashConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
