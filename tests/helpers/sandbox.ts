import { mkdir, mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createDefaultConfig } from "../../src/config/defaults";
import type { HomestashConfig } from "../../src/types";

export interface Sandbox {
  base: string;
  home: string;
  workingDir: string;
  config: HomestashConfig;
  cleanup: () => Promise<void>;
}

/**
 * Temporary home and working directory with a default config pointing at them
 */
export async function createSandbox(): Promise<Sandbox> {
  const base = await mkdtemp(path.join(os.tmpdir(), "homestash-test-"));
  const home = path.join(base, "home");
  const workingDir = path.join(base, "work");
  await mkdir(home, { recursive: true });
  await mkdir(workingDir, { recursive: true });

  const config = createDefaultConfig({ home, cwd: workingDir });

  return {
    base,
    home,
    workingDir,
    config,
    cleanup: () => rm(base, { recursive: true, force: true }),
  };
}

/**
 * Clock that moves forward one minute per call
 */
export function steppingClock(start: Date = new Date(2026, 0, 5, 3, 0, 0)): () => Date {
  let calls = 0;
  return () => new Date(start.getTime() + calls++ * 60 * 1000);
}
