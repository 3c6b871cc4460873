/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";
import type { StepResult, StepStatus } from "../../types";

export { color };

export const VERSION = pkg.version;

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;

const STATUS_LABELS: Record<StepStatus, string> = {
  ok: color.green("ok"),
  skipped: color.dim("skipped"),
  failed: color.red("FAILED"),
};

/**
 * One line per pipeline step, with its errors indented beneath it
 */
export function stepResults(results: StepResult[]): void {
  p.log.step("Steps:");
  for (const result of results) {
    p.log.message(`  [${STATUS_LABELS[result.status]}] ${result.step.padEnd(14)} ${color.dim(result.summary)}`);
    for (const err of result.errors) {
      p.log.message(`         ${color.red(err)}`);
    }
  }
}
