/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { csvField, formatSummary, formatTableRow, formatTableSeparator, TABLE_WIDTHS } from "./formatters";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  message,
  note,
  outro,
  spinner,
  step,
  stepResults,
  success,
  VERSION,
  warn,
} from "./output";
// Prompts
export { confirmDeletion } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
  stepResults: output.stepResults,
  message: output.message,
  spinner: output.spinner,
  confirmDeletion: prompts.confirmDeletion,
};
