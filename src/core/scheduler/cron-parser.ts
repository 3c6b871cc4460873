/**
 * Cron expressions for backup schedules (minute hour day-of-month month day-of-week)
 *
 * Examples:
 *   "0 3 * * *"   - Every day at 3:00 AM
 *   "30 4 * * 0"  - Sundays at 4:30 AM
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

const MINUTE_MS = 60 * 1000;

function parserOptions(cron: ParsedCron, currentDate: Date): { currentDate: Date; tz?: string } {
  return cron.timezone ? { currentDate, tz: cron.timezone } : { currentDate };
}

export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  // Throws on bad fields or an unknown timezone
  CronExpressionParser.parse(expression, timezone ? { tz: timezone } : undefined);
  return timezone ? { expression, timezone } : { expression };
}

/** Start of the minute `date` falls in */
export function minuteSlot(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const slot = minuteSlot(date);
  const from = new Date(slot.getTime() - MINUTE_MS);
  const next = CronExpressionParser.parse(cron.expression, parserOptions(cron, from)).next().toDate();
  return minuteSlot(next).getTime() === slot.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  return CronExpressionParser.parse(cron.expression, parserOptions(cron, fromDate))
    .next()
    .toDate();
}
