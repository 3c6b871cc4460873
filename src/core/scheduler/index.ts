/**
 * Scheduler module exports
 */

export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
export { type ScheduledAction, type ScheduleStatus, Scheduler, type SchedulerOptions } from "./daemon";
