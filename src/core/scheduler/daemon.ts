/**
 * Scheduler daemon
 */

import type { HomestashConfig, ScheduleConfig } from "../../types";
import { logger as rootLogger } from "../../utils/logger";
import { runBackup } from "../backup/orchestrator";
import { runBundle } from "../bundle/builder";
import { errorMessage } from "../errors";
import { getNextRun, matchesCron, minuteSlot, type ParsedCron, parseCron } from "./cron-parser";

const logger = rootLogger.child("scheduler");

/** Runs one scheduled action; rejects when the run failed */
export type ScheduledAction = (name: string, schedule: ScheduleConfig) => Promise<void>;

export interface SchedulerOptions {
  runAction?: ScheduledAction;
  now?: () => Date;
  /** Milliseconds between checks */
  intervalMs?: number;
}

export interface ScheduleStatus {
  name: string;
  cron: string;
  action: ScheduleConfig["action"];
  lastRun: Date | null;
  nextRun: Date | null;
}

interface ScheduleState {
  name: string;
  config: ScheduleConfig;
  cron: ParsedCron;
  lastRun: Date | null;
}

function defaultAction(config: HomestashConfig): ScheduledAction {
  return async (name, schedule) => {
    if (schedule.action === "bundle") {
      const result = await runBundle(config);
      logger.info(`Schedule "${name}" built ${result.imageTag}`);
      return;
    }

    const report = await runBackup(config);
    if (!report.complete) {
      throw new Error(`backup ${report.backupId} is partial`);
    }
    logger.info(`Schedule "${name}" wrote ${report.backupDir}`);
  };
}

export class Scheduler {
  private schedules: Map<string, ScheduleState> = new Map();
  private running = false;
  /** A pass is awaiting its actions; ticks in the meantime are dropped */
  private checking = false;
  private checkInterval: NodeJS.Timeout | null = null;
  private readonly runAction: ScheduledAction;
  private readonly now: () => Date;
  private readonly intervalMs: number;

  constructor(config: HomestashConfig, options: SchedulerOptions = {}) {
    this.runAction = options.runAction ?? defaultAction(config);
    this.now = options.now ?? (() => new Date());
    this.intervalMs = options.intervalMs ?? 60 * 1000;

    for (const [name, schedule] of Object.entries(config.schedules)) {
      try {
        const cron = parseCron(schedule.cron, schedule.timezone);
        this.schedules.set(name, { name, config: schedule, cron, lastRun: null });
        logger.debug(`Parsed schedule "${name}": ${schedule.cron}`);
      } catch (error) {
        logger.error(`Failed to parse schedule "${name}": ${errorMessage(error)}`);
      }
    }
  }

  get size(): number {
    return this.schedules.size;
  }

  start(): void {
    if (this.running) {
      logger.warn("Scheduler is already running");
      return;
    }

    this.running = true;
    logger.info("Scheduler started");

    void this.checkSchedules();
    this.checkInterval = setInterval(() => {
      void this.checkSchedules();
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    logger.info("Scheduler stopped");
  }

  /**
   * Run every schedule due in the current minute slot, at most once per slot.
   * Actions never overlap: a pass started while another is still running
   * triggers nothing.
   */
  async checkSchedules(): Promise<string[]> {
    const slot = minuteSlot(this.now());
    if (this.checking) {
      for (const state of this.dueSchedules(slot)) {
        logger.warn(`Schedule "${state.name}" skipped: a previous run is still going`);
      }
      return [];
    }
    this.checking = true;
    try {
      return await this.runDueSchedules(slot);
    } finally {
      this.checking = false;
    }
  }

  private dueSchedules(slot: Date): ScheduleState[] {
    return [...this.schedules.values()].filter(
      (state) => matchesCron(state.cron, slot) && state.lastRun?.getTime() !== slot.getTime(),
    );
  }

  private async runDueSchedules(slot: Date): Promise<string[]> {
    const triggered: string[] = [];

    for (const state of this.dueSchedules(slot)) {
      const { name } = state;
      logger.info(`Schedule "${name}" triggered (${state.config.action})`);
      state.lastRun = slot;
      triggered.push(name);

      try {
        await this.runAction(name, state.config);
      } catch (error) {
        logger.error(`Schedule "${name}" failed: ${errorMessage(error)}`);
      }
    }

    return triggered;
  }

  getNextRun(scheduleName: string): Date | null {
    const state = this.schedules.get(scheduleName);
    return state ? getNextRun(state.cron, this.now()) : null;
  }

  getStatus(): ScheduleStatus[] {
    return [...this.schedules.values()].map((state) => ({
      name: state.name,
      cron: state.config.cron,
      action: state.config.action,
      lastRun: state.lastRun,
      nextRun: this.getNextRun(state.name),
    }));
  }
}
