import { SCHEDULER_CONSTANTS } from "../constants";
import { describeSchedule, formatMinuteMarker, isDue } from "../utils/cron";
import { getErrorMessage } from "../utils/error-message";

import type { Logger } from "./logger.service";
import type { RunSummary } from "../types";
import type { ScheduleSpec } from "../types/schedule";

export type SchedulerState = "idle" | "firing";

export interface SchedulerStatus {
  state: SchedulerState;
  startedAt: Date;
  lastFireAt: Date | null;
  lastFireMinute: string | null;
  lastRunHadErrors: boolean | null;
}

export interface SchedulerOptions {
  schedule: ScheduleSpec;
  runOnStartup: boolean;
  task: () => Promise<RunSummary>;
  logger: Logger;
  pollIntervalMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  onStatusChange?: (status: SchedulerStatus) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Polls the clock and fires the task whenever the schedule matches, at most
 * once per minute marker. Runs are awaited, so a slow run delays the next
 * check instead of overlapping it.
 */
export class SchedulerService {
  private state: SchedulerState = "idle";
  private running = false;
  private startedAt: Date;
  private lastFireAt: Date | null = null;
  private lastFireMinute: string | null = null;
  private lastRunHadErrors: boolean | null = null;
  private clock: () => Date;
  private sleep: (ms: number) => Promise<void>;
  private pollIntervalMs: number;

  constructor(private options: SchedulerOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.pollIntervalMs = options.pollIntervalMs ?? SCHEDULER_CONSTANTS.POLL_INTERVAL_MS;
    this.startedAt = this.clock();
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      lastFireAt: this.lastFireAt,
      lastFireMinute: this.lastFireMinute,
      lastRunHadErrors: this.lastRunHadErrors,
    };
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    const { logger, schedule } = this.options;
    this.running = true;
    this.startedAt = this.clock();

    logger.info(`Sync schedule: ${schedule.expression} (${describeSchedule(schedule)})`);

    if (this.options.runOnStartup) {
      logger.info("🚀 Running initial sync on startup...");
      const now = this.clock();
      await this.fire(formatMinuteMarker(now), now);
    } else {
      logger.info("⏭️  Skipping initial sync on startup");
      await this.publishStatus();
    }

    logger.info("⏰ Scheduler is now running...");

    while (this.running) {
      await this.tick(this.clock());
      if (!this.running) {
        break;
      }
      await this.sleep(this.pollIntervalMs);
    }
  }

  /** Ends the loop after the current tick or sleep. */
  stop(): void {
    this.running = false;
  }

  /**
   * One wake-up: fires when the minute of `now` has not fired yet and the
   * schedule matches it. Returns whether the task ran.
   */
  async tick(now: Date): Promise<boolean> {
    const marker = formatMinuteMarker(now);
    if (marker === this.lastFireMinute) {
      return false;
    }
    if (!isDue(this.options.schedule, now)) {
      return false;
    }
    await this.fire(marker, now);
    return true;
  }

  private async fire(marker: string, now: Date): Promise<void> {
    const { logger } = this.options;
    logger.info("🔄 Starting scheduled fork synchronization...");
    this.state = "firing";
    await this.publishStatus();

    try {
      const summary = await this.options.task();
      this.lastRunHadErrors = summary.errors.length > 0;
      if (this.lastRunHadErrors) {
        logger.warn(`❌ Fork synchronization finished with ${summary.errors.length} error(s)`);
      } else {
        logger.info("✅ Fork synchronization completed successfully");
      }
    } catch (error) {
      this.lastRunHadErrors = true;
      logger.error("❌ Fork synchronization failed:", error);
    } finally {
      this.lastFireMinute = marker;
      this.lastFireAt = now;
      this.state = "idle";
      await this.publishStatus();
    }
  }

  private async publishStatus(): Promise<void> {
    if (!this.options.onStatusChange) {
      return;
    }
    try {
      await this.options.onStatusChange(this.getStatus());
    } catch (error) {
      this.options.logger.warn(`⚠️  Could not publish scheduler status: ${getErrorMessage(error)}`);
    }
  }
}
