/**
 * SyncScheduler - runs the outbound pass on a fixed interval.
 */

import * as cron from "node-cron";
import type { Logger } from "pino";
import type { OutboundPassSummary, OutboundSyncEngine } from "./outbound.js";
import { ConfigurationError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";

export const DEFAULT_INTERVAL_MINUTES = 5;

/**
 * A started/stopped repeating task.
 */
export interface TimerTask {
  start(): void;
  stop(): void;
}

/**
 * Creates a repeating task for a cron expression. The task must not be running yet.
 */
export type TaskFactory = (expression: string, tick: () => void) => TimerTask;

export interface SchedulerConfig {
  engine: OutboundSyncEngine;
  /** Whole minutes between passes, 1–59. */
  intervalMinutes?: number;
  /** Run one pass immediately on `start()`. */
  runOnStart?: boolean;
  logger?: Logger;
  createTask?: TaskFactory;
}

/**
 * Build the cron expression for "every N minutes".
 * @throws ConfigurationError when N is not an integer between 1 and 59
 */
export function intervalExpression(minutes: number): string {
  if (!Number.isInteger(minutes) || minutes < 1 || minutes > 59) {
    throw new ConfigurationError(
      `Sync interval must be a whole number of minutes between 1 and 59, got ${minutes}`
    );
  }
  return minutes === 1 ? "* * * * *" : `*/${minutes} * * * *`;
}

const cronTaskFactory: TaskFactory = (expression, tick) =>
  cron.schedule(expression, tick, { scheduled: false, timezone: "UTC" });

export class SyncScheduler {
  private readonly engine: OutboundSyncEngine;
  private readonly expression: string;
  private readonly runOnStart: boolean;
  private readonly logger: Logger;
  private readonly createTask: TaskFactory;
  private task: TimerTask | null = null;
  private inFlight: Promise<OutboundPassSummary | null> | null = null;

  constructor(config: SchedulerConfig) {
    this.engine = config.engine;
    this.expression = intervalExpression(config.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES);
    this.runOnStart = config.runOnStart ?? false;
    this.logger = config.logger ?? createLogger("scheduler");
    this.createTask = config.createTask ?? cronTaskFactory;
  }

  get started(): boolean {
    return this.task !== null;
  }

  /**
   * Start the timer. Call only after the store is reachable.
   */
  start(): void {
    if (this.task) {
      return;
    }
    this.task = this.createTask(this.expression, () => {
      this.tick();
    });
    this.task.start();
    this.logger.info({ expression: this.expression }, "Outbound scheduler started");

    if (this.runOnStart) {
      this.tick();
    }
  }

  /**
   * Run a pass now. Waits for any pass in progress, then runs its own.
   */
  async trigger(): Promise<OutboundPassSummary> {
    return this.engine.run();
  }

  /**
   * Stop the timer and wait for the in-flight pass to finish.
   */
  async stop(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info("Outbound scheduler stopped");
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    await this.engine.waitForIdle();
  }

  private tick(): void {
    if (this.engine.running) {
      this.logger.info("Outbound pass still running; tick skipped");
      return;
    }

    const pass = this.engine
      .run()
      .catch((error: unknown) => {
        this.logger.error({ error: describeError(error) }, "Scheduled outbound pass failed");
        return null;
      })
      .finally(() => {
        if (this.inFlight === pass) {
          this.inFlight = null;
        }
      });
    this.inFlight = pass;
  }
}
