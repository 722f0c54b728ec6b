import { type DateTime } from "luxon";
import { formatLogError } from "../utils/error-formatters";
import { type CheckRunner } from "./notifier";
import { getNow } from "./time";

// Wait before retrying after a failed tick, capped at half the check interval
export const RETRY_DELAY_MS = 10 * 1000;

// A gap this many intervals long means checks were missed
const GAP_FACTOR = 1.5;

export type SchedulerOptions = {
  intervalSeconds: number;
  runCheck: CheckRunner;
  retryDelayMs?: number;
  clock?: () => DateTime;
};

/**
 * Runs the check on a fixed interval and replays every interval boundary that was
 * skipped while the process was suspended or stalled.
 *
 * Owns `lastCheckTime`; only the scheduler's own sequential loop writes it.
 */
export class ReminderScheduler {
  private readonly intervalMs: number;
  private readonly retryDelayMs: number;
  private readonly runCheck: CheckRunner;
  private readonly clock: () => DateTime;

  private lastCheck: DateTime | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(options: SchedulerOptions) {
    if (!Number.isInteger(options.intervalSeconds) || options.intervalSeconds < 1) {
      throw new Error(`Check interval must be a whole number of seconds >= 1, got ${options.intervalSeconds}`);
    }
    this.intervalMs = options.intervalSeconds * 1000;
    this.retryDelayMs = Math.min(
      options.retryDelayMs ?? RETRY_DELAY_MS,
      Math.max(1, Math.floor(this.intervalMs / 2)),
    );
    this.runCheck = options.runCheck;
    this.clock = options.clock ?? getNow;
  }

  get lastCheckTime(): DateTime | null {
    return this.lastCheck;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * One scheduling step for the given instant.
   * `lastCheckTime` becomes `now` even when a check throws; the error is rethrown.
   */
  async tick(now: DateTime): Promise<void> {
    try {
      if (!this.lastCheck) {
        this.lastCheck = now.minus({ milliseconds: this.intervalMs });
        console.log(`[Scheduler] Initialized last check time to ${this.lastCheck.toISO()}`);
      }

      const last = this.lastCheck;
      const elapsedMs = now.toMillis() - last.toMillis();

      if (elapsedMs > this.intervalMs * GAP_FACTOR) {
        const missed = Math.floor(elapsedMs / this.intervalMs);
        console.warn(`[Scheduler] Missed ${missed} checks since ${last.toISO()}, replaying`);

        for (let i = 1; i <= missed; i++) {
          const reference = last.plus({ milliseconds: this.intervalMs * i });
          console.debug(`[Scheduler] Replaying check for ${reference.toISO()}`);
          await this.runCheck(reference, true);
        }
      }

      await this.runCheck(now, false);
    } finally {
      this.lastCheck = now;
    }
  }

  /**
   * Starts the loop: tick now, then every interval. A failed tick is logged and
   * retried after the shorter retry delay.
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    console.log(`[Scheduler] Checking every ${this.intervalMs / 1000} seconds`);
    void this.loop();
  }

  /**
   * Cancels the pending tick. A tick already in progress finishes on its own.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async loop(): Promise<void> {
    this.timer = null;
    let delayMs = this.intervalMs;

    try {
      await this.tick(this.clock());
    } catch (e) {
      console.error(`[Scheduler] Check failed, retrying in ${this.retryDelayMs / 1000}s: ${formatLogError(e)}`);
      delayMs = this.retryDelayMs;
    }

    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      void this.loop();
    }, delayMs);
  }
}
