import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { CycleOutcome, DayRolloverResult, SignalPipeline } from "./signalPipeline";
import type { TradingCalendar } from "./tradingCalendar";

export type TickResult =
  | { status: "in_flight" }
  | { status: "outside_session"; rollover: DayRolloverResult | null }
  | { status: "ran"; rollover: DayRolloverResult | null; outcome: CycleOutcome }
  | { status: "error"; error: string };

const log = logger.scope("scheduler");

export class BotScheduler {
  private timer: NodeJS.Timeout | null = null;
  private intervalMs = 0;
  private nextRunAtMs: number | null = null;
  private lastRunStartedAtMs: number | null = null;
  private lastRunFinishedAtMs: number | null = null;
  private lastRunError: string | null = null;
  private runInFlight = false;

  constructor(
    private readonly pipeline: SignalPipeline,
    private readonly calendar: TradingCalendar,
    private readonly pollIntervalSeconds: number
  ) {}

  start(): void {
    if (this.timer) return;
    this.intervalMs = this.pollIntervalSeconds * 1000;
    this.nextRunAtMs = Date.now() + this.intervalMs;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    log.info(`Scheduler started: every ${this.pollIntervalSeconds} seconds`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.nextRunAtMs = null;
    log.info("Scheduler stopped");
  }

  get running(): boolean {
    return this.timer !== null;
  }

  getRuntimeStatus(nowMs = Date.now()): {
    running: boolean;
    intervalMs: number;
    intervalSeconds: number;
    inFlight: boolean;
    withinSession: boolean;
    lastRunStartedAt: string | null;
    lastRunFinishedAt: string | null;
    lastRunStatus: "idle" | "running" | "success" | "error";
    lastRunError: string | null;
    nextAutoRunAt: string | null;
    nextAutoRunInMs: number | null;
  } {
    const running = this.running;
    const lastRunStatus = this.runInFlight
      ? "running"
      : this.lastRunError
        ? "error"
        : this.lastRunFinishedAtMs
          ? "success"
          : "idle";

    return {
      running,
      intervalMs: this.intervalMs,
      intervalSeconds: this.intervalMs > 0 ? this.intervalMs / 1000 : this.pollIntervalSeconds,
      inFlight: this.runInFlight,
      withinSession: this.calendar.isWithinSession(new Date(nowMs)),
      lastRunStartedAt:
        this.lastRunStartedAtMs !== null ? new Date(this.lastRunStartedAtMs).toISOString() : null,
      lastRunFinishedAt:
        this.lastRunFinishedAtMs !== null ? new Date(this.lastRunFinishedAtMs).toISOString() : null,
      lastRunStatus,
      lastRunError: this.lastRunError,
      nextAutoRunAt: this.nextRunAtMs !== null ? new Date(this.nextRunAtMs).toISOString() : null,
      nextAutoRunInMs:
        running && this.nextRunAtMs !== null ? Math.max(0, this.nextRunAtMs - nowMs) : null
    };
  }

  /**
   * One scheduled tick: rolls the day over when the market date changed,
   * then runs a cycle if the session is open. Skipped while a cycle runs.
   */
  async tick(now: Date = new Date()): Promise<TickResult> {
    return this.guarded(async () => {
      const rollover = await this.rolloverIfNeeded(now);
      if (!this.calendar.isWithinSession(now)) {
        return { status: "outside_session", rollover };
      }
      const outcome = await this.pipeline.runCycle();
      return { status: "ran", rollover, outcome };
    });
  }

  /** Manual cycle that ignores the session gate. */
  async runNow(now: Date = new Date()): Promise<TickResult> {
    return this.guarded(async () => {
      const rollover = await this.rolloverIfNeeded(now);
      const outcome = await this.pipeline.runCycle();
      return { status: "ran", rollover, outcome };
    });
  }

  async rollover(dayKey: string, isExpiryDay: boolean): Promise<DayRolloverResult | null> {
    if (this.runInFlight) return null;
    this.runInFlight = true;
    try {
      return await this.pipeline.rolloverDay(dayKey, isExpiryDay);
    } finally {
      this.runInFlight = false;
    }
  }

  private async rolloverIfNeeded(now: Date): Promise<DayRolloverResult | null> {
    const dayKey = this.calendar.dayKey(now);
    if (dayKey === this.pipeline.dayKey) return null;
    return this.pipeline.rolloverDay(dayKey, this.calendar.isExpiryDay(now));
  }

  private async guarded(run: () => Promise<TickResult>): Promise<TickResult> {
    if (this.runInFlight) {
      log.debug("Tick skipped: previous cycle still running");
      return { status: "in_flight" };
    }

    this.runInFlight = true;
    const startedMs = Date.now();
    this.lastRunStartedAtMs = startedMs;
    if (this.intervalMs > 0) {
      this.nextRunAtMs = startedMs + this.intervalMs;
    }

    try {
      const result = await run();
      this.lastRunError = null;
      return result;
    } catch (error) {
      this.lastRunError = errorMessage(error);
      log.error("Scheduled tick failed", error);
      return { status: "error", error: this.lastRunError };
    } finally {
      this.lastRunFinishedAtMs = Date.now();
      this.runInFlight = false;
    }
  }
}
