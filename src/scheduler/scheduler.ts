import type { DigestSettings } from "../types/config";
import type { StateStore } from "../storage/stateStore";
import { formatDateInZone } from "../util/dates";
import { errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("scheduler");

export interface SchedulerCallbacks {
  onDaily: () => Promise<void>;
  /** True if the report for `date` is present in the archive. */
  reportExists: (date: string) => Promise<boolean>;
}

function parseTime(hhmm: string): { hour: number; minute: number } {
  const [h, m] = hhmm.split(":").map(Number);
  return { hour: h ?? 8, minute: m ?? 0 };
}

/** Minutes since local midnight of `d` in `timeZone`. */
function minutesIntoDay(d: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat("en-US", { timeZone, hourCycle: "h23", hour: "numeric", minute: "numeric" }).formatToParts(d);
  const get = (type: string) => Number(parts.find(p => p.type === type)?.value ?? 0);
  return get("hour") * 60 + get("minute");
}

export class Scheduler {
  private intervalId: NodeJS.Timeout | null = null;
  private running = false;
  private lastFailure: Date | null = null;

  constructor(
    private getSettings: () => DigestSettings,
    private stateStore: StateStore,
    private callbacks: SchedulerCallbacks,
    private now: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.intervalId !== null) return;
    // Tick every 60 seconds
    this.intervalId = setInterval(() => { void this.tick(); }, 60 * 1000);
  }

  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      await this.checkAndRun();
    } catch (err) {
      log.error("scheduled run failed", { error: errorMessage(err) });
    } finally {
      this.running = false;
    }
  }

  private async checkAndRun(): Promise<void> {
    const now = this.now();
    const settings = this.getSettings();
    const tz = settings.search.timezone;
    const state = this.stateStore.get();

    // ── Daily ────────────────────────────────────────────────────
    // Any tick at or after the daily time counts; a missed minute still runs.
    const dailyTime = parseTime(settings.schedule.dailyTime);
    if (minutesIntoDay(now, tz) < dailyTime.hour * 60 + dailyTime.minute) return;

    const today = formatDateInZone(now, tz);
    const lastRunDay = state.lastDailyRun ? formatDateInZone(new Date(state.lastDailyRun), tz) : "";
    const alreadyRanToday = lastRunDay === today;
    // Run if not run today, or if the last report was deleted since.
    const reportMissing = alreadyRanToday && state.lastReportDate !== ""
      && !(await this.callbacks.reportExists(state.lastReportDate));
    if (alreadyRanToday && !reportMissing) return;

    if (this.lastFailure) {
      const retryAt = this.lastFailure.getTime() + settings.schedule.retryAfterMinutes * 60 * 1000;
      if (now.getTime() < retryAt) return;
    }
    log.info(`triggering daily run (last run: ${state.lastDailyRun || "never"})`);
    try {
      await this.callbacks.onDaily();
      this.lastFailure = null;
    } catch (err) {
      this.lastFailure = now;
      log.warn(`next attempt in ${settings.schedule.retryAfterMinutes} minutes`);
      throw err;
    }
  }
}
