import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Scheduler } from "../scheduler/scheduler";
import { FileStore } from "../storage/fileStore";
import { StateStore } from "../storage/stateStore";
import { makeSettings, makeTempDir, removeDir } from "./helpers/fakes";

describe("Scheduler", () => {
  let dir: string;
  let state: StateStore;
  let runs: number;
  let existing: Set<string>;
  const settings = makeSettings();
  settings.schedule = { enabled: true, dailyTime: "08:30", retryAfterMinutes: 30 };

  beforeEach(async () => {
    dir = await makeTempDir();
    state = new StateStore(new FileStore(), dir);
    runs = 0;
    existing = new Set();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function scheduler(nowIso: string, onDaily: () => Promise<void> = async () => { runs++; }): Scheduler {
    return new Scheduler(() => settings, state, {
      onDaily,
      reportExists: async date => existing.has(date)
    }, () => new Date(nowIso));
  }

  it("waits for the daily time", async () => {
    await scheduler("2025-01-15T08:29:00Z").tick();
    expect(runs).toBe(0);
  });

  it("runs once the daily time has passed", async () => {
    await scheduler("2025-01-15T10:00:00Z").tick();
    expect(runs).toBe(1);
  });

  it("does not rerun a day whose report exists", async () => {
    await state.setLastDailyRun("2025-01-15T08:31:00.000Z", "2025-01-14");
    existing.add("2025-01-14");
    await scheduler("2025-01-15T10:00:00Z").tick();
    expect(runs).toBe(0);
  });

  it("does not rerun a day that found no update", async () => {
    await state.setLastDailyRun("2025-01-15T08:31:00.000Z");
    await scheduler("2025-01-15T10:00:00Z").tick();
    expect(runs).toBe(0);
  });

  it("reruns when today's report has been deleted", async () => {
    await state.setLastDailyRun("2025-01-15T08:31:00.000Z", "2025-01-14");
    await scheduler("2025-01-15T10:00:00Z").tick();
    expect(runs).toBe(1);
  });

  it("runs again on the next day", async () => {
    await state.setLastDailyRun("2025-01-14T08:31:00.000Z", "2025-01-14");
    existing.add("2025-01-14");
    await scheduler("2025-01-15T08:30:00Z").tick();
    expect(runs).toBe(1);
  });

  it("ignores a tick while a run is in progress", async () => {
    let release: () => void = () => {};
    const s = scheduler("2025-01-15T10:00:00Z", () => new Promise<void>(resolve => {
      runs++;
      release = resolve;
    }));

    const first = s.tick();
    expect(s.isRunning()).toBe(true);
    await s.tick();
    release();
    await first;

    expect(runs).toBe(1);
    expect(s.isRunning()).toBe(false);
  });

  it("waits retryAfterMinutes after a failed run", async () => {
    let clock = new Date("2025-01-15T10:00:00Z");
    let attempts = 0;
    const s = new Scheduler(() => settings, state, {
      onDaily: async () => {
        attempts++;
        throw new Error("upstream down");
      },
      reportExists: async () => false
    }, () => clock);

    await s.tick();
    clock = new Date("2025-01-15T10:01:00Z");
    await s.tick();
    clock = new Date("2025-01-15T10:29:00Z");
    await s.tick();
    expect(attempts).toBe(1);

    clock = new Date("2025-01-15T10:30:00Z");
    await s.tick();
    expect(attempts).toBe(2);
  });

  it("survives a failing run", async () => {
    const s = scheduler("2025-01-15T10:00:00Z", async () => {
      throw new Error("boom");
    });
    await expect(s.tick()).resolves.toBeUndefined();
    expect(s.isRunning()).toBe(false);
  });
});
