import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import { runDailyPipeline, type PipelineDeps } from "../pipeline/dailyPipeline";
import { runBackfillPipeline } from "../pipeline/backfillPipeline";
import { CallBudget } from "../llm/budget";
import { FileStore } from "../storage/fileStore";
import { SignalCache } from "../storage/signalCache";
import { StateStore } from "../storage/stateStore";
import { PersistenceError, UpstreamError } from "../errors";
import { sleep } from "../util/retry";
import type { Candidate } from "../types/paper";
import type { SearchParams } from "../sources/source";
import {
  FakeInference,
  FakeSignalSource,
  FakeSource,
  MemoryArchive,
  makeCandidate,
  makeSettings,
  makeTempDir,
  removeDir,
  type InferenceCall
} from "./helpers/fakes";

const NOW = new Date("2025-01-15T12:00:00Z");

function idIn(call: InferenceCall): string {
  const match = /- id: (\S+)/.exec(call.prompt);
  return match ? match[1] : "";
}

const SCORES = new Map([["2501.00001v1", 90], ["2501.00002v1", 75], ["2501.00003v1", 20]]);

function reply(call: InferenceCall): unknown {
  switch (call.task) {
    case "classify":
    case "review":
      return { isRelevant: true, score: SCORES.get(idIn(call)) ?? 0, matchedTerms: ["agent"], rationale: "r" };
    case "extract":
      return { problem: "Planning is hard.", method: "Agent planner with search.", paradigmRelation: "Extends agents.", quality: 4, localizedTitle: "规划" };
    case "summarize":
      return { summary: "Agents everywhere." };
    case "introduce":
      return { introduction: "Widely discussed." };
  }
}

function dayOf(params: SearchParams): string {
  return params.windowStart.toISOString().slice(0, 10);
}

describe("daily pipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function makeDeps(handler: (params: SearchParams) => Candidate[]): PipelineDeps & { archive: MemoryArchive; inference: FakeInference; source: FakeSource } {
    const settings = makeSettings();
    settings.rootFolder = dir;
    settings.search.keywordsInclude = ["agent"];
    const files = new FileStore();
    const budget = new CallBudget(settings.budget);
    return {
      settings,
      source: new FakeSource(handler),
      inference: new FakeInference(reply, budget),
      budget,
      signalSources: [
        new FakeSignalSource("huggingface", () => ({
          status: "ok",
          signals: [{ source: "huggingface", metric: "upvotes", value: 100, fetchedAt: NOW.toISOString() }]
        }))
      ],
      archive: new MemoryArchive(),
      signalCache: new SignalCache(files, dir),
      stateStore: new StateStore(files, dir),
      files,
      now: () => NOW,
      random: () => 0
    };
  }

  const todaysCandidates = (params: SearchParams): Candidate[] => dayOf(params) === "2025-01-15"
    ? [makeCandidate("2501.00001v1"), makeCandidate("2501.00002v1"), makeCandidate("2501.00003v1")]
    : [];

  it("writes nothing when no update is found", async () => {
    const deps = makeDeps(() => []);

    const result = await runDailyPipeline(deps);

    expect(result).toEqual({ status: "no-update", reason: "empty-lookback" });
    expect(deps.archive.writes).toBe(0);
    expect(deps.inference.calls).toHaveLength(0);
    expect(deps.stateStore.get().lastDailyRun).toBe(NOW.toISOString());
    expect(deps.stateStore.get().lastReportDate).toBe("");
  });

  it("runs every stage and writes one report", async () => {
    const deps = makeDeps(todaysCandidates);

    const result = await runDailyPipeline(deps);

    expect(result.status).toBe("written");
    if (result.status !== "written") return;
    const report = result.report;
    expect(deps.archive.writes).toBe(1);
    expect(deps.archive.reports.get("2025-01-15")).toBe(report);
    expect(report.date).toBe("2025-01-15");
    expect(report.windowStart).toBe("2025-01-15T00:00:00.000Z");
    expect(report.papers.map(p => p.id)).toEqual(["2501.00001v1", "2501.00002v1"]);
    expect(report.papers[0].localizedTitle).toBe("规划");
    expect(report.verdicts).toHaveLength(3);
    expect(report.stats).toEqual({ candidates: 3, selected: 2, extracted: 2, failed: 0 });
    expect(report.dayTrend).toMatchObject({ period: "day", summary: "Agents everywhere.", hasData: true });
    expect(report.weeklyTrend).toMatchObject({ period: "week", hasData: true });
    expect(report.monthlyTrend).toMatchObject({ period: "month", hasData: true });
    expect(report.spotlight.map(s => [s.paperId, s.attentionScore, s.introduction])).toEqual([
      ["2501.00001v1", 100, "Widely discussed."],
      ["2501.00002v1", 100, "Widely discussed."]
    ]);
    expect(report.audit[0]).toMatchObject({ stage: "resolve", subject: "2025-01-15", outcome: "success" });
    expect(report.audit.filter(a => a.stage === "extract").map(a => a.outcome)).toEqual(["success", "success"]);
    // 3 classify + 2 extract + 3 summaries + 2 introductions
    expect(report.usage).toEqual({ requests: 10, inputTokens: 100, outputTokens: 50 });
    expect(deps.stateStore.get()).toMatchObject({ lastDailyRun: NOW.toISOString(), lastReportDate: "2025-01-15" });
  });

  it("notes an exhausted call budget in the audit", async () => {
    const deps = makeDeps(todaysCandidates);
    deps.budget = new CallBudget({ maxRequests: 3, maxTokens: 0 });
    deps.inference = new FakeInference(reply, deps.budget);

    const result = await runDailyPipeline(deps);

    if (result.status !== "written") throw new Error("expected a report");
    expect(result.report.spotlight.map(s => s.introduction)).toEqual([
      "规划: Planning is hard. Agent planner with search.",
      "规划: Planning is hard. Agent planner with search."
    ]);
    expect(result.report.audit[result.report.audit.length - 1]).toEqual({
      stage: "budget",
      subject: "run",
      outcome: "degraded",
      detail: "requests=8 tokens=120"
    });
  });

  it("cancels unfinished work when the run budget runs out and still writes the report", async () => {
    const deps = makeDeps(todaysCandidates);
    deps.settings.runBudgetMs = 50;
    deps.inference = new FakeInference(async call => {
      if (call.task === "extract" && call.prompt.includes("- title: Paper 2501.00002v1\n")) await sleep(10_000, call.signal);
      return reply(call);
    });

    const result = await runDailyPipeline(deps);

    if (result.status !== "written") throw new Error("expected a report");
    const report = result.report;
    expect(deps.archive.writes).toBe(1);
    expect(report.papers.map(p => p.id)).toEqual(["2501.00001v1"]);
    expect(report.failures).toEqual([{ candidateId: "2501.00002v1", reason: "cancelled", attempts: 1 }]);
    expect(report.stats).toEqual({ candidates: 3, selected: 2, extracted: 1, failed: 1 });
    expect(report.spotlight).toEqual([]);
    expect(report.audit).toContainEqual({ stage: "spotlight", subject: "2501.00001v1|huggingface", outcome: "skipped", detail: "cancelled" });
    expect(report.audit[report.audit.length - 1]).toEqual({
      stage: "budget",
      subject: "run",
      outcome: "degraded",
      detail: "run budget of 50ms exhausted"
    });
  });

  it("records a persistence failure and rethrows it", async () => {
    const deps = makeDeps(todaysCandidates);
    deps.archive.failWith = new PersistenceError("disk full");

    await expect(runDailyPipeline(deps)).rejects.toBeInstanceOf(PersistenceError);
    expect(deps.stateStore.get().lastError).toMatchObject({ stage: "persist", message: "disk full" });
    expect(deps.stateStore.get().lastDailyRun).toBe("");
  });

  it("records a resolve failure", async () => {
    const deps = makeDeps(() => {
      throw new UpstreamError("HTTP 400", 400);
    });

    await expect(runDailyPipeline(deps)).rejects.toBeInstanceOf(UpstreamError);
    expect(deps.stateStore.get().lastError).toMatchObject({ stage: "resolve", message: "HTTP 400" });
  });

  it("dumps the candidates and stops on a dry run", async () => {
    const deps = makeDeps(todaysCandidates);
    const dumpPath = path.join(dir, "debug", "2025-01-15", "candidates.json");

    const result = await runDailyPipeline(deps, { dryRun: true });

    expect(result).toEqual({ status: "dry-run", date: "2025-01-15", candidates: 3, path: dumpPath });
    expect(deps.inference.calls).toHaveLength(0);
    expect(deps.archive.writes).toBe(0);
    expect(deps.stateStore.get().lastDailyRun).toBe("");
    const dump: unknown = JSON.parse((await deps.files.readFile(dumpPath)) ?? "null");
    expect(dump).toMatchObject({
      date: "2025-01-15",
      generatedAt: NOW.toISOString(),
      windowStart: "2025-01-15T00:00:00.000Z",
      mode: "latest-update",
      candidates: [{ id: "2501.00001v1" }, { id: "2501.00002v1" }, { id: "2501.00003v1" }]
    });
  });

  it("flushes the run log", async () => {
    const deps = makeDeps(() => []);
    await runDailyPipeline(deps);
    const log = await deps.files.readFile(path.join(dir, "cache", "runs.log"));
    expect(log).toContain("Step 1 RESOLVE: no update (empty-lookback, 7 requests)");
  });

  it("does not touch the last run for a target date", async () => {
    const deps = makeDeps(() => [makeCandidate("2501.00001v1")]);

    const result = await runDailyPipeline(deps, { targetDate: "2025-01-10" });

    expect(result).toMatchObject({ status: "written", report: { date: "2025-01-10" } });
    expect(deps.stateStore.get().lastDailyRun).toBe("");
  });
});

describe("backfill", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function makeDeps(handler: (params: SearchParams) => Candidate[]): PipelineDeps & { archive: MemoryArchive } {
    const settings = makeSettings();
    settings.rootFolder = dir;
    settings.spotlight.enabled = false;
    const files = new FileStore();
    const budget = new CallBudget(settings.budget);
    return {
      settings,
      source: new FakeSource(handler),
      inference: new FakeInference(reply, budget),
      budget,
      signalSources: [],
      archive: new MemoryArchive(),
      signalCache: new SignalCache(files, dir),
      stateStore: new StateStore(files, dir),
      files,
      now: () => NOW
    };
  }

  it("runs each day oldest first", async () => {
    const deps = makeDeps(params => {
      if (dayOf(params) === "2025-01-11") return [makeCandidate("2501.00001v1")];
      if (dayOf(params) === "2025-01-12") throw new UpstreamError("HTTP 400", 400);
      return [];
    });
    const seen: string[] = [];

    const result = await runBackfillPipeline(deps, {
      startDate: "2025-01-10",
      endDate: "2025-01-13",
      onProgress: date => seen.push(date)
    });

    expect(seen).toEqual(["2025-01-10", "2025-01-11", "2025-01-12", "2025-01-13"]);
    expect(result).toEqual({
      processed: ["2025-01-11"],
      noUpdate: ["2025-01-10", "2025-01-13"],
      errors: { "2025-01-12": "HTTP 400" }
    });
    expect([...deps.archive.reports.keys()]).toEqual(["2025-01-11"]);
  });

  it("rejects an inverted range", async () => {
    await expect(runBackfillPipeline(makeDeps(() => []), { startDate: "2025-01-12", endDate: "2025-01-10" }))
      .rejects.toThrow("startDate must be <= endDate");
  });

  it("rejects a range longer than backfillMaxDays", async () => {
    await expect(runBackfillPipeline(makeDeps(() => []), { startDate: "2025-01-01", endDate: "2025-03-01" }))
      .rejects.toThrow("exceeds backfillMaxDays (30)");
  });
});
