import { describe, it, expect } from "vitest";
import {
  NO_DATA_SUMMARY,
  SUMMARY_UNAVAILABLE,
  buildDayTrend,
  buildPeriodTrend,
  trendWindow,
  type TrendOptions
} from "../pipeline/trends";
import { aggregateTerms, extractTerms, topTerms } from "../scoring/terms";
import { UpstreamError } from "../errors";
import { FakeInference, MemoryArchive, makeRecord, makeReport } from "./helpers/fakes";
import type { ResolvedPeriod } from "../types/paper";

function options(overrides: Partial<TrendOptions> = {}): TrendOptions {
  return {
    windowMode: "rolling",
    weeklyDays: 7,
    monthlyDays: 30,
    topK: 10,
    timezone: "UTC",
    language: "en",
    model: "smart",
    ...overrides
  };
}

const PERIOD: ResolvedPeriod = {
  label: "2025-01-15",
  start: "2025-01-15T00:00:00.000Z",
  end: "2025-01-16T00:00:00.000Z",
  mode: "latest-update"
};

describe("terms", () => {
  it("drops stopwords and short tokens", () => {
    expect(extractTerms("We propose sparse-attention for KV caches using RLHF.")).toEqual(["sparse-attention", "caches", "rlhf"]);
  });

  it("weights method above paradigm relation above abstract", () => {
    const totals = aggregateTerms([{ method: "diffusion planner", paradigmRelation: "diffusion", abstract: "planner" }]);
    expect(totals.get("diffusion")).toBe(3.5);
    expect(totals.get("planner")).toBe(3);
    expect(topTerms(totals, 10)).toEqual([
      { term: "diffusion", weight: 1 },
      { term: "planner", weight: 0.8571 }
    ]);
  });

  it("keeps first-seen order on ties and honours topK", () => {
    const totals = aggregateTerms([{ method: "", paradigmRelation: "", abstract: "alpha beta gamma" }]);
    expect(topTerms(totals, 2).map(k => k.term)).toEqual(["alpha", "beta"]);
  });
});

describe("trendWindow", () => {
  it("ends rolling windows on the report date", () => {
    expect(trendWindow("week", "2025-01-15", options())).toEqual({ startLabel: "2025-01-09", endLabel: "2025-01-15" });
    expect(trendWindow("month", "2025-01-15", options())).toEqual({ startLabel: "2024-12-17", endLabel: "2025-01-15" });
  });

  it("starts calendar windows on Monday and the first of the month", () => {
    expect(trendWindow("week", "2025-01-15", options({ windowMode: "calendar" }))).toEqual({ startLabel: "2025-01-13", endLabel: "2025-01-15" });
    expect(trendWindow("month", "2025-01-15", options({ windowMode: "calendar" }))).toEqual({ startLabel: "2025-01-01", endLabel: "2025-01-15" });
  });
});

describe("buildDayTrend", () => {
  it("marks an empty period without calling the model", async () => {
    const inference = new FakeInference(() => ({ summary: "unused" }));

    const { trend, audit } = await buildDayTrend(PERIOD, [], inference, options());

    expect(trend).toEqual({
      period: "day",
      start: PERIOD.start,
      end: PERIOD.end,
      summary: NO_DATA_SUMMARY,
      keywords: [],
      hasData: false
    });
    expect(audit).toEqual([]);
    expect(inference.calls).toHaveLength(0);
  });

  it("summarizes records deterministically", async () => {
    const inference = new FakeInference(() => ({ summary: "  Agents dominated.  " }));
    const records = [makeRecord("2501.00001v1", { method: "agent planner", paradigmRelation: "agent", abstract: "planner" })];

    const { trend } = await buildDayTrend(PERIOD, records, inference, options());

    expect(trend.summary).toBe("Agents dominated.");
    expect(trend.hasData).toBe(true);
    expect(trend.keywords[0]).toEqual({ term: "agent", weight: 1 });
    expect(inference.calls[0]).toMatchObject({ task: "summarize", deterministic: true, model: "smart" });
  });

  it("is idempotent for the same records", async () => {
    const inference = new FakeInference(() => ({ summary: "Same." }));
    const records = [makeRecord("2501.00001v1"), makeRecord("2501.00002v1", { method: "mixture of experts routing" })];

    const first = await buildDayTrend(PERIOD, records, inference, options());
    const second = await buildDayTrend(PERIOD, records, inference, options());

    expect(second).toEqual(first);
  });

  it("uses a placeholder when the summary call fails", async () => {
    const inference = new FakeInference(() => new UpstreamError("HTTP 500"));

    const { trend, audit } = await buildDayTrend(PERIOD, [makeRecord("2501.00001v1")], inference, options());

    expect(trend.summary).toBe(SUMMARY_UNAVAILABLE);
    expect(trend.hasData).toBe(true);
    expect(audit).toEqual([{ stage: "trend", subject: "day", outcome: "degraded", detail: "HTTP 500" }]);
  });
});

describe("buildPeriodTrend", () => {
  it("combines archived days with the current records", async () => {
    const archive = new MemoryArchive([
      makeReport("2025-01-01", [makeRecord("2501.00009v1", { title: "Too Old" })]),
      makeReport("2025-01-14", [makeRecord("2501.00001v1", { title: "First Version" })]),
      makeReport("2025-01-15", [makeRecord("2501.00005v1", { title: "Replaced Run" })])
    ]);
    const current = [
      makeRecord("2501.00001v2", { title: "Second Version" }),
      makeRecord("2501.00002v1", { title: "Fresh Paper" })
    ];
    const inference = new FakeInference(() => ({ summary: "Week summary." }));

    const { trend } = await buildPeriodTrend("week", "2025-01-15", current, archive, inference, options());

    expect(trend).toMatchObject({
      period: "week",
      start: "2025-01-09T00:00:00.000Z",
      end: "2025-01-16T00:00:00.000Z",
      summary: "Week summary.",
      hasData: true
    });
    const prompt = inference.calls[0].prompt;
    expect(prompt).toContain("Papers in this period: 2");
    expect(prompt).toContain("Second Version");
    expect(prompt).toContain("Fresh Paper");
    expect(prompt).not.toContain("First Version");
    expect(prompt).not.toContain("Replaced Run");
    expect(prompt).not.toContain("Too Old");
  });

  it("reports no data for an empty window", async () => {
    const inference = new FakeInference(() => ({ summary: "unused" }));

    const { trend } = await buildPeriodTrend("month", "2025-01-15", [], new MemoryArchive(), inference, options());

    expect(trend).toMatchObject({ period: "month", summary: NO_DATA_SUMMARY, keywords: [], hasData: false });
  });
});
