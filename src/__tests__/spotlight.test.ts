import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { computeAttentionScore, normalizeMetric } from "../scoring/attention";
import { fallbackIntroduction, scoreSpotlight, type SpotlightOptions } from "../pipeline/spotlight";
import { FileStore } from "../storage/fileStore";
import { SignalCache } from "../storage/signalCache";
import { UpstreamError } from "../errors";
import type { AttentionSignal } from "../types/paper";
import type { SignalFetchResult } from "../signals/signalSource";
import {
  FakeInference,
  FakeSignalSource,
  MemoryArchive,
  makeRecord,
  makeReport,
  makeTempDir,
  removeDir
} from "./helpers/fakes";

const FETCHED_AT = "2025-01-15T12:00:00.000Z";

function signal(source: string, metric: string, value: number): AttentionSignal {
  return { source, metric, value, fetchedAt: FETCHED_AT };
}

const WEIGHTS = { "a.x": 0.6, "b.y": 0.4 };
const LINEAR = { "a.x": { kind: "linear" as const, cap: 100 }, "b.y": { kind: "linear" as const, cap: 100 } };

describe("attention scoring", () => {
  it("normalizes log and linear metrics into [0, 1]", () => {
    expect(normalizeMetric(100, { kind: "log", cap: 100 })).toBe(1);
    expect(normalizeMetric(1000, { kind: "log", cap: 100 })).toBe(1);
    expect(normalizeMetric(25, { kind: "linear", cap: 50 })).toBe(0.5);
    expect(normalizeMetric(0, { kind: "log", cap: 100 })).toBe(0);
    expect(normalizeMetric(-3, { kind: "linear", cap: 50 })).toBe(0);
  });

  it("combines weighted metrics", () => {
    const score = computeAttentionScore([signal("a", "x", 100), signal("b", "y", 50)], WEIGHTS, LINEAR);
    expect(score).toEqual({ score: 80, reasons: ["a.x=100", "b.y=50"] });
  });

  it("renormalizes over the metrics that are present", () => {
    const score = computeAttentionScore([signal("b", "y", 50)], WEIGHTS, LINEAR);
    expect(score?.score).toBe(50);
  });

  it("is null when no weighted metric is present", () => {
    expect(computeAttentionScore([], WEIGHTS, LINEAR)).toBeNull();
    expect(computeAttentionScore([signal("c", "z", 10)], WEIGHTS, LINEAR)).toBeNull();
  });

  it("counts only the first value of a repeated metric", () => {
    const score = computeAttentionScore([signal("a", "x", 20), signal("a", "x", 100)], WEIGHTS, LINEAR);
    expect(score?.score).toBe(20);
  });
});

describe("scoreSpotlight", () => {
  let dir: string;
  let cache: SignalCache;

  beforeEach(async () => {
    dir = await makeTempDir();
    cache = new SignalCache(new FileStore(), dir);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function options(overrides: Partial<SpotlightOptions> = {}): SpotlightOptions {
    return {
      recentDays: 14,
      threshold: 40,
      maxItems: 3,
      weights: WEIGHTS,
      normalization: LINEAR,
      fetchTimeoutMs: 1000,
      concurrency: 4,
      perSourceConcurrency: 2,
      reportDate: "2025-01-15",
      periodEnd: new Date("2025-01-16T00:00:00Z"),
      language: "en",
      model: "smart",
      isBudgetExhausted: () => false,
      ...overrides
    };
  }

  const signalsA = new Map<string, SignalFetchResult>([
    ["2501.00001v1", { status: "ok", signals: [signal("a", "x", 100)] }],
    ["2501.00002v1", { status: "unavailable", reason: "a: HTTP 503" }],
    ["2501.00003v1", { status: "ok", signals: [signal("a", "x", 10)] }]
  ]);
  const signalsB = new Map<string, SignalFetchResult>([
    ["2501.00001v1", { status: "ok", signals: [signal("b", "y", 50)] }],
    ["2501.00002v1", { status: "ok", signals: [signal("b", "y", 90)] }],
    ["2501.00003v1", { status: "ok", signals: [signal("b", "y", 10)] }]
  ]);

  function sources() {
    return [
      new FakeSignalSource("a", id => signalsA.get(id) ?? { status: "ok", signals: [] }),
      new FakeSignalSource("b", id => signalsB.get(id) ?? { status: "ok", signals: [] })
    ];
  }

  const records = [makeRecord("2501.00001v1"), makeRecord("2501.00002v1"), makeRecord("2501.00003v1")];

  it("selects papers above the threshold, highest first", async () => {
    const inference = new FakeInference(() => ({ introduction: "Everyone is reading this." }));

    const { items, audit } = await scoreSpotlight(records, sources(), cache, new MemoryArchive(), inference, options());

    expect(items.map(i => [i.paperId, i.attentionScore])).toEqual([["2501.00002v1", 90], ["2501.00001v1", 80]]);
    expect(items[0].signals).toEqual([signal("b", "y", 90)]);
    expect(items[0].introduction).toBe("Everyone is reading this.");
    expect(audit).toEqual([{ stage: "spotlight", subject: "2501.00002v1|a", outcome: "degraded", detail: "a: HTTP 503" }]);
    expect(inference.callsFor("introduce")).toHaveLength(2);
  });

  it("honours maxItems", async () => {
    const inference = new FakeInference(() => ({ introduction: "Intro." }));
    const { items } = await scoreSpotlight(records, sources(), cache, new MemoryArchive(), inference, options({ maxItems: 1 }));
    expect(items.map(i => i.paperId)).toEqual(["2501.00002v1"]);
  });

  it("skips papers spotlighted in recent reports", async () => {
    const archive = new MemoryArchive([
      makeReport("2025-01-14", [], [{ paperId: "2501.00001v0", attentionScore: 70, signals: [], introduction: "old" }])
    ]);
    const inference = new FakeInference(() => ({ introduction: "Intro." }));
    const [a, b] = sources();

    const { items, audit } = await scoreSpotlight(records, [a, b], cache, archive, inference, options());

    expect(items.map(i => i.paperId)).toEqual(["2501.00002v1"]);
    expect(audit[0]).toEqual({ stage: "spotlight", subject: "2501.00001v1", outcome: "skipped", detail: "already spotlighted on 2025-01-14" });
    expect(a.calls).not.toContain("2501.00001v1");
  });

  it("ignores papers published before the recency window", async () => {
    const old = makeRecord("2501.00001v1", { published: "2024-12-01T00:00:00Z" });
    const [a, b] = sources();
    const inference = new FakeInference(() => ({ introduction: "Intro." }));

    const { items } = await scoreSpotlight([old], [a, b], cache, new MemoryArchive(), inference, options());

    expect(items).toEqual([]);
    expect(a.calls).toEqual([]);
  });

  it("falls back to a plain introduction when the budget is exhausted", async () => {
    const inference = new FakeInference(() => ({ introduction: "unused" }));

    const { items, audit } = await scoreSpotlight(records, sources(), cache, new MemoryArchive(), inference, options({
      maxItems: 1,
      isBudgetExhausted: () => true
    }));

    expect(inference.calls).toHaveLength(0);
    expect(items[0].introduction).toBe("Paper 2501.00002v1: Long contexts are slow. Sparse attention.");
    expect(audit).toContainEqual({ stage: "spotlight", subject: "2501.00002v1", outcome: "skipped", detail: "narrative skipped: call budget exhausted" });
  });

  it("falls back when the narrative call fails", async () => {
    const inference = new FakeInference(() => new UpstreamError("HTTP 500"));

    const { items, audit } = await scoreSpotlight(records, sources(), cache, new MemoryArchive(), inference, options({ maxItems: 1 }));

    expect(items[0].introduction).toBe(fallbackIntroduction(records[1]));
    expect(audit).toContainEqual({ stage: "spotlight", subject: "2501.00002v1", outcome: "degraded", detail: "narrative failed: HTTP 500" });
  });

  it("treats a throwing source as unavailable for that paper", async () => {
    const broken = new FakeSignalSource("a", () => {
      throw new Error("socket hang up");
    });
    const [, b] = sources();
    const inference = new FakeInference(() => ({ introduction: "Intro." }));

    const { items, audit } = await scoreSpotlight([records[1]], [broken, b], cache, new MemoryArchive(), inference, options());

    expect(items.map(i => i.attentionScore)).toEqual([90]);
    expect(audit).toContainEqual({ stage: "spotlight", subject: "2501.00002v1|a", outcome: "degraded", detail: "socket hang up" });
  });

  it("reuses cached signals for the same day", async () => {
    const inference = new FakeInference(() => ({ introduction: "Intro." }));
    await scoreSpotlight(records, sources(), cache, new MemoryArchive(), inference, options());

    const reloaded = new SignalCache(new FileStore(), dir);
    const [a, b] = sources();
    const { items } = await scoreSpotlight(records, [a, b], reloaded, new MemoryArchive(), inference, options());

    expect(items.map(i => i.paperId)).toEqual(["2501.00002v1", "2501.00001v1"]);
    expect(a.calls).toEqual(["2501.00002v1"]);
    expect(b.calls).toEqual([]);
  });
});
