import type { AttentionSignal, AuditEntry, PaperRecord, SpotlightItem } from "../types/paper";
import type { SpotlightConfig } from "../types/config";
import type { InferencePort } from "../llm/inference";
import type { SignalFetchResult, SignalSource } from "../signals/signalSource";
import type { SignalCache } from "../storage/signalCache";
import type { ReportArchive } from "../storage/reportArchive";
import { IntroductionOutputSchema } from "../schemas/inference.schema";
import { SPOTLIGHT_INTRO_PROMPT, fillTemplate, languageName } from "../prompts";
import { computeAttentionScore } from "../scoring/attention";
import { baseIdOf } from "../sources/versions";
import { Limiter } from "../util/limiter";
import { runPool } from "../util/pool";
import { withTimeout } from "../util/retry";
import { addDays } from "../util/dates";
import { errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("spotlight");

const DAY_MS = 86400000;

export interface SpotlightOptions extends Pick<SpotlightConfig,
  "recentDays" | "threshold" | "maxItems" | "weights" | "normalization" | "fetchTimeoutMs" | "concurrency" | "perSourceConcurrency"> {
  /** Label of the report being built; also the signal cache day. */
  reportDate: string;
  /** End of the resolved period; recency is measured back from here. */
  periodEnd: Date;
  language: "zh" | "en";
  model: string;
  isBudgetExhausted: () => boolean;
  signal?: AbortSignal;
}

export interface SpotlightResult {
  items: SpotlightItem[];
  audit: AuditEntry[];
}

interface FetchTask {
  record: PaperRecord;
  source: SignalSource;
}

type FetchOutcome = SignalFetchResult & { cached: boolean };

/** Deterministic introduction used when no narrative call is made or it fails. */
export function fallbackIntroduction(record: PaperRecord): string {
  const title = record.localizedTitle ?? record.title;
  return `${title}: ${record.problem} ${record.method}`.trim();
}

function isRecent(record: PaperRecord, periodEnd: Date, recentDays: number): boolean {
  const published = new Date(record.published).getTime();
  if (Number.isNaN(published)) return false;
  return periodEnd.getTime() - published <= recentDays * DAY_MS;
}

/** Base ids spotlighted by archived reports in the `recentDays` before `reportDate`. */
async function recentlySpotlighted(archive: ReportArchive, reportDate: string, recentDays: number): Promise<Map<string, string>> {
  const reports = await archive.readRange(addDays(reportDate, -recentDays), addDays(reportDate, -1));
  const seen = new Map<string, string>();
  for (const report of reports) {
    for (const item of report.spotlight) seen.set(baseIdOf(item.paperId), report.date);
  }
  return seen;
}

/**
 * Pick the day's papers drawing unusual outside attention.
 *
 * Signals are looked up in the day's cache first; misses are fetched through a
 * limiter per source, each with its own timeout. A source that fails only drops
 * out of that paper's score. Narratives are written for selected items only.
 */
export async function scoreSpotlight(
  records: PaperRecord[],
  sources: SignalSource[],
  cache: SignalCache,
  archive: ReportArchive,
  inference: InferencePort,
  options: SpotlightOptions
): Promise<SpotlightResult> {
  const audit: AuditEntry[] = [];
  if (sources.length === 0) {
    log.info("no signal sources enabled");
    return { items: [], audit };
  }

  // ── Eligibility ───────────────────────────────────────────────
  const already = await recentlySpotlighted(archive, options.reportDate, options.recentDays);
  const eligible: PaperRecord[] = [];
  for (const record of records) {
    if (!isRecent(record, options.periodEnd, options.recentDays)) continue;
    const previous = already.get(baseIdOf(record.id));
    if (previous) {
      audit.push({ stage: "spotlight", subject: record.id, outcome: "skipped", detail: `already spotlighted on ${previous}` });
      continue;
    }
    eligible.push(record);
  }
  if (eligible.length === 0) return { items: [], audit };

  // ── Signals ───────────────────────────────────────────────────
  await cache.load(options.reportDate);
  const limiters = new Map(sources.map(s => [s.name, new Limiter(options.perSourceConcurrency)]));
  const tasks: FetchTask[] = eligible.flatMap(record => sources.map(source => ({ record, source })));

  const outcomes = await runPool(tasks, options.concurrency, async ({ record, source }): Promise<FetchOutcome> => {
    const cached = cache.get(record.id, source.name, options.reportDate);
    if (cached) return { status: "ok", signals: cached, cached: true };

    const limiter = limiters.get(source.name) ?? new Limiter(1);
    let result: SignalFetchResult;
    try {
      result = await limiter.run(() => withTimeout(
        signal => source.fetchSignals(record.id, signal),
        options.fetchTimeoutMs,
        options.signal
      ));
    } catch (err) {
      if (options.signal?.aborted) throw err;
      result = { status: "unavailable", reason: errorMessage(err) };
    }
    if (result.status === "ok") cache.put(record.id, source.name, options.reportDate, result.signals);
    return { ...result, cached: false };
  }, options.signal);

  try {
    await cache.save();
  } catch (err) {
    log.warn("failed to save signal cache", { error: errorMessage(err) });
  }

  const cacheHits = outcomes.filter(o => o.ok && o.value.cached).length;
  log.debug(`signals: ${tasks.length} lookups, ${cacheHits} from cache`);

  const signalsByPaper = new Map<string, AttentionSignal[]>(eligible.map(r => [r.id, []]));
  outcomes.forEach((outcome, k) => {
    const { record, source } = tasks[k];
    const subject = `${record.id}|${source.name}`;
    if (!outcome.ok) {
      audit.push({ stage: "spotlight", subject, outcome: "skipped", detail: outcome.cancelled ? "cancelled" : errorMessage(outcome.error) });
      return;
    }
    if (outcome.value.status === "unavailable") {
      audit.push({ stage: "spotlight", subject, outcome: "degraded", detail: outcome.value.reason });
      return;
    }
    signalsByPaper.get(record.id)?.push(...outcome.value.signals);
  });

  // ── Scoring ───────────────────────────────────────────────────
  const scored: Array<{ record: PaperRecord; score: number; signals: AttentionSignal[] }> = [];
  for (const record of eligible) {
    const signals = signalsByPaper.get(record.id) ?? [];
    const attention = computeAttentionScore(signals, options.weights, options.normalization);
    if (attention === null) continue;
    log.debug(`${record.id}: attention ${attention.score} (${attention.reasons.join(", ")})`);
    if (attention.score >= options.threshold) scored.push({ record, score: attention.score, signals });
  }
  // Array.prototype.sort is stable: equal scores keep paper order.
  const selected = scored.sort((a, b) => b.score - a.score).slice(0, options.maxItems);

  // ── Narratives ────────────────────────────────────────────────
  const items: SpotlightItem[] = [];
  for (const { record, score, signals } of selected) {
    let introduction = fallbackIntroduction(record);
    if (options.isBudgetExhausted()) {
      audit.push({ stage: "spotlight", subject: record.id, outcome: "skipped", detail: "narrative skipped: call budget exhausted" });
    } else {
      const result = await inference.infer({
        task: "introduce",
        prompt: fillTemplate(SPOTLIGHT_INTRO_PROMPT, {
          title: record.title,
          problem: record.problem,
          method: record.method,
          signals: signals.map(s => `${s.source}.${s.metric}=${s.value}`).join(", "),
          language: languageName(options.language)
        }),
        schema: IntroductionOutputSchema,
        model: options.model,
        deterministic: true,
        signal: options.signal
      });
      if (result.ok) {
        introduction = result.value.introduction.trim();
      } else {
        audit.push({ stage: "spotlight", subject: record.id, outcome: "degraded", detail: `narrative failed: ${result.error.message}` });
      }
    }
    items.push({ paperId: record.id, attentionScore: score, signals, introduction });
  }

  log.info(`spotlight: ${items.length} of ${eligible.length} eligible papers`);
  return { items, audit };
}
