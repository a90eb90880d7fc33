import type { AuditEntry, KeywordWeight, PaperRecord, PeriodTrend, ResolvedPeriod } from "../types/paper";
import type { TrendConfig } from "../types/config";
import type { InferencePort } from "../llm/inference";
import type { ReportArchive } from "../storage/reportArchive";
import { SummaryOutputSchema } from "../schemas/inference.schema";
import { TREND_SUMMARY_PROMPT, fillTemplate, languageName } from "../prompts";
import { aggregateTerms, topTerms } from "../scoring/terms";
import { baseIdOf } from "../sources/versions";
import { addDays, dayBounds, startOfDayInZone, startOfIsoWeek, startOfMonth } from "../util/dates";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("trends");

export const NO_DATA_SUMMARY = "[no-data] No papers were recorded in this period.";
export const SUMMARY_UNAVAILABLE = "[summary-unavailable] Trend summary could not be generated.";

export interface TrendOptions extends Pick<TrendConfig, "windowMode" | "weeklyDays" | "monthlyDays" | "topK"> {
  timezone: string;
  language: "zh" | "en";
  model: string;
}

export interface TrendResult {
  trend: PeriodTrend;
  audit: AuditEntry[];
}

/** Inclusive label range of the week or month window that ends on `date`. */
export function trendWindow(period: "week" | "month", date: string, options: TrendOptions): { startLabel: string; endLabel: string } {
  if (options.windowMode === "calendar") {
    return { startLabel: period === "week" ? startOfIsoWeek(date) : startOfMonth(date), endLabel: date };
  }
  const days = period === "week" ? options.weeklyDays : options.monthlyDays;
  return { startLabel: addDays(date, -(days - 1)), endLabel: date };
}

function noDataTrend(period: PeriodTrend["period"], start: string, end: string): PeriodTrend {
  return { period, start, end, summary: NO_DATA_SUMMARY, keywords: [], hasData: false };
}

async function summarize(
  period: PeriodTrend["period"],
  start: string,
  end: string,
  records: PaperRecord[],
  keywords: KeywordWeight[],
  inference: InferencePort,
  options: TrendOptions
): Promise<{ summary: string; audit: AuditEntry[] }> {
  const highlights = records.slice(0, 20).map(r => ({
    title: r.title,
    problem: r.problem,
    method: r.method,
    quality: r.quality
  }));
  const prompt = fillTemplate(TREND_SUMMARY_PROMPT, {
    period,
    start,
    end,
    paper_count: String(records.length),
    keywords: keywords.map(k => `${k.term}: ${k.weight}`).join(", "),
    papers_json: JSON.stringify(highlights, null, 2),
    language: languageName(options.language)
  });

  const result = await inference.infer({
    task: "summarize",
    prompt,
    schema: SummaryOutputSchema,
    model: options.model,
    deterministic: true
  });
  if (result.ok) return { summary: result.value.summary.trim(), audit: [] };

  log.warn(`${period} summary failed, using placeholder`, { error: result.error.message });
  return {
    summary: SUMMARY_UNAVAILABLE,
    audit: [{ stage: "trend", subject: period, outcome: "degraded", detail: result.error.message }]
  };
}

async function buildTrend(
  period: PeriodTrend["period"],
  start: string,
  end: string,
  records: PaperRecord[],
  inference: InferencePort,
  options: TrendOptions
): Promise<TrendResult> {
  if (records.length === 0) {
    return { trend: noDataTrend(period, start, end), audit: [] };
  }
  const keywords = topTerms(aggregateTerms(records), options.topK);
  const { summary, audit } = await summarize(period, start, end, records, keywords, inference, options);
  return { trend: { period, start, end, summary, keywords, hasData: true }, audit };
}

/** Trend of the current run's own records over the resolved period. */
export async function buildDayTrend(
  resolved: ResolvedPeriod,
  records: PaperRecord[],
  inference: InferencePort,
  options: TrendOptions
): Promise<TrendResult> {
  return buildTrend("day", resolved.start, resolved.end, records, inference, options);
}

/**
 * Week or month trend ending on `date`: archived reports in the window plus
 * the current records. An archived report for `date` itself is ignored, since
 * `currentRecords` replaces it. A paper seen on several days counts once, in
 * its latest form.
 */
export async function buildPeriodTrend(
  period: "week" | "month",
  date: string,
  currentRecords: PaperRecord[],
  archive: ReportArchive,
  inference: InferencePort,
  options: TrendOptions
): Promise<TrendResult> {
  const { startLabel, endLabel } = trendWindow(period, date, options);
  const start = startOfDayInZone(startLabel, options.timezone).toISOString();
  const end = dayBounds(endLabel, options.timezone).end.toISOString();

  const history = (await archive.readRange(startLabel, endLabel)).filter(r => r.date !== date);
  const byPaper = new Map<string, PaperRecord>();
  for (const record of [...history.flatMap(r => r.papers), ...currentRecords]) {
    const key = baseIdOf(record.id);
    byPaper.delete(key);
    byPaper.set(key, record);
  }
  const records = [...byPaper.values()];
  log.info(`${period} window ${startLabel}..${endLabel}: ${history.length} archived reports, ${records.length} papers`);

  return buildTrend(period, start, end, records, inference, options);
}
