import path from "path";
import type { DigestSettings } from "../types/config";
import type { AuditEntry, DailyReport, RunState, SpotlightItem } from "../types/paper";
import type { CandidateSource } from "../sources/source";
import type { InferencePort } from "../llm/inference";
import type { SignalSource } from "../signals/signalSource";
import type { ReportArchive } from "../storage/reportArchive";
import { ArxivSource } from "../sources/arxivSource";
import { LlmInference, buildLLMProvider } from "../llm/inference";
import { CallBudget } from "../llm/budget";
import { SemanticScholarSource } from "../signals/semanticScholarSource";
import { HFSource } from "../signals/hfSource";
import { FileStore } from "../storage/fileStore";
import { FileReportArchive } from "../storage/reportArchive";
import { SignalCache } from "../storage/signalCache";
import { StateStore } from "../storage/stateStore";
import { resolvePeriod, type NoUpdateReason } from "./timeWindow";
import { filterCandidates } from "./relevanceFilter";
import { extractPapers } from "./extraction";
import { buildDayTrend, buildPeriodTrend, type TrendOptions } from "./trends";
import { scoreSpotlight } from "./spotlight";
import { PersistenceError, errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const logger = createModuleLogger("daily");

const RUN_LOG_MAX_BYTES = 512 * 1024;

export interface PipelineDeps {
  settings: DigestSettings;
  source: CandidateSource;
  inference: InferencePort;
  budget: CallBudget;
  signalSources: SignalSource[];
  archive: ReportArchive;
  signalCache: SignalCache;
  stateStore: StateStore;
  files: FileStore;
  now?: () => Date;
  random?: () => number;
}

/** Production wiring for a settings value. */
export function createPipelineDeps(settings: DigestSettings): PipelineDeps {
  const files = new FileStore();
  const budget = new CallBudget(settings.budget);
  const signalSources: SignalSource[] = [];
  if (settings.spotlight.enabled) {
    for (const name of settings.spotlight.sources) {
      signalSources.push(name === "semantic_scholar"
        ? new SemanticScholarSource(settings.spotlight.semanticScholarApiKey)
        : new HFSource());
    }
  }
  return {
    settings,
    source: new ArxivSource(),
    inference: new LlmInference(buildLLMProvider(settings.llm), settings.llm, budget),
    budget,
    signalSources,
    archive: new FileReportArchive(files, settings.rootFolder),
    signalCache: new SignalCache(files, settings.rootFolder),
    stateStore: new StateStore(files, settings.rootFolder),
    files
  };
}

export interface DailyPipelineOptions {
  /** Resolve exactly this day (backfill) instead of the configured mode. */
  targetDate?: string;
  /** Stop after resolving: dump the candidates, make no model calls, write no report. */
  dryRun?: boolean;
  /** Called at each major pipeline step with a human-readable status message */
  onProgress?: (msg: string) => void;
}

export type DailyRunResult =
  | { status: "written"; report: DailyReport }
  | { status: "no-update"; reason: NoUpdateReason }
  | { status: "dry-run"; date: string; candidates: number; path: string };

/** `<rootFolder>/debug/<date>/candidates.json` */
export function candidateDumpPath(rootFolder: string, date: string): string {
  return path.join(rootFolder, "debug", date, "candidates.json");
}

type ErrorStage = NonNullable<RunState["lastError"]>["stage"];

export async function runDailyPipeline(deps: PipelineDeps, options: DailyPipelineOptions = {}): Promise<DailyRunResult> {
  const { settings, inference, budget, archive, stateStore } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const logPath = path.join(settings.rootFolder, "cache", "runs.log");

  const logLines: string[] = [];
  const log = (msg: string) => {
    logLines.push(`[${new Date().toISOString()}] ${msg}`);
    logger.info(msg);
  };
  const progress = options.onProgress ?? (() => {});

  let stage: ErrorStage = "resolve";
  const controller = new AbortController();
  const runTimer = setTimeout(() => {
    log(`Run budget of ${settings.runBudgetMs}ms exhausted, cancelling in-flight work`);
    controller.abort();
  }, settings.runBudgetMs);
  runTimer.unref();

  budget.reset();
  log(`=== Daily pipeline START ${options.targetDate ? `target=${options.targetDate}` : `mode=${settings.search.mode}`}${options.dryRun ? " (dry run)" : ""} ===`);
  log(`Settings: categories=[${settings.search.categories.join(",")}] include=${settings.search.keywordsInclude.length} exclude=${settings.search.keywordsExclude.length}`);

  try {
    // ── Step 1: Resolve period ──────────────────────────────────
    progress("[1/5] resolving update period...");
    const resolution = await resolvePeriod(deps.source, {
      categories: settings.search.categories,
      mode: settings.search.mode,
      timeWindowHours: settings.search.timeWindowHours,
      lookbackDays: settings.search.lookbackDays,
      maxTotalAttempts: settings.search.maxTotalAttempts,
      timezone: settings.search.timezone,
      maxResults: settings.search.maxResults,
      retry: settings.search.retry,
      now,
      targetDate: options.targetDate,
      random: deps.random
    });
    if (resolution.status === "no-update") {
      log(`Step 1 RESOLVE: no update (${resolution.reason}, ${resolution.attempts} requests)`);
      if (!options.targetDate && !options.dryRun) await stateStore.setLastDailyRun(now.toISOString());
      log(`=== Daily pipeline END no-update ===`);
      return { status: "no-update", reason: resolution.reason };
    }
    const { period, candidates } = resolution;
    const date = period.label;
    log(`Step 1 RESOLVE: ${date} [${period.start} → ${period.end}) ${candidates.length} candidates`);

    if (options.dryRun) {
      stage = "persist";
      const dumpPath = candidateDumpPath(settings.rootFolder, date);
      await deps.files.writeFile(dumpPath, JSON.stringify({
        date,
        generatedAt: now.toISOString(),
        windowStart: period.start,
        windowEnd: period.end,
        mode: period.mode,
        candidates
      }, null, 2));
      log(`Step 1 DRY RUN: ${candidates.length} candidates written to ${dumpPath}`);
      log(`=== Daily pipeline END dry-run ===`);
      return { status: "dry-run", date, candidates: candidates.length, path: dumpPath };
    }

    // ── Step 2: Relevance filter ────────────────────────────────
    stage = "filter";
    progress(`[2/5] judging ${candidates.length} candidates...`);
    const filtered = await filterCandidates(candidates, inference, {
      ...settings.filter,
      keywordsInclude: settings.search.keywordsInclude,
      keywordsExclude: settings.search.keywordsExclude,
      fastModel: settings.llm.fastModel,
      reviewModel: settings.llm.smartModel,
      deterministic: settings.llm.deterministic,
      isBudgetExhausted: () => budget.exhausted,
      random: deps.random
    });
    log(`Step 2 FILTER: selected ${filtered.selected.length}/${candidates.length}`);

    // ── Step 3: Extraction ──────────────────────────────────────
    stage = "extract";
    progress(`[3/5] extracting ${filtered.selected.length} papers...`);
    const extracted = await extractPapers(filtered.selected, inference, {
      ...settings.extraction,
      model: settings.llm.smartModel,
      deterministic: settings.llm.deterministic,
      language: settings.language,
      keywordsInclude: settings.search.keywordsInclude,
      signal: controller.signal,
      random: deps.random
    });
    log(`Step 3 EXTRACT: ${extracted.records.length} records, ${extracted.failures.length} failures`);
    for (const f of extracted.failures) log(`Step 3 EXTRACT FAILED: ${f.candidateId} after ${f.attempts} attempts: ${f.reason}`);

    // ── Step 4: Trends + spotlight ──────────────────────────────
    progress("[4/5] aggregating trends and attention...");
    const trendOptions: TrendOptions = {
      ...settings.trend,
      timezone: settings.search.timezone,
      language: settings.language,
      model: settings.llm.smartModel
    };
    const day = await buildDayTrend(period, extracted.records, inference, trendOptions);
    const week = settings.trend.enableWeekly
      ? await buildPeriodTrend("week", date, extracted.records, archive, inference, trendOptions)
      : null;
    const month = settings.trend.enableMonthly
      ? await buildPeriodTrend("month", date, extracted.records, archive, inference, trendOptions)
      : null;
    log(`Step 4 TRENDS: day=${day.trend.keywords.length} terms weekly=${week?.trend.hasData ?? "off"} monthly=${month?.trend.hasData ?? "off"}`);

    let spotlight: SpotlightItem[] = [];
    const spotlightAudit: AuditEntry[] = [];
    if (settings.spotlight.enabled) {
      const result = await scoreSpotlight(extracted.records, deps.signalSources, deps.signalCache, archive, inference, {
        ...settings.spotlight,
        reportDate: date,
        periodEnd: new Date(period.end),
        language: settings.language,
        model: settings.llm.smartModel,
        isBudgetExhausted: () => budget.exhausted,
        signal: controller.signal
      });
      spotlight = result.items;
      spotlightAudit.push(...result.audit);
    }
    log(`Step 4 SPOTLIGHT: ${spotlight.length} items${settings.spotlight.enabled ? "" : " (disabled)"}`);

    // ── Step 5: Assemble + persist ──────────────────────────────
    const usage = budget.usage();
    const audit: AuditEntry[] = [
      ...resolution.audit,
      ...filtered.audit,
      ...extracted.audit,
      ...day.audit,
      ...(week?.audit ?? []),
      ...(month?.audit ?? []),
      ...spotlightAudit
    ];
    if (budget.exhausted) {
      log(`WARNING: call budget exhausted (requests=${usage.requests} tokens=${usage.inputTokens + usage.outputTokens})`);
      audit.push({ stage: "budget", subject: "run", outcome: "degraded", detail: `requests=${usage.requests} tokens=${usage.inputTokens + usage.outputTokens}` });
    }
    if (controller.signal.aborted) {
      audit.push({ stage: "budget", subject: "run", outcome: "degraded", detail: `run budget of ${settings.runBudgetMs}ms exhausted` });
    }

    const report: DailyReport = {
      date,
      generatedAt: now.toISOString(),
      windowStart: period.start,
      windowEnd: period.end,
      mode: period.mode,
      categories: [...settings.search.categories],
      keywordsInclude: [...settings.search.keywordsInclude],
      keywordsExclude: [...settings.search.keywordsExclude],
      dayTrend: day.trend,
      papers: extracted.records,
      verdicts: filtered.verdicts,
      failures: extracted.failures,
      weeklyTrend: week?.trend ?? null,
      monthlyTrend: month?.trend ?? null,
      spotlight,
      audit,
      stats: {
        candidates: candidates.length,
        selected: filtered.selected.length,
        extracted: extracted.records.length,
        failed: extracted.failures.length
      },
      usage
    };

    stage = "persist";
    progress("[5/5] writing report...");
    await archive.write(date, report);
    log(`Step 5 WRITE: report ${date} (${report.papers.length} papers, ${audit.length} audit entries)`);

    if (!options.targetDate) {
      await stateStore.setLastDailyRun(now.toISOString(), date);
    }
    if (stateStore.get().lastError) await stateStore.clearLastError();

    log(`=== Daily pipeline END date=${date} papers=${report.papers.length} requests=${usage.requests} tokens=${usage.inputTokens}→${usage.outputTokens} ===`);
    progress(`done: ${report.papers.length} papers`);
    return { status: "written", report };
  } catch (err) {
    log(`${stage.toUpperCase()} ERROR: ${errorMessage(err)}`);
    await stateStore.setLastError(err instanceof PersistenceError ? "persist" : stage, errorMessage(err));
    throw err;
  } finally {
    clearTimeout(runTimer);
    // ── Flush log ───────────────────────────────────────────────
    try {
      await deps.files.appendLogWithRotation(logPath, logLines.join("\n") + "\n", RUN_LOG_MAX_BYTES);
    } catch (flushErr) {
      logger.warn("failed to flush run log", { error: errorMessage(flushErr) });
    }
  }
}
