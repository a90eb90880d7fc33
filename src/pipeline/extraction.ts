import type { AuditEntry, ExtractionFailure, PaperRecord } from "../types/paper";
import type { RetryPolicy } from "../types/config";
import type { InferencePort } from "../llm/inference";
import type { JudgedCandidate } from "../scoring/rank";
import { inferWithRetry } from "../llm/inference";
import { ExtractionOutputSchema } from "../schemas/inference.schema";
import { EXTRACTION_PROMPT, fillTemplate, languageName } from "../prompts";
import { runPool } from "../util/pool";
import { attemptsOf } from "../util/retry";
import { errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("extraction");

export interface ExtractionOptions {
  concurrency: number;
  retry: RetryPolicy;
  model: string;
  deterministic: boolean;
  language: "zh" | "en";
  keywordsInclude: string[];
  signal?: AbortSignal;
  random?: () => number;
}

export interface ExtractionResult {
  /** In the order of the input ranking. */
  records: PaperRecord[];
  failures: ExtractionFailure[];
  /** One entry per input item. */
  audit: AuditEntry[];
}

function buildPrompt(item: JudgedCandidate, options: ExtractionOptions): string {
  const c = item.candidate;
  const wantsTitle = options.language !== "en";
  return fillTemplate(EXTRACTION_PROMPT, {
    title: c.title,
    authors: c.authors.slice(0, 5).join(", ") || "Unknown",
    categories: c.categories.join(", "),
    abstract: c.abstract,
    interest_keywords: options.keywordsInclude.join(", ") || "none",
    language: languageName(options.language),
    localized_title_hint: wantsTitle ? `- localizedTitle: the title translated into ${languageName(options.language)}\n` : "",
    localized_title_field: wantsTitle ? `, "localizedTitle": "..."` : ""
  });
}

/**
 * Structured extraction for every selected candidate through a bounded pool.
 * A failing item becomes an ExtractionFailure; the rest of the batch carries on.
 */
export async function extractPapers(
  selected: JudgedCandidate[],
  inference: InferencePort,
  options: ExtractionOptions
): Promise<ExtractionResult> {
  const outcomes = await runPool(
    selected,
    options.concurrency,
    item => inferWithRetry(
      inference,
      {
        task: "extract",
        prompt: buildPrompt(item, options),
        schema: ExtractionOutputSchema,
        model: options.model,
        deterministic: options.deterministic,
        signal: options.signal
      },
      options.retry,
      {
        random: options.random,
        onRetry: (err, attempt, delayMs) =>
          log.warn(`${item.candidate.id}: attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: errorMessage(err) })
      }
    ),
    options.signal
  );

  const records: PaperRecord[] = [];
  const failures: ExtractionFailure[] = [];
  const audit: AuditEntry[] = [];

  outcomes.forEach((outcome, i) => {
    const { candidate, verdict } = selected[i];
    if (outcome.ok) {
      const { value, attempts } = outcome.value;
      const record: PaperRecord = {
        ...candidate,
        problem: value.problem,
        method: value.method,
        paradigmRelation: value.paradigmRelation,
        quality: value.quality,
        relevance: verdict
      };
      if (value.localizedTitle) record.localizedTitle = value.localizedTitle;
      records.push(record);
      audit.push(attempts > 1
        ? { stage: "extract", subject: candidate.id, outcome: "retried-success", attempts, detail: `${attempts - 1} retries` }
        : { stage: "extract", subject: candidate.id, outcome: "success", attempts });
      return;
    }

    const reason = outcome.cancelled ? "cancelled" : errorMessage(outcome.error);
    const attempts = attemptsOf(outcome.error, outcome.cancelled ? 0 : 1);
    failures.push({ candidateId: candidate.id, reason, attempts });
    audit.push({ stage: "extract", subject: candidate.id, outcome: "failed", attempts, detail: reason });
  });

  log.info(`extracted ${records.length}/${selected.length} (${failures.length} failed)`);
  return { records, failures, audit };
}
