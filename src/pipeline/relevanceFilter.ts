import type { AuditEntry, Candidate, CandidateVerdict, RelevanceVerdict } from "../types/paper";
import type { FilterConfig } from "../types/config";
import type { InferencePort } from "../llm/inference";
import { inferWithRetry } from "../llm/inference";
import { VerdictOutputSchema } from "../schemas/inference.schema";
import { RELEVANCE_PROMPT, REVIEW_PROMPT, fillTemplate } from "../prompts";
import { computeKeywordHits, findExcludedTerm } from "../scoring/keywords";
import { rankSelected, type JudgedCandidate } from "../scoring/rank";
import { runPool } from "../util/pool";
import { attemptsOf } from "../util/retry";
import { errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("relevance");

export const DEFAULT_RELEVANCE_SCORE = 50;

export interface FilterOptions extends Pick<FilterConfig,
  "threshold" | "maxSelected" | "reviewMode" | "reviewBand" | "prefilter" | "concurrency" | "retry"> {
  keywordsInclude: string[];
  keywordsExclude: string[];
  fastModel: string;
  reviewModel: string;
  deterministic: boolean;
  /** Consulted before each optional review call. */
  isBudgetExhausted: () => boolean;
  signal?: AbortSignal;
  random?: () => number;
}

export interface FilterResult {
  /** One per candidate, in input order. */
  verdicts: CandidateVerdict[];
  /** Ranked, at most maxSelected. */
  selected: JudgedCandidate[];
  audit: AuditEntry[];
}

type Judgement = { verdict: RelevanceVerdict; audit: AuditEntry | null };

function paperVars(c: Candidate, keywords: string[]): Record<string, string> {
  return {
    id: c.id,
    title: c.title,
    categories: c.categories.join(", "),
    abstract: c.abstract,
    interest_keywords: keywords.join(", ")
  };
}

/** Verdicts that need no model call, or null when the model must judge. */
function ruleVerdict(c: Candidate, options: FilterOptions): RelevanceVerdict | null {
  const excluded = findExcludedTerm(c, options.keywordsExclude);
  if (excluded !== null) {
    return { isRelevant: false, score: 0, matchedTerms: [excluded], rationale: `excluded by term "${excluded}"`, judgedBy: "prefilter" };
  }
  if (options.keywordsInclude.length === 0) {
    return { isRelevant: true, score: DEFAULT_RELEVANCE_SCORE, matchedTerms: [], rationale: "no include keywords configured", judgedBy: "keyword-default" };
  }
  if (options.prefilter === "keyword-hit" && computeKeywordHits(c, options.keywordsInclude).length === 0) {
    return { isRelevant: false, score: 0, matchedTerms: [], rationale: "no include keyword in title or abstract", judgedBy: "prefilter" };
  }
  return null;
}

async function classify(c: Candidate, inference: InferencePort, options: FilterOptions): Promise<Judgement> {
  try {
    const { value, attempts } = await inferWithRetry(
      inference,
      {
        task: "classify",
        prompt: fillTemplate(RELEVANCE_PROMPT, paperVars(c, options.keywordsInclude)),
        schema: VerdictOutputSchema,
        model: options.fastModel,
        deterministic: options.deterministic,
        signal: options.signal
      },
      options.retry,
      { random: options.random }
    );
    return {
      verdict: { ...value, judgedBy: "fast" },
      audit: attempts > 1 ? { stage: "filter", subject: c.id, outcome: "retried-success", attempts } : null
    };
  } catch (err) {
    log.warn(`classification failed for ${c.id}, treating as not relevant`, { error: errorMessage(err) });
    return {
      verdict: { isRelevant: false, score: 0, matchedTerms: [], rationale: `classification failed: ${errorMessage(err)}`, judgedBy: "fallback" },
      audit: { stage: "filter", subject: c.id, outcome: "degraded", attempts: attemptsOf(err, 1), detail: errorMessage(err) }
    };
  }
}

async function review(c: Candidate, previous: RelevanceVerdict, inference: InferencePort, options: FilterOptions): Promise<Judgement> {
  try {
    const { value, attempts } = await inferWithRetry(
      inference,
      {
        task: "review",
        prompt: fillTemplate(REVIEW_PROMPT, {
          ...paperVars(c, options.keywordsInclude),
          threshold: String(options.threshold),
          previous_score: String(previous.score),
          previous_rationale: previous.rationale
        }),
        schema: VerdictOutputSchema,
        model: options.reviewModel,
        deterministic: options.deterministic,
        signal: options.signal
      },
      options.retry,
      { random: options.random }
    );
    return {
      verdict: { ...value, judgedBy: "review" },
      audit: { stage: "review", subject: c.id, outcome: attempts > 1 ? "retried-success" : "success", attempts, detail: `${previous.score} → ${value.score}` }
    };
  } catch (err) {
    return {
      verdict: previous,
      audit: { stage: "review", subject: c.id, outcome: "degraded", attempts: attemptsOf(err, 1), detail: `kept fast verdict: ${errorMessage(err)}` }
    };
  }
}

function inReviewBand(v: RelevanceVerdict, options: FilterOptions): boolean {
  return v.judgedBy === "fast" && Math.abs(v.score - options.threshold) <= options.reviewBand;
}

/**
 * Judge every candidate, then select the best relevant ones.
 * Produces exactly one verdict per candidate; per-candidate failures degrade
 * to a not-relevant fallback verdict and never fail the batch.
 */
export async function filterCandidates(
  candidates: Candidate[],
  inference: InferencePort,
  options: FilterOptions
): Promise<FilterResult> {
  const audit: AuditEntry[] = [];

  // ── Stage 1: rules, then the fast model ───────────────────────
  const stage1 = await runPool(candidates, options.concurrency, async (c): Promise<Judgement> => {
    const ruled = ruleVerdict(c, options);
    if (ruled) return { verdict: ruled, audit: null };
    return classify(c, inference, options);
  });

  const verdicts: RelevanceVerdict[] = stage1.map((outcome, i) => {
    if (outcome.ok) {
      if (outcome.value.audit) audit.push(outcome.value.audit);
      return outcome.value.verdict;
    }
    const message = errorMessage(outcome.error);
    audit.push({ stage: "filter", subject: candidates[i].id, outcome: "degraded", detail: message });
    return { isRelevant: false, score: 0, matchedTerms: [], rationale: `classification failed: ${message}`, judgedBy: "fallback" };
  });
  const modelCalls = verdicts.filter(v => v.judgedBy === "fast").length;
  log.info(`stage 1: ${candidates.length} candidates judged (${modelCalls} by model)`);

  // ── Stage 2: review borderline scores ─────────────────────────
  if (options.reviewMode === "fast-then-review") {
    const borderline = candidates
      .map((c, i) => ({ c, i }))
      .filter(({ i }) => inReviewBand(verdicts[i], options));

    let skipped = 0;
    const stage2 = await runPool(borderline, options.concurrency, async ({ c, i }): Promise<Judgement | null> => {
      if (options.isBudgetExhausted()) {
        skipped++;
        return null;
      }
      return review(c, verdicts[i], inference, options);
    });

    stage2.forEach((outcome, k) => {
      const { c, i } = borderline[k];
      if (!outcome.ok) {
        audit.push({ stage: "review", subject: c.id, outcome: "degraded", detail: `kept fast verdict: ${errorMessage(outcome.error)}` });
        return;
      }
      if (outcome.value === null) {
        audit.push({ stage: "review", subject: c.id, outcome: "skipped", detail: "call budget exhausted" });
        return;
      }
      verdicts[i] = outcome.value.verdict;
      if (outcome.value.audit) audit.push(outcome.value.audit);
    });
    if (skipped > 0) log.warn(`stage 2: call budget exhausted, ${skipped} reviews skipped`);
    log.info(`stage 2: ${borderline.length - skipped}/${borderline.length} borderline verdicts reviewed`);
  }

  // ── Selection ─────────────────────────────────────────────────
  const judged = candidates.map((candidate, i) => ({ candidate, verdict: verdicts[i] }));
  // Without include keywords every kept candidate scores the default, so the
  // threshold is not applied and ranking reduces to recency.
  const threshold = options.keywordsInclude.length === 0 ? 0 : options.threshold;
  const selected = rankSelected(judged, threshold, options.maxSelected);
  log.info(`selected ${selected.length} of ${candidates.length} (threshold=${options.threshold}, max=${options.maxSelected})`);

  return {
    verdicts: judged.map(j => ({ candidateId: j.candidate.id, verdict: j.verdict })),
    selected,
    audit
  };
}
