import type { ResolutionMode } from "./paper";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;       // upper bound of the random delay added to each backoff
}

export interface LLMConfig {
  provider: "openai_compatible" | "anthropic" | "gemini";
  baseUrl: string;
  apiKey: string;
  fastModel: string;      // stage-1 relevance classification
  smartModel: string;     // review, extraction, narratives
  temperature: number;    // used only when deterministic is false
  deterministic: boolean;
  maxTokens: number;
  timeoutMs: number;
  maxConcurrentRequests: number;
  transportRetry: RetryPolicy;
}

export interface SearchConfig {
  categories: string[];
  mode: ResolutionMode;
  /** fixed-window length in hours */
  timeWindowHours: number;
  /** latest-update: how many calendar days to probe, today included */
  lookbackDays: number;
  /** ceiling on upstream requests across all probes of one resolution */
  maxTotalAttempts: number;
  timezone: string;
  maxResults: number;
  keywordsInclude: string[];
  keywordsExclude: string[];
  retry: RetryPolicy;
}

export interface FilterConfig {
  threshold: number;
  maxSelected: number;
  reviewMode: "fast-only" | "fast-then-review";
  /** scores within ±reviewBand of the threshold go to stage-2 review */
  reviewBand: number;
  /** "keyword-hit" rejects candidates with no include-term hit before any model call */
  prefilter: "none" | "keyword-hit";
  concurrency: number;
  retry: RetryPolicy;
}

export interface ExtractionConfig {
  concurrency: number;
  retry: RetryPolicy;
}

export interface TrendConfig {
  enableWeekly: boolean;
  enableMonthly: boolean;
  windowMode: "rolling" | "calendar";
  weeklyDays: number;
  monthlyDays: number;
  topK: number;
}

export interface MetricNormalization {
  kind: "log" | "linear";
  cap: number;            // value at (or above) which the metric normalises to 1
}

export interface SpotlightConfig {
  enabled: boolean;
  recentDays: number;
  threshold: number;
  maxItems: number;
  sources: Array<"semantic_scholar" | "huggingface">;
  /** keyed by "<source>.<metric>" */
  weights: Record<string, number>;
  normalization: Record<string, MetricNormalization>;
  fetchTimeoutMs: number;
  concurrency: number;
  perSourceConcurrency: number;
  semanticScholarApiKey: string;
}

export interface BudgetConfig {
  maxRequests: number;    // 0 = unlimited
  maxTokens: number;      // 0 = unlimited
}

export interface ScheduleConfig {
  enabled: boolean;
  dailyTime: string;      // "HH:MM"
  /** Wait after a failed scheduled run before the next attempt. */
  retryAfterMinutes: number;
}

export interface DigestSettings {
  rootFolder: string;
  language: "zh" | "en";
  /** wall-clock budget of one daily run */
  runBudgetMs: number;

  llm: LLMConfig;
  search: SearchConfig;
  filter: FilterConfig;
  extraction: ExtractionConfig;
  trend: TrendConfig;
  spotlight: SpotlightConfig;
  budget: BudgetConfig;
  schedule: ScheduleConfig;

  backfillMaxDays: number;
}
