import { z } from "zod";

const positiveInt = z.number().int().positive();

export const RetryPolicySchema = z.object({
  maxAttempts: positiveInt,
  baseDelayMs: z.number().min(0),
  maxDelayMs: z.number().min(0),
  jitterMs: z.number().min(0),
});

const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

export const DigestSettingsSchema = z.object({
  rootFolder: z.string().min(1),
  language: z.enum(["zh", "en"]),
  runBudgetMs: positiveInt,

  llm: z.object({
    provider: z.enum(["openai_compatible", "anthropic", "gemini"]),
    baseUrl: z.string().url(),
    apiKey: z.string(),
    fastModel: z.string().min(1),
    smartModel: z.string().min(1),
    temperature: z.number().min(0).max(2),
    deterministic: z.boolean(),
    maxTokens: positiveInt,
    timeoutMs: positiveInt,
    maxConcurrentRequests: positiveInt,
    transportRetry: RetryPolicySchema,
  }),

  search: z.object({
    categories: z.array(z.string().min(1)).min(1),
    mode: z.enum(["latest-update", "fixed-window"]),
    timeWindowHours: positiveInt,
    lookbackDays: positiveInt,
    maxTotalAttempts: positiveInt,
    timezone: z.string().refine(isKnownTimeZone, "unknown IANA timezone"),
    maxResults: positiveInt,
    keywordsInclude: z.array(z.string()),
    keywordsExclude: z.array(z.string()),
    retry: RetryPolicySchema,
  }),

  filter: z.object({
    threshold: z.number().int().min(0).max(100),
    maxSelected: positiveInt,
    reviewMode: z.enum(["fast-only", "fast-then-review"]),
    reviewBand: z.number().int().min(0).max(100),
    prefilter: z.enum(["none", "keyword-hit"]),
    concurrency: positiveInt,
    retry: RetryPolicySchema,
  }),

  extraction: z.object({
    concurrency: positiveInt,
    retry: RetryPolicySchema,
  }),

  trend: z.object({
    enableWeekly: z.boolean(),
    enableMonthly: z.boolean(),
    windowMode: z.enum(["rolling", "calendar"]),
    weeklyDays: positiveInt,
    monthlyDays: positiveInt,
    topK: positiveInt,
  }),

  spotlight: z.object({
    enabled: z.boolean(),
    recentDays: positiveInt,
    threshold: z.number().min(0).max(100),
    maxItems: positiveInt,
    sources: z.array(z.enum(["semantic_scholar", "huggingface"])),
    weights: z.record(z.number().min(0)),
    normalization: z.record(z.object({
      kind: z.enum(["log", "linear"]),
      cap: z.number().positive(),
    })),
    fetchTimeoutMs: positiveInt,
    concurrency: positiveInt,
    perSourceConcurrency: positiveInt,
    semanticScholarApiKey: z.string(),
  }),

  budget: z.object({
    maxRequests: z.number().int().min(0),
    maxTokens: z.number().int().min(0),
  }),

  schedule: z.object({
    enabled: z.boolean(),
    dailyTime: timeOfDay,
    retryAfterMinutes: z.number().int().positive(),
  }),

  backfillMaxDays: positiveInt,
});

function isKnownTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}
