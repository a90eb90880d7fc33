import { z } from "zod";

export const RelevanceVerdictSchema = z.object({
  isRelevant: z.boolean(),
  score: z.number().int().min(0).max(100),
  matchedTerms: z.array(z.string()),
  rationale: z.string(),
  judgedBy: z.enum(["fast", "review", "keyword-default", "prefilter", "fallback"]),
});

export const CandidateSchema = z.object({
  id: z.string(),
  title: z.string(),
  authors: z.array(z.string()),
  abstract: z.string(),
  categories: z.array(z.string()),
  primaryCategory: z.string(),
  published: z.string(),
  updated: z.string(),
  url: z.string(),
});

export const PaperRecordSchema = CandidateSchema.extend({
  problem: z.string(),
  method: z.string(),
  paradigmRelation: z.string(),
  quality: z.number().int().min(1).max(5),
  localizedTitle: z.string().optional(),
  relevance: RelevanceVerdictSchema,
});

export const PeriodTrendSchema = z.object({
  period: z.enum(["day", "week", "month"]),
  start: z.string(),
  end: z.string(),
  summary: z.string(),
  keywords: z.array(z.object({ term: z.string(), weight: z.number().min(0) })),
  hasData: z.boolean(),
});

export const AttentionSignalSchema = z.object({
  source: z.string(),
  metric: z.string(),
  value: z.number(),
  fetchedAt: z.string(),
});

export const DailyReportSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  generatedAt: z.string(),
  windowStart: z.string(),
  windowEnd: z.string(),
  mode: z.enum(["latest-update", "fixed-window"]),
  categories: z.array(z.string()),
  keywordsInclude: z.array(z.string()),
  keywordsExclude: z.array(z.string()),
  dayTrend: PeriodTrendSchema,
  papers: z.array(PaperRecordSchema),
  verdicts: z.array(z.object({ candidateId: z.string(), verdict: RelevanceVerdictSchema })),
  failures: z.array(z.object({ candidateId: z.string(), reason: z.string(), attempts: z.number().int() })),
  weeklyTrend: PeriodTrendSchema.nullable(),
  monthlyTrend: PeriodTrendSchema.nullable(),
  spotlight: z.array(z.object({
    paperId: z.string(),
    attentionScore: z.number().int().min(0).max(100),
    signals: z.array(AttentionSignalSchema),
    introduction: z.string(),
  })),
  audit: z.array(z.object({
    stage: z.enum(["resolve", "filter", "review", "extract", "trend", "spotlight", "budget"]),
    subject: z.string(),
    outcome: z.enum(["success", "retried-success", "failed", "skipped", "degraded"]),
    attempts: z.number().int().optional(),
    detail: z.string().optional(),
  })),
  stats: z.object({
    candidates: z.number().int(),
    selected: z.number().int(),
    extracted: z.number().int(),
    failed: z.number().int(),
  }),
  usage: z.object({
    requests: z.number().int(),
    inputTokens: z.number().int(),
    outputTokens: z.number().int(),
  }),
});
