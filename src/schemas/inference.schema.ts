import { z } from "zod";

// Shapes the models are asked to return. Field names match the JSON examples in prompts.ts.

export const VerdictOutputSchema = z.object({
  isRelevant: z.boolean(),
  score: z.number().int().min(0).max(100),
  matchedTerms: z.array(z.string()).default([]),
  rationale: z.string(),
});

export type VerdictOutput = z.infer<typeof VerdictOutputSchema>;

export const ExtractionOutputSchema = z.object({
  problem: z.string().min(1),
  method: z.string().min(1),
  paradigmRelation: z.string().min(1),
  quality: z.number().int().min(1).max(5),
  localizedTitle: z.string().min(1).optional(),
});

export type ExtractionOutput = z.infer<typeof ExtractionOutputSchema>;

export const SummaryOutputSchema = z.object({
  summary: z.string().min(1),
});

export const IntroductionOutputSchema = z.object({
  introduction: z.string().min(1),
});
