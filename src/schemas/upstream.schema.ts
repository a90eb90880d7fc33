import { z } from "zod";

// Payloads from third-party APIs, validated before use.

const textNode = z.union([z.string(), z.number()]).transform(v => String(v));

const atomLink = z.object({
  href: z.string().optional(),
  rel: z.string().optional(),
  type: z.string().optional(),
  title: z.string().optional(),
});

const atomCategory = z.object({ term: z.string() });

/** One <entry> of the arXiv Atom feed as produced by fast-xml-parser (attributes unprefixed). */
export const ArxivEntrySchema = z.object({
  id: textNode,
  title: textNode,
  summary: textNode.default(""),
  published: z.string().default(""),
  updated: z.string(),
  author: z.array(z.object({ name: textNode })).default([]),
  category: z.array(atomCategory).default([]),
  link: z.array(atomLink).default([]),
  "arxiv:primary_category": atomCategory.optional(),
});

export type ArxivEntry = z.infer<typeof ArxivEntrySchema>;

export const ArxivFeedSchema = z.object({
  feed: z.object({
    entry: z.array(z.unknown()).default([]),
  }),
});

export const SemanticScholarPaperSchema = z.object({
  paperId: z.string().nullable().optional(),
  citationCount: z.number().nullable().optional(),
  influentialCitationCount: z.number().nullable().optional(),
});

export const HuggingFacePaperSchema = z.object({
  id: z.string(),
  upvotes: z.number().optional(),
});

export const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export const GeminiGenerateResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }),
  })).min(1),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
  }).optional(),
});
