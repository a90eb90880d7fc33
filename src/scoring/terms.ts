import stopwordList from "../data/stopwords.json";
import type { KeywordWeight, PaperRecord } from "../types/paper";

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const TERM_PATTERN = /[A-Za-z][A-Za-z0-9\-+_/]{2,}/g;

/** Which record fields feed the trend terms, and how much each counts. */
export const FIELD_WEIGHTS: ReadonlyArray<[keyof Pick<PaperRecord, "method" | "paradigmRelation" | "abstract">, number]> = [
  ["method", 2],
  ["paradigmRelation", 1.5],
  ["abstract", 1]
];

export function extractTerms(text: string): string[] {
  const out: string[] = [];
  for (const match of text.matchAll(TERM_PATTERN)) {
    const term = match[0].toLowerCase().replace(/[-/_+]+$/, "");
    if (term.length >= 3 && !STOPWORDS.has(term)) out.push(term);
  }
  return out;
}

/** Field-weighted term totals; Map insertion order is first-seen order. */
export function aggregateTerms(records: Pick<PaperRecord, "method" | "paradigmRelation" | "abstract">[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const record of records) {
    for (const [field, weight] of FIELD_WEIGHTS) {
      for (const term of extractTerms(record[field])) {
        totals.set(term, (totals.get(term) ?? 0) + weight);
      }
    }
  }
  return totals;
}

/** Top-K terms normalised so the heaviest is 1. Ties keep first-seen order. */
export function topTerms(totals: Map<string, number>, topK: number): KeywordWeight[] {
  const entries = [...totals.entries()];
  if (entries.length === 0) return [];
  const max = Math.max(...entries.map(([, w]) => w));
  return entries
    .sort((a, b) => b[1] - a[1])
    .slice(0, topK)
    .map(([term, w]) => ({ term, weight: Math.round((w / max) * 10000) / 10000 }));
}
