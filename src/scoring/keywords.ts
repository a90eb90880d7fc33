import type { Candidate } from "../types/paper";

export function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

function haystackOf(candidate: Candidate): string {
  return normalize(`${candidate.title} ${candidate.abstract}`);
}

/** Include keywords found in title or abstract, in configured order. */
export function computeKeywordHits(candidate: Candidate, keywords: string[]): string[] {
  const haystack = haystackOf(candidate);
  return keywords.filter(kw => normalize(kw) !== "" && haystack.includes(normalize(kw)));
}

/** First exclude term found in title or abstract, or null. */
export function findExcludedTerm(candidate: Candidate, excludes: string[]): string | null {
  const haystack = haystackOf(candidate);
  return excludes.find(term => normalize(term) !== "" && haystack.includes(normalize(term))) ?? null;
}
