import type { Candidate, RelevanceVerdict } from "../types/paper";

export interface JudgedCandidate {
  candidate: Candidate;
  verdict: RelevanceVerdict;
}

function updatedTime(c: Candidate): number {
  const t = new Date(c.updated || c.published).getTime();
  return Number.isNaN(t) ? 0 : t;
}

/** Score desc, then most recently updated, then id asc. */
export function compareJudged(a: JudgedCandidate, b: JudgedCandidate): number {
  if (b.verdict.score !== a.verdict.score) return b.verdict.score - a.verdict.score;
  const byDate = updatedTime(b.candidate) - updatedTime(a.candidate);
  if (byDate !== 0) return byDate;
  return a.candidate.id < b.candidate.id ? -1 : a.candidate.id > b.candidate.id ? 1 : 0;
}

/**
 * Relevant candidates at or above `threshold`, best first, at most `maxSelected`.
 */
export function rankSelected(judged: JudgedCandidate[], threshold: number, maxSelected: number): JudgedCandidate[] {
  return judged
    .filter(j => j.verdict.isRelevant && j.verdict.score >= threshold)
    .sort(compareJudged)
    .slice(0, Math.max(0, maxSelected));
}
