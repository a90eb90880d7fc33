export const RELEVANCE_PROMPT = `You are screening newly published research papers for a reader.

Reader interests (keywords): {{interest_keywords}}

Paper:
- id: {{id}}
- title: {{title}}
- categories: {{categories}}
- abstract: {{abstract}}

Judge how relevant this paper is to the reader's interests.
Return ONLY a JSON object, no markdown fences:
{"isRelevant": true, "score": 0-100, "matchedTerms": ["keyword", ...], "rationale": "one sentence"}`;

export const REVIEW_PROMPT = `You are a senior reviewer re-checking a borderline relevance judgement.

Reader interests (keywords): {{interest_keywords}}
Selection threshold: {{threshold}} (a paper is kept when score >= threshold)

Paper:
- id: {{id}}
- title: {{title}}
- categories: {{categories}}
- abstract: {{abstract}}

A first-pass screener gave: score={{previous_score}}, rationale="{{previous_rationale}}".
Read the abstract carefully and give your own judgement.
Return ONLY a JSON object, no markdown fences:
{"isRelevant": true, "score": 0-100, "matchedTerms": ["keyword", ...], "rationale": "one sentence"}`;

export const EXTRACTION_PROMPT = `You are a research paper analyst.

Paper:
- title: {{title}}
- authors: {{authors}}
- categories: {{categories}}
- abstract: {{abstract}}

Reader interests: {{interest_keywords}}

Write in {{language}}. Extract:
- problem: the problem the paper addresses (1-2 sentences)
- method: the core method or contribution (1-3 sentences)
- paradigmRelation: how it relates to existing paradigms (extends, challenges, combines...)
- quality: integer 1-5, your estimate of rigor and novelty from the abstract
{{localized_title_hint}}
Return ONLY a JSON object, no markdown fences:
{"problem": "...", "method": "...", "paradigmRelation": "...", "quality": 3{{localized_title_field}}}`;

/** Appended after a response that failed validation. */
export const STRICT_SUFFIX = `

IMPORTANT: your previous answer was rejected ({{error}}).
Output exactly one JSON object with every required field and nothing else: no prose, no code fences.`;

export const TREND_SUMMARY_PROMPT = `You are a research trend analyst.

Period: {{period}} ({{start}} to {{end}})
Papers in this period: {{paper_count}}
Top keywords (term: weight): {{keywords}}

Paper highlights (JSON):
{{papers_json}}

Write in {{language}} a short narrative (3-5 sentences) of what dominated this period and any shifts.
Return ONLY a JSON object, no markdown fences:
{"summary": "..."}`;

export const SPOTLIGHT_INTRO_PROMPT = `You are introducing a recent paper that is drawing unusual attention.

Title: {{title}}
Problem: {{problem}}
Method: {{method}}
Attention signals: {{signals}}

Write in {{language}} a 2-3 sentence introduction: what the paper does and why people are paying attention.
Return ONLY a JSON object, no markdown fences:
{"introduction": "..."}`;

export function fillTemplate(template: string, vars: Record<string, string>): string {
  let result = template;
  for (const [k, v] of Object.entries(vars)) {
    result = result.split(`{{${k}}}`).join(v);
  }
  return result;
}

export function languageName(language: "zh" | "en"): string {
  return language === "zh" ? "Chinese (中文)" : "English";
}
