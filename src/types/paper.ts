export interface Candidate {
  id: string;               // versioned arXiv id, e.g. "2501.01234v2"
  title: string;
  authors: string[];
  abstract: string;
  categories: string[];
  primaryCategory: string;
  published: string;        // ISO
  updated: string;          // ISO, the publish/update timestamp used for ordering
  url: string;
}

export type VerdictOrigin = "fast" | "review" | "keyword-default" | "prefilter" | "fallback";

export interface RelevanceVerdict {
  isRelevant: boolean;
  score: number;            // integer 0–100
  matchedTerms: string[];
  rationale: string;
  judgedBy: VerdictOrigin;
}

export interface CandidateVerdict {
  candidateId: string;
  verdict: RelevanceVerdict;
}

export interface PaperRecord extends Candidate {
  problem: string;
  method: string;
  paradigmRelation: string;
  quality: number;          // integer 1–5
  localizedTitle?: string;
  relevance: RelevanceVerdict;
}

export interface ExtractionFailure {
  candidateId: string;
  reason: string;
  attempts: number;
}

export interface KeywordWeight {
  term: string;
  weight: number;
}

export type TrendPeriod = "day" | "week" | "month";

export interface PeriodTrend {
  period: TrendPeriod;
  start: string;            // ISO
  end: string;              // ISO, exclusive
  summary: string;
  keywords: KeywordWeight[];
  hasData: boolean;
}

export interface AttentionSignal {
  source: string;           // e.g. "semantic_scholar"
  metric: string;           // e.g. "citations"
  value: number;
  fetchedAt: string;        // ISO
}

export interface SpotlightItem {
  paperId: string;
  attentionScore: number;   // integer 0–100
  signals: AttentionSignal[];
  introduction: string;
}

export type AuditStage = "resolve" | "filter" | "review" | "extract" | "trend" | "spotlight" | "budget";
export type AuditOutcome = "success" | "retried-success" | "failed" | "skipped" | "degraded";

export interface AuditEntry {
  stage: AuditStage;
  subject: string;          // candidate id, source name, or trend period
  outcome: AuditOutcome;
  attempts?: number;
  detail?: string;
}

export type ResolutionMode = "latest-update" | "fixed-window";

export interface ResolvedPeriod {
  label: string;            // YYYY-MM-DD in the configured timezone
  start: string;            // ISO, inclusive
  end: string;              // ISO, exclusive
  mode: ResolutionMode;
}

export interface RunUsage {
  requests: number;
  inputTokens: number;
  outputTokens: number;
}

export interface ReportStats {
  candidates: number;
  selected: number;
  extracted: number;
  failed: number;
}

export interface DailyReport {
  date: string;             // resolved period label, not the invocation date
  generatedAt: string;      // ISO
  windowStart: string;
  windowEnd: string;
  mode: ResolutionMode;
  categories: string[];
  keywordsInclude: string[];
  keywordsExclude: string[];

  dayTrend: PeriodTrend;
  papers: PaperRecord[];
  verdicts: CandidateVerdict[];
  failures: ExtractionFailure[];
  weeklyTrend: PeriodTrend | null;
  monthlyTrend: PeriodTrend | null;
  spotlight: SpotlightItem[];

  audit: AuditEntry[];
  stats: ReportStats;
  usage: RunUsage;
}

export interface RunState {
  lastDailyRun: string;     // ISO or ""
  lastReportDate: string;   // YYYY-MM-DD or ""
  lastError: {
    time: string;
    stage: "resolve" | "filter" | "extract" | "persist" | "";
    message: string;
  } | null;
}
