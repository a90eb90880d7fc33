import type { AttentionSignal } from "../types/paper";
import type { MetricNormalization } from "../types/config";

export interface AttentionScore {
  score: number;        // integer 0–100
  reasons: string[];
}

const DEFAULT_RULE: MetricNormalization = { kind: "log", cap: 100 };

export function metricKey(signal: Pick<AttentionSignal, "source" | "metric">): string {
  return `${signal.source}.${signal.metric}`;
}

/** Map a raw metric onto [0, 1]; `cap` and above saturate to 1. */
export function normalizeMetric(value: number, rule: MetricNormalization): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  const n = rule.kind === "linear"
    ? value / rule.cap
    : Math.log1p(value) / Math.log1p(rule.cap);
  return Math.min(1, n);
}

/**
 * Weighted mean of the normalised metrics that are present, scaled to 0–100.
 * Weights of absent metrics drop out of the denominator, so missing sources
 * redistribute proportionally. Null when no weighted metric is present.
 */
export function computeAttentionScore(
  signals: AttentionSignal[],
  weights: Record<string, number>,
  rules: Record<string, MetricNormalization>
): AttentionScore | null {
  const seen = new Set<string>();
  let weighted = 0;
  let totalWeight = 0;
  const reasons: string[] = [];

  for (const s of signals) {
    const key = metricKey(s);
    if (seen.has(key)) continue;
    seen.add(key);
    const w = weights[key] ?? 0;
    if (w <= 0) continue;
    const n = normalizeMetric(s.value, rules[key] ?? DEFAULT_RULE);
    weighted += w * n;
    totalWeight += w;
    reasons.push(`${key}=${s.value}`);
  }

  if (totalWeight === 0) return null;
  const score = Math.max(0, Math.min(100, Math.round((weighted / totalWeight) * 100)));
  return { score, reasons };
}
