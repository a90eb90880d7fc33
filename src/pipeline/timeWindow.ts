import type { AuditEntry, Candidate, ResolutionMode, ResolvedPeriod } from "../types/paper";
import type { RetryPolicy } from "../types/config";
import type { CandidateSource } from "../sources/source";
import { dedupeVersions } from "../sources/versions";
import { addDays, dayBounds, formatDateInZone } from "../util/dates";
import { attemptsOf, withRetry } from "../util/retry";
import { PipelineAbortError, errorMessage, isTransient } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("time-window");

export interface ResolveOptions {
  categories: string[];
  mode: ResolutionMode;
  timeWindowHours: number;
  lookbackDays: number;
  maxTotalAttempts: number;
  timezone: string;
  maxResults: number;
  retry: RetryPolicy;
  now: Date;
  /** Resolve exactly this calendar day instead of probing. */
  targetDate?: string;
  signal?: AbortSignal;
  random?: () => number;
}

export type NoUpdateReason = "empty-lookback" | "attempts-exhausted" | "empty-target";

export type Resolution =
  | { status: "resolved"; period: ResolvedPeriod; candidates: Candidate[]; attempts: number; audit: AuditEntry[] }
  | { status: "no-update"; reason: NoUpdateReason; attempts: number; audit: AuditEntry[] };

/**
 * Decide which period counts as "today's update" and fetch its candidates.
 *
 * latest-update probes today, yesterday, … (lookbackDays probes in total)
 * and stops at the first day with candidates. A probe that keeps failing
 * transiently is skipped. The total number of upstream requests across all
 * probes is capped by maxTotalAttempts.
 */
export async function resolvePeriod(source: CandidateSource, options: ResolveOptions): Promise<Resolution> {
  const audit: AuditEntry[] = [];
  let attemptsUsed = 0;

  const query = async (label: string, start: Date, end: Date, allowed: number): Promise<Candidate[]> => {
    const policy = { ...options.retry, maxAttempts: Math.min(options.retry.maxAttempts, allowed) };
    try {
      const { value, attempts } = await withRetry(
        () => {
          attemptsUsed++;
          return source.search({
            categories: options.categories,
            windowStart: start,
            windowEnd: end,
            maxResults: options.maxResults,
            signal: options.signal
          });
        },
        policy,
        {
          shouldRetry: isTransient,
          signal: options.signal,
          random: options.random,
          onRetry: (err, attempt, delayMs) =>
            log.warn(`probe ${label}: attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: errorMessage(err) })
        }
      );
      const candidates = dedupeVersions(value);
      audit.push({
        stage: "resolve",
        subject: label,
        outcome: attempts > 1 ? "retried-success" : "success",
        attempts,
        detail: `${candidates.length} candidates`
      });
      return candidates;
    } catch (err) {
      audit.push({ stage: "resolve", subject: label, outcome: "failed", attempts: attemptsOf(err, 1), detail: errorMessage(err) });
      throw err;
    }
  };

  // ── Fixed window ──────────────────────────────────────────────
  if (options.mode === "fixed-window" && !options.targetDate) {
    const end = options.now;
    const start = new Date(end.getTime() - options.timeWindowHours * 3600 * 1000);
    const label = formatDateInZone(end, options.timezone);
    const candidates = await query(label, start, end, options.maxTotalAttempts);
    log.info(`fixed window ${start.toISOString()} → ${end.toISOString()}: ${candidates.length} candidates`);
    return {
      status: "resolved",
      period: { label, start: start.toISOString(), end: end.toISOString(), mode: "fixed-window" },
      candidates,
      attempts: attemptsUsed,
      audit
    };
  }

  // ── Explicit day ──────────────────────────────────────────────
  if (options.targetDate) {
    const { start, end } = dayBounds(options.targetDate, options.timezone);
    const candidates = await query(options.targetDate, start, end, options.maxTotalAttempts);
    if (candidates.length === 0) {
      return { status: "no-update", reason: "empty-target", attempts: attemptsUsed, audit };
    }
    return {
      status: "resolved",
      period: { label: options.targetDate, start: start.toISOString(), end: end.toISOString(), mode: options.mode },
      candidates,
      attempts: attemptsUsed,
      audit
    };
  }

  // ── Latest update: probe backwards ────────────────────────────
  const today = formatDateInZone(options.now, options.timezone);
  for (let offset = 0; offset < options.lookbackDays; offset++) {
    const remaining = options.maxTotalAttempts - attemptsUsed;
    if (remaining <= 0) {
      log.warn(`attempt ceiling (${options.maxTotalAttempts}) reached after ${offset} probes`);
      return { status: "no-update", reason: "attempts-exhausted", attempts: attemptsUsed, audit };
    }

    const label = addDays(today, -offset);
    const { start, end } = dayBounds(label, options.timezone);
    let candidates: Candidate[];
    try {
      candidates = await query(label, start, end, remaining);
    } catch (err) {
      if (err instanceof PipelineAbortError || !isTransient(err)) throw err;
      log.warn(`probe ${label} failed, continuing with the previous day`, { error: errorMessage(err) });
      continue;
    }

    if (candidates.length > 0) {
      log.info(`latest update is ${label} (${candidates.length} candidates, ${offset + 1} probes)`);
      return {
        status: "resolved",
        period: { label, start: start.toISOString(), end: end.toISOString(), mode: "latest-update" },
        candidates,
        attempts: attemptsUsed,
        audit
      };
    }
    log.debug(`probe ${label}: empty`);
  }

  return { status: "no-update", reason: "empty-lookback", attempts: attemptsUsed, audit };
}
