import type { PipelineDeps } from "./dailyPipeline";
import { runDailyPipeline } from "./dailyPipeline";
import { diffDays, labelsBetween } from "../util/dates";
import { PipelineAbortError, errorMessage } from "../errors";

export interface BackfillOptions {
  startDate: string; // YYYY-MM-DD
  endDate: string;   // YYYY-MM-DD
  onProgress?: (date: string, index: number, total: number) => void;
  signal?: AbortSignal;
}

export interface BackfillResult {
  /** Dates that produced a report. */
  processed: string[];
  /** Dates with no candidates. */
  noUpdate: string[];
  errors: Record<string, string>;
}

/** Run the daily pipeline once per calendar day in the range, oldest first. */
export async function runBackfillPipeline(deps: PipelineDeps, options: BackfillOptions): Promise<BackfillResult> {
  const days = diffDays(options.startDate, options.endDate) + 1;

  if (days < 1) {
    throw new Error(`Invalid date range: startDate must be <= endDate`);
  }
  if (days > deps.settings.backfillMaxDays) {
    throw new Error(`Backfill range (${days} days) exceeds backfillMaxDays (${deps.settings.backfillMaxDays})`);
  }

  const dates = labelsBetween(options.startDate, options.endDate);
  const processed: string[] = [];
  const noUpdate: string[] = [];
  const errors: Record<string, string> = {};

  for (let i = 0; i < dates.length; i++) {
    if (options.signal?.aborted) throw new PipelineAbortError();
    const date = dates[i];
    if (options.onProgress) {
      options.onProgress(date, i + 1, dates.length);
    }

    try {
      const result = await runDailyPipeline(deps, { targetDate: date });
      if (result.status === "no-update") noUpdate.push(date);
      else processed.push(date);
    } catch (err) {
      errors[date] = errorMessage(err);
    }
  }

  return { processed, noUpdate, errors };
}
