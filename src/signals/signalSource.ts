import type { AttentionSignal } from "../types/paper";

export type SignalFetchResult =
  | { status: "ok"; signals: AttentionSignal[] }
  | { status: "unavailable"; reason: string };

/**
 * Attention metrics for one paper from one external service. "No data for this
 * paper" is `ok` with an empty list; only transport or service failures are
 * `unavailable`. Cancellation rejects with PipelineAbortError.
 */
export interface SignalSource {
  name: string;
  fetchSignals(paperId: string, signal?: AbortSignal): Promise<SignalFetchResult>;
}
