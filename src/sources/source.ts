import type { Candidate } from "../types/paper";

export interface SearchParams {
  categories: string[];
  /** inclusive */
  windowStart: Date;
  /** exclusive */
  windowEnd: Date;
  maxResults: number;
  signal?: AbortSignal;
}

/**
 * Upstream listing of new papers. One call is one request: retries belong to
 * the caller. Failures are TransientTransportError or UpstreamError.
 */
export interface CandidateSource {
  name: string;
  search(params: SearchParams): Promise<Candidate[]>;
}
