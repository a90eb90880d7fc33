import axios from "axios";

/** Network failure, timeout, rate limit or 5xx: worth retrying. */
export class TransientTransportError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "TransientTransportError";
  }
}

/** Upstream answered with a non-retryable failure (bad request, auth, not found). */
export class UpstreamError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "UpstreamError";
  }
}

/** A model response that did not match the requested schema. */
export class SchemaValidationError extends Error {
  constructor(message: string, readonly raw: string) {
    super(message);
    this.name = "SchemaValidationError";
  }
}

/** The archive could not durably record a report. Fatal for the run. */
export class PersistenceError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class ReportNotFoundError extends Error {
  constructor(readonly date: string) {
    super(`No report for date=${date}`);
    this.name = "ReportNotFoundError";
  }
}

export class PipelineAbortError extends Error {
  constructor(message = "Pipeline aborted") {
    super(message);
    this.name = "PipelineAbortError";
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientTransportError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map an axios failure onto the transport taxonomy. Anything that is not an
 * axios error is returned unchanged.
 */
export function toTransportError(err: unknown, label: string): unknown {
  if (!axios.isAxiosError(err)) return err;
  if (axios.isCancel(err) || err.code === "ERR_CANCELED") {
    return new PipelineAbortError(`${label}: request cancelled`);
  }
  const status = err.response?.status;
  if (status === undefined) {
    return new TransientTransportError(`${label}: ${err.code ?? "network error"} (${err.message})`);
  }
  if (status === 429 || status >= 500) {
    return new TransientTransportError(`${label}: HTTP ${status}`, status);
  }
  return new UpstreamError(`${label}: HTTP ${status}`, status);
}
