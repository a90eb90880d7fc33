import type { z } from "zod";
import type { LLMConfig } from "../types/config";
import type { LLMProvider, LLMUsage } from "./provider";
import { OpenAICompatibleProvider } from "./openaiCompatible";
import { AnthropicProvider } from "./anthropicProvider";
import { GeminiProvider } from "./geminiProvider";
import { CallBudget } from "./budget";
import { Limiter } from "../util/limiter";
import { backoffDelay, sleep, tagAttempts, withRetry, withTimeout, type RetryResult } from "../util/retry";
import { SchemaValidationError, errorMessage, isTransient } from "../errors";
import { STRICT_SUFFIX, fillTemplate } from "../prompts";
import type { RetryPolicy } from "../types/config";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("inference");

export type InferenceTask = "classify" | "review" | "extract" | "summarize" | "introduce";

export interface InferenceRequest<T> {
  task: InferenceTask;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  model: string;
  deterministic: boolean;
  maxTokens?: number;
  /** Transport retry for this call; `llm.transportRetry` when absent. */
  retry?: RetryPolicy;
  signal?: AbortSignal;
}

/** `attempts` counts provider requests made for this call, failed ones included. */
export type InferenceResult<T> =
  | { ok: true; value: T; usage: LLMUsage; attempts: number }
  | { ok: false; error: Error; raw: string; attempts: number };

/**
 * Structured model calls. Transport retry, timeout and concurrency live here;
 * retrying after a schema-invalid answer is the caller's decision.
 */
export interface InferencePort {
  infer<T>(request: InferenceRequest<T>): Promise<InferenceResult<T>>;
}

/** A `/gemini` gateway path selects the Gemini wire format even under `openai_compatible`. */
export function providerKind(config: Pick<LLMConfig, "provider" | "baseUrl">): LLMConfig["provider"] {
  if (config.provider === "openai_compatible" && config.baseUrl.includes("/gemini")) return "gemini";
  return config.provider;
}

export function buildLLMProvider(config: LLMConfig): LLMProvider {
  switch (providerKind(config)) {
    case "anthropic":
      return new AnthropicProvider(config.apiKey, config.smartModel, config.timeoutMs);
    case "gemini":
      return new GeminiProvider(config.baseUrl, config.apiKey, config.smartModel);
    case "openai_compatible":
      return new OpenAICompatibleProvider(config.baseUrl, config.apiKey, config.smartModel);
  }
}

/** Pull a JSON value out of a model reply: bare, fenced, or embedded in prose. */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const candidate = fenced ? fenced[1].trim() : trimmed;
  try {
    return JSON.parse(candidate);
  } catch {
    const objectMatch = candidate.match(/\{[\s\S]*\}/);
    if (!objectMatch) throw new SchemaValidationError("response contains no JSON object", text);
    try {
      return JSON.parse(objectMatch[0]);
    } catch (err) {
      throw new SchemaValidationError(`response is not valid JSON: ${errorMessage(err)}`, text);
    }
  }
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseStructured<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const json = extractJson(text);
  const parsed = schema.safeParse(json);
  if (!parsed.success) throw new SchemaValidationError(formatIssues(parsed.error), text);
  return parsed.data;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class LlmInference implements InferencePort {
  private limiter: Limiter;

  constructor(
    private provider: LLMProvider,
    private config: LLMConfig,
    private budget: CallBudget,
    private random: () => number = Math.random
  ) {
    this.limiter = new Limiter(config.maxConcurrentRequests);
  }

  async infer<T>(request: InferenceRequest<T>): Promise<InferenceResult<T>> {
    const temperature = request.deterministic ? 0 : this.config.temperature;
    const maxTokens = request.maxTokens ?? this.config.maxTokens;
    let attempts = 0;

    const slots = this.limiter.getStats();
    if (slots.currentCount >= slots.maxConcurrent) {
      log.debug(`${request.task}: all ${slots.maxConcurrent} request slots busy, ${slots.waitingCount} queued`);
    }

    try {
      const { value } = await withRetry(
        attempt => this.limiter.run(() => withTimeout(
          signal => {
            attempts = attempt;
            this.budget.recordRequest();
            return this.provider.generate({ prompt: request.prompt, model: request.model, temperature, maxTokens, signal });
          },
          this.config.timeoutMs,
          request.signal
        )),
        request.retry ?? this.config.transportRetry,
        {
          shouldRetry: isTransient,
          signal: request.signal,
          random: this.random,
          onRetry: (err, attempt, delayMs) =>
            log.warn(`${request.task}: transport attempt ${attempt} failed, retrying in ${delayMs}ms`, { error: errorMessage(err) })
        }
      );
      const usage = value.usage ?? { inputTokens: 0, outputTokens: 0 };
      this.budget.recordTokens(usage);
      if (attempts > 1) log.debug(`${request.task}: succeeded after ${attempts} transport attempts`);

      const parsed = parseStructured(value.text, request.schema);
      return { ok: true, value: parsed, usage, attempts };
    } catch (err) {
      const error = toError(err);
      const raw = error instanceof SchemaValidationError ? error.raw : "";
      log.debug(`${request.task}: failed after ${attempts} attempts`, { error: error.message });
      return { ok: false, error, raw, attempts };
    }
  }
}

export interface StructuredRetryOptions {
  random?: () => number;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * `infer` under a caller-side policy whose `maxAttempts` bounds every provider
 * request made for the call. Transport retries happen inside the port out of
 * what is left of that bound; a schema-invalid answer is re-asked with a
 * stricter suffix naming the problem. Anything else fails at once. The final
 * error carries the total attempt count (see `attemptsOf`).
 */
export async function inferWithRetry<T>(
  port: InferencePort,
  request: InferenceRequest<T>,
  policy: RetryPolicy,
  options: StructuredRetryOptions = {}
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let used = 0;
  let suffix = "";

  for (let round = 1; ; round++) {
    const result = await port.infer({
      ...request,
      prompt: request.prompt + suffix,
      retry: { ...policy, maxAttempts: maxAttempts - used }
    });
    used += result.attempts;
    if (result.ok) return { value: result.value, attempts: used };
    if (!(result.error instanceof SchemaValidationError) || used >= maxAttempts) {
      throw tagAttempts(result.error, used);
    }

    suffix = fillTemplate(STRICT_SUFFIX, { error: result.error.message });
    const delay = backoffDelay(policy, round, options.random);
    options.onRetry?.(result.error, used, delay);
    await sleep(delay, request.signal);
  }
}
