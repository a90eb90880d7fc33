export interface LLMInput {
  system?: string;
  prompt: string;
  /** Overrides the provider's default model for this call. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMOutput {
  text: string;
  usage?: LLMUsage;
  raw?: unknown;
}

/**
 * A single chat completion. Implementations make exactly one request and map
 * failures onto TransientTransportError / UpstreamError; retries happen above.
 */
export interface LLMProvider {
  generate(input: LLMInput): Promise<LLMOutput>;
}
