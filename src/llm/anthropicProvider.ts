import Anthropic from "@anthropic-ai/sdk";
import type { LLMProvider, LLMInput, LLMOutput } from "./provider";
import { TransientTransportError, UpstreamError, PipelineAbortError } from "../errors";

/** Map SDK failures onto the transport taxonomy. */
function mapAnthropicError(err: unknown): unknown {
  if (err instanceof Anthropic.APIUserAbortError) return new PipelineAbortError("anthropic: request cancelled");
  if (err instanceof Anthropic.APIConnectionError) return new TransientTransportError(`anthropic: ${err.message}`);
  if (err instanceof Anthropic.RateLimitError) return new TransientTransportError("anthropic: rate limited", 429);
  if (err instanceof Anthropic.InternalServerError) return new TransientTransportError(`anthropic: HTTP ${err.status}`, err.status);
  if (err instanceof Anthropic.APIError) return new UpstreamError(`anthropic: ${err.message}`, err.status);
  return err;
}

export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;

  constructor(apiKey: string, private model: string, timeoutMs?: number) {
    // Retries are owned by the inference layer.
    this.client = new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
  }

  async generate(input: LLMInput): Promise<LLMOutput> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: input.model ?? this.model,
          max_tokens: input.maxTokens ?? 4096,
          temperature: input.temperature ?? 0.3,
          system: input.system,
          messages: [{ role: "user", content: input.prompt }]
        },
        { signal: input.signal }
      );
    } catch (err) {
      throw mapAnthropicError(err);
    }

    const textBlock = response.content.find(b => b.type === "text");
    const text = textBlock?.type === "text" ? textBlock.text : "";
    const usage = {
      inputTokens: response.usage?.input_tokens ?? 0,
      outputTokens: response.usage?.output_tokens ?? 0
    };

    return { text, usage, raw: response };
  }
}
