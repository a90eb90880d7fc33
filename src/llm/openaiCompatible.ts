import axios from "axios";
import type { LLMProvider, LLMInput, LLMOutput } from "./provider";
import { OpenAIChatResponseSchema } from "../schemas/upstream.schema";
import { UpstreamError, toTransportError } from "../errors";

export class OpenAICompatibleProvider implements LLMProvider {
  constructor(
    private baseUrl: string,
    private apiKey: string,
    private model: string
  ) {}

  async generate(input: LLMInput): Promise<LLMOutput> {
    const messages: Array<{ role: string; content: string }> = [];

    if (input.system) {
      messages.push({ role: "system", content: input.system });
    }
    messages.push({ role: "user", content: input.prompt });

    const body = {
      model: input.model ?? this.model,
      messages,
      temperature: input.temperature ?? 0.3,
      max_tokens: input.maxTokens ?? 4096
    };

    const url = this.baseUrl.replace(/\/$/, "") + "/chat/completions";

    let data: unknown;
    try {
      const response = await axios.post<unknown>(url, body, {
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey}`
        },
        signal: input.signal
      });
      data = response.data;
    } catch (err) {
      throw toTransportError(err, "chat/completions");
    }

    const parsed = OpenAIChatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(`chat/completions: unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }
    const json = parsed.data;
    const text = json.choices[0]?.message.content ?? "";
    const usage = json.usage ? {
      inputTokens: json.usage.prompt_tokens ?? 0,
      outputTokens: json.usage.completion_tokens ?? 0
    } : undefined;

    return { text, usage, raw: json };
  }
}
