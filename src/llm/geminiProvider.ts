import axios from "axios";
import type { LLMProvider, LLMInput, LLMOutput } from "./provider";
import { GeminiGenerateResponseSchema } from "../schemas/upstream.schema";
import { UpstreamError, toTransportError } from "../errors";

// Stable names some gateways only serve under a preview id.
const MODEL_ALIASES: Record<string, string> = {
  "gemini-3-flash": "gemini-3-flash-preview"
};

/** Generative Language API v1beta `generateContent`, keyed by `x-api-key`. */
export class GeminiProvider implements LLMProvider {
  constructor(
    private baseUrl: string,
    private apiKey: string,
    private model: string
  ) {}

  async generate(input: LLMInput): Promise<LLMOutput> {
    const requested = input.model ?? this.model;
    const model = MODEL_ALIASES[requested] ?? requested;
    const url = `${this.baseUrl.replace(/\/$/, "")}/v1beta/models/${model}:generateContent`;
    const text = input.system ? `${input.system}\n\n${input.prompt}` : input.prompt;

    const body = {
      contents: [{ role: "user", parts: [{ text }] }],
      generationConfig: {
        temperature: input.temperature ?? 0.3,
        maxOutputTokens: input.maxTokens ?? 4096
      }
    };

    let data: unknown;
    try {
      const response = await axios.post<unknown>(url, body, {
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this.apiKey
        },
        signal: input.signal
      });
      data = response.data;
    } catch (err) {
      throw toTransportError(err, "generateContent");
    }

    const parsed = GeminiGenerateResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(`generateContent: unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }
    const json = parsed.data;
    const reply = json.candidates[0].content.parts.map(p => p.text ?? "").join("").trim();
    const meta = json.usageMetadata;
    const usage = meta ? {
      inputTokens: meta.promptTokenCount ?? 0,
      outputTokens: meta.candidatesTokenCount ?? 0
    } : undefined;

    return { text: reply, usage, raw: json };
  }
}
