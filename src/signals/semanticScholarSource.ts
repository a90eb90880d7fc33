import axios from "axios";
import type { AttentionSignal } from "../types/paper";
import type { SignalFetchResult, SignalSource } from "./signalSource";
import { SemanticScholarPaperSchema } from "../schemas/upstream.schema";
import { PipelineAbortError, errorMessage, toTransportError } from "../errors";
import { baseIdOf } from "../sources/versions";

const API_URL = "https://api.semanticscholar.org/graph/v1/paper";

export class SemanticScholarSource implements SignalSource {
  name = "semantic_scholar";

  constructor(private apiKey = "", private now: () => Date = () => new Date()) {}

  async fetchSignals(paperId: string, signal?: AbortSignal): Promise<SignalFetchResult> {
    const url = `${API_URL}/arXiv:${encodeURIComponent(baseIdOf(paperId))}?fields=citationCount,influentialCitationCount`;
    let data: unknown;
    try {
      const response = await axios.get<unknown>(url, {
        headers: this.apiKey ? { "x-api-key": this.apiKey } : {},
        signal
      });
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 404) {
        return { status: "ok", signals: [] };
      }
      const mapped = toTransportError(err, "semantic_scholar");
      if (mapped instanceof PipelineAbortError) throw mapped;
      return { status: "unavailable", reason: errorMessage(mapped) };
    }

    const parsed = SemanticScholarPaperSchema.safeParse(data);
    if (!parsed.success) return { status: "unavailable", reason: "semantic_scholar: unexpected response shape" };

    const fetchedAt = this.now().toISOString();
    const signals: AttentionSignal[] = [];
    if (typeof parsed.data.citationCount === "number") {
      signals.push({ source: this.name, metric: "citations", value: parsed.data.citationCount, fetchedAt });
    }
    if (typeof parsed.data.influentialCitationCount === "number") {
      signals.push({ source: this.name, metric: "influential_citations", value: parsed.data.influentialCitationCount, fetchedAt });
    }
    return { status: "ok", signals };
  }
}
