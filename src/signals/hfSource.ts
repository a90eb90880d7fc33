import axios from "axios";
import type { SignalFetchResult, SignalSource } from "./signalSource";
import { HuggingFacePaperSchema } from "../schemas/upstream.schema";
import { PipelineAbortError, errorMessage, toTransportError } from "../errors";
import { baseIdOf } from "../sources/versions";

/** Upvotes on the Hugging Face paper page, keyed by the unversioned arXiv id. */
export class HFSource implements SignalSource {
  name = "huggingface";

  constructor(private now: () => Date = () => new Date()) {}

  async fetchSignals(paperId: string, signal?: AbortSignal): Promise<SignalFetchResult> {
    const url = `https://huggingface.co/api/papers/${encodeURIComponent(baseIdOf(paperId))}`;
    let data: unknown;
    try {
      const response = await axios.get<unknown>(url, { signal });
      data = response.data;
    } catch (err) {
      // Papers nobody has posted on HF have no page.
      if (axios.isAxiosError(err) && err.response?.status === 404) {
        return { status: "ok", signals: [] };
      }
      const mapped = toTransportError(err, "huggingface");
      if (mapped instanceof PipelineAbortError) throw mapped;
      return { status: "unavailable", reason: errorMessage(mapped) };
    }

    const parsed = HuggingFacePaperSchema.safeParse(data);
    if (!parsed.success) return { status: "unavailable", reason: "huggingface: unexpected response shape" };
    if (parsed.data.upvotes === undefined) return { status: "ok", signals: [] };

    return {
      status: "ok",
      signals: [{ source: this.name, metric: "upvotes", value: parsed.data.upvotes, fetchedAt: this.now().toISOString() }]
    };
  }
}
