import axios from "axios";
import { XMLParser } from "fast-xml-parser";
import type { Candidate } from "../types/paper";
import type { CandidateSource, SearchParams } from "./source";
import { ArxivEntrySchema, ArxivFeedSchema, type ArxivEntry } from "../schemas/upstream.schema";
import { UpstreamError, toTransportError } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("arxiv");

const API_URL = "https://export.arxiv.org/api/query";

const ARRAY_TAGS = new Set(["entry", "author", "category", "link"]);

function squash(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

/** YYYYMMDDHHMM in UTC, the format of arXiv's date-range filter. */
function arxivStamp(d: Date): string {
  return d.toISOString().slice(0, 16).replace(/[-T:]/g, "");
}

export class ArxivSource implements CandidateSource {
  name = "arxiv";
  private parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "",
    parseTagValue: false,
    isArray: (tagName) => ARRAY_TAGS.has(tagName)
  });

  constructor(private timeoutMs = 30_000) {}

  buildQuery(categories: string[], windowStart: Date, windowEnd: Date): string {
    const catParts = categories.map(c => `cat:${c}`);
    const catClause = catParts.length > 0 ? `(${catParts.join(" OR ")})` : "all:*";
    return `${catClause} AND lastUpdatedDate:[${arxivStamp(windowStart)} TO ${arxivStamp(windowEnd)}]`;
  }

  buildUrl(params: SearchParams): string {
    const query = this.buildQuery(params.categories, params.windowStart, params.windowEnd);
    const encoded = encodeURIComponent(query);
    return `${API_URL}?search_query=${encoded}&start=0&max_results=${params.maxResults}&sortBy=lastUpdatedDate&sortOrder=descending`;
  }

  parseEntry(entry: ArxivEntry): Candidate | null {
    const rawId = squash(entry.id);
    if (!rawId) return null;
    if (rawId.includes("/api/errors")) {
      throw new UpstreamError(`arXiv API error: ${squash(entry.summary)}`);
    }

    // http://arxiv.org/abs/2501.12345v2 → 2501.12345v2
    const idMatch = rawId.match(/arxiv\.org\/abs\/(.+)$/i);
    const id = idMatch ? idMatch[1] : rawId;

    const categories = entry.category.map(c => c.term);
    const primaryCategory = entry["arxiv:primary_category"]?.term ?? categories[0] ?? "";

    let htmlLink = "";
    for (const link of entry.link) {
      if (link.rel === "alternate" || link.type === "text/html") htmlLink = link.href ?? htmlLink;
    }

    return {
      id,
      title: squash(entry.title),
      authors: entry.author.map(a => squash(a.name)).filter(Boolean),
      abstract: squash(entry.summary),
      categories,
      primaryCategory,
      published: entry.published,
      updated: entry.updated,
      url: htmlLink || `https://arxiv.org/abs/${id}`
    };
  }

  parseFeed(xmlText: string): Candidate[] {
    let doc: unknown;
    try {
      doc = this.parser.parse(xmlText);
    } catch (err) {
      throw new UpstreamError(`arXiv XML parse error: ${String(err)}`);
    }
    const feed = ArxivFeedSchema.safeParse(doc);
    if (!feed.success) throw new UpstreamError("arXiv response is not an Atom feed");

    const candidates: Candidate[] = [];
    for (const raw of feed.data.feed.entry) {
      const entry = ArxivEntrySchema.safeParse(raw);
      if (!entry.success) {
        log.warn("skipping malformed feed entry", { issue: entry.error.issues[0]?.message });
        continue;
      }
      const candidate = this.parseEntry(entry.data);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  }

  /** `[windowStart, windowEnd)` on the update timestamp. */
  filterByWindow(candidates: Candidate[], windowStart: Date, windowEnd: Date): Candidate[] {
    return candidates.filter(c => {
      const dateStr = c.updated || c.published;
      if (!dateStr) return false;
      const d = new Date(dateStr);
      return d >= windowStart && d < windowEnd;
    });
  }

  async search(params: SearchParams): Promise<Candidate[]> {
    const url = this.buildUrl(params);
    log.debug(`GET ${url}`);

    let xmlText: string;
    try {
      const response = await axios.get<string>(url, {
        responseType: "text",
        timeout: this.timeoutMs,
        signal: params.signal
      });
      xmlText = response.data;
    } catch (err) {
      throw toTransportError(err, "arXiv");
    }

    const candidates = this.parseFeed(xmlText);
    // The API's range filter is minute-granular and inclusive at both ends.
    return this.filterByWindow(candidates, params.windowStart, params.windowEnd);
  }
}
