import dotenv from "dotenv";
import fs from "fs/promises";
import type { DigestSettings } from "./types/config";
import { DigestSettingsSchema } from "./schemas/settings.schema";
import { errorMessage } from "./errors";

export const DEFAULT_SETTINGS: DigestSettings = {
  rootFolder: "DigestData",
  language: "zh",
  runBudgetMs: 20 * 60 * 1000,

  llm: {
    provider: "openai_compatible",
    baseUrl: "https://api.openai.com/v1",
    apiKey: "",
    fastModel: "gpt-4o-mini",
    smartModel: "gpt-4o",
    temperature: 0.3,
    deterministic: true,
    maxTokens: 1024,
    timeoutMs: 60_000,
    maxConcurrentRequests: 4,
    transportRetry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 15_000, jitterMs: 500 }
  },

  search: {
    categories: ["cs.AI", "cs.LG", "cs.CL"],
    mode: "latest-update",
    timeWindowHours: 72,
    lookbackDays: 7,
    maxTotalAttempts: 20,
    timezone: "UTC",
    maxResults: 200,
    keywordsInclude: ["rlhf", "agent", "kv cache", "inference", "mixture of experts"],
    keywordsExclude: [],
    retry: { maxAttempts: 3, baseDelayMs: 3000, maxDelayMs: 20_000, jitterMs: 1000 }
  },

  filter: {
    threshold: 60,
    maxSelected: 20,
    reviewMode: "fast-only",
    reviewBand: 10,
    prefilter: "none",
    concurrency: 4,
    retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 4000, jitterMs: 250 }
  },

  extraction: {
    concurrency: 3,
    retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 500 }
  },

  trend: {
    enableWeekly: true,
    enableMonthly: true,
    windowMode: "rolling",
    weeklyDays: 7,
    monthlyDays: 30,
    topK: 10
  },

  spotlight: {
    enabled: true,
    recentDays: 14,
    threshold: 40,
    maxItems: 3,
    sources: ["semantic_scholar", "huggingface"],
    weights: {
      "semantic_scholar.citations": 0.4,
      "semantic_scholar.influential_citations": 0.2,
      "huggingface.upvotes": 0.4
    },
    normalization: {
      "semantic_scholar.citations": { kind: "log", cap: 50 },
      "semantic_scholar.influential_citations": { kind: "log", cap: 10 },
      "huggingface.upvotes": { kind: "log", cap: 100 }
    },
    fetchTimeoutMs: 10_000,
    concurrency: 4,
    perSourceConcurrency: 2,
    semanticScholarApiKey: ""
  },

  budget: {
    maxRequests: 0,
    maxTokens: 0
  },

  schedule: {
    enabled: false,
    dailyTime: "08:30",
    retryAfterMinutes: 30
  },

  backfillMaxDays: 30
};

type Env = Record<string, string | undefined>;

/** Populate process.env from .env in the working directory. */
export function loadEnv(): Env {
  dotenv.config();
  return process.env;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars in `patch` replace. */
export function mergeSettings(base: unknown, patch: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch === undefined ? base : patch;
  }
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    out[key] = mergeSettings(base[key], value);
  }
  return out;
}

function applyEnv(raw: unknown, env: Env): unknown {
  const overrides: Record<string, Record<string, string>> = { llm: {}, spotlight: {} };
  const top: Record<string, string> = {};
  if (env.DIGEST_LLM_API_KEY) overrides.llm.apiKey = env.DIGEST_LLM_API_KEY;
  if (env.DIGEST_LLM_BASE_URL) overrides.llm.baseUrl = env.DIGEST_LLM_BASE_URL;
  if (env.DIGEST_LLM_PROVIDER) overrides.llm.provider = env.DIGEST_LLM_PROVIDER;
  if (env.DIGEST_S2_API_KEY) overrides.spotlight.semanticScholarApiKey = env.DIGEST_S2_API_KEY;
  if (env.DIGEST_ROOT_FOLDER) top.rootFolder = env.DIGEST_ROOT_FOLDER;
  return mergeSettings(raw, { ...top, ...overrides });
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Build the immutable settings for a run: defaults, then the optional JSON
 * file at `filePath`, then environment overrides. Throws when the result is
 * invalid, naming every offending field.
 */
export async function loadSettings(filePath?: string, env: Env = loadEnv()): Promise<DigestSettings> {
  let fromFile: unknown = {};
  if (filePath) {
    let text: string | null = null;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (!(isPlainObject(err) && err.code === "ENOENT")) {
        throw new Error(`Cannot read settings file ${filePath}: ${errorMessage(err)}`);
      }
    }
    if (text !== null) {
      try {
        fromFile = JSON.parse(text);
      } catch (err) {
        throw new Error(`Settings file ${filePath} is not valid JSON: ${errorMessage(err)}`);
      }
    }
  }

  const merged = applyEnv(mergeSettings(DEFAULT_SETTINGS, fromFile), env);
  const parsed = DigestSettingsSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid settings: ${issues}`);
  }
  const settings: DigestSettings = parsed.data;
  return deepFreeze(settings);
}
