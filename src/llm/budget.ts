import type { BudgetConfig } from "../types/config";
import type { RunUsage } from "../types/paper";
import type { LLMUsage } from "./provider";

/**
 * Request and token accounting for one run. A limit of 0 means unlimited.
 * Exhaustion never blocks a call; callers of optional stages check `exhausted`.
 */
export class CallBudget {
  private requests = 0;
  private inputTokens = 0;
  private outputTokens = 0;

  constructor(private readonly limits: BudgetConfig) {}

  reset(): void {
    this.requests = 0;
    this.inputTokens = 0;
    this.outputTokens = 0;
  }

  /** Counts one provider request, whether or not it succeeds. */
  recordRequest(): void {
    this.requests++;
  }

  recordTokens(usage: LLMUsage): void {
    this.inputTokens += usage.inputTokens;
    this.outputTokens += usage.outputTokens;
  }

  record(usage: LLMUsage): void {
    this.recordRequest();
    this.recordTokens(usage);
  }

  get exhausted(): boolean {
    const { maxRequests, maxTokens } = this.limits;
    if (maxRequests > 0 && this.requests >= maxRequests) return true;
    if (maxTokens > 0 && this.inputTokens + this.outputTokens >= maxTokens) return true;
    return false;
  }

  usage(): RunUsage {
    return { requests: this.requests, inputTokens: this.inputTokens, outputTokens: this.outputTokens };
  }
}
