import path from "path";
import { z } from "zod";
import type { RunState } from "../types/paper";
import type { FileStore } from "./fileStore";
import { errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("state");

const RunStateSchema = z.object({
  lastDailyRun: z.string().default(""),
  lastReportDate: z.string().default(""),
  lastError: z.object({
    time: z.string(),
    stage: z.enum(["resolve", "filter", "extract", "persist", ""]),
    message: z.string(),
  }).nullable().default(null),
});

type ErrorStage = NonNullable<RunState["lastError"]>["stage"];

/** Run bookkeeping. Failing to persist it is logged and never fails a run. */
export class StateStore {
  private state: RunState;
  private readonly path: string;

  constructor(private store: FileStore, rootFolder: string) {
    this.path = path.join(rootFolder, "cache", "state.json");
    this.state = {
      lastDailyRun: "",
      lastReportDate: "",
      lastError: null
    };
  }

  async load(): Promise<void> {
    const content = await this.store.readFile(this.path);
    if (!content) return;
    try {
      const parsed = RunStateSchema.safeParse(JSON.parse(content));
      if (parsed.success) this.state = parsed.data;
      else log.warn("state file failed validation, keeping defaults");
    } catch (err) {
      log.warn("state file is not valid JSON, keeping defaults", { error: errorMessage(err) });
    }
  }

  async save(): Promise<void> {
    try {
      await this.store.writeFile(this.path, JSON.stringify(this.state, null, 2));
    } catch (err) {
      log.error("failed to save run state", { error: errorMessage(err) });
    }
  }

  get(): RunState {
    return { ...this.state };
  }

  /** `reportDate` is omitted when the run wrote nothing. */
  async setLastDailyRun(iso: string, reportDate?: string): Promise<void> {
    this.state.lastDailyRun = iso;
    if (reportDate !== undefined) this.state.lastReportDate = reportDate;
    await this.save();
  }

  async setLastError(stage: ErrorStage, message: string): Promise<void> {
    this.state.lastError = { time: new Date().toISOString(), stage, message };
    await this.save();
  }

  async clearLastError(): Promise<void> {
    this.state.lastError = null;
    await this.save();
  }
}
