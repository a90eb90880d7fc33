import path from "path";
import { z } from "zod";
import type { AttentionSignal } from "../types/paper";
import type { FileStore } from "./fileStore";
import { AttentionSignalSchema } from "../schemas/report.schema";
import { baseIdOf } from "../sources/versions";
import { errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("signal-cache");

const CacheFileSchema = z.record(z.array(AttentionSignalSchema));

type DayMap = Record<string, AttentionSignal[]>;  // key: "<base id>|<source>"

/**
 * Signals fetched per (paper, source, day). One JSON file per day; entries are
 * only ever added, never replaced.
 */
export class SignalCache {
  private days = new Map<string, DayMap>();
  private dirty = new Set<string>();
  private readonly folder: string;

  constructor(private store: FileStore, rootFolder: string) {
    this.folder = path.join(rootFolder, "cache", "signals");
  }

  private key(paperId: string, source: string): string {
    return `${baseIdOf(paperId)}|${source}`;
  }

  private dayPath(day: string): string {
    return path.join(this.folder, `${day}.json`);
  }

  async load(day: string): Promise<void> {
    if (this.days.has(day)) return;
    let map: DayMap = {};
    const content = await this.store.readFile(this.dayPath(day));
    if (content) {
      try {
        const parsed = CacheFileSchema.safeParse(JSON.parse(content));
        if (parsed.success) map = parsed.data;
        else log.warn(`signal cache ${day} failed validation, starting empty`);
      } catch (err) {
        log.warn(`signal cache ${day} is not valid JSON, starting empty`, { error: errorMessage(err) });
      }
    }
    this.days.set(day, map);
  }

  get(paperId: string, source: string, day: string): AttentionSignal[] | undefined {
    return this.days.get(day)?.[this.key(paperId, source)];
  }

  /** Record a fetch. Returns false when the entry already existed (it is kept as is). */
  put(paperId: string, source: string, day: string, signals: AttentionSignal[]): boolean {
    let map = this.days.get(day);
    if (!map) {
      map = {};
      this.days.set(day, map);
    }
    const key = this.key(paperId, source);
    if (map[key]) return false;
    map[key] = signals.map(s => ({ ...s }));
    this.dirty.add(day);
    return true;
  }

  async save(): Promise<void> {
    for (const day of this.dirty) {
      const map = this.days.get(day) ?? {};
      await this.store.writeFile(this.dayPath(day), JSON.stringify(map, null, 2));
    }
    this.dirty.clear();
  }
}
