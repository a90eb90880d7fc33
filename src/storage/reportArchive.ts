import path from "path";
import type { DailyReport, ReportStats, RunUsage } from "../types/paper";
import type { FileStore } from "./fileStore";
import { DailyReportSchema } from "../schemas/report.schema";
import { PersistenceError, ReportNotFoundError, errorMessage } from "../errors";
import { createModuleLogger } from "../logging/logger";

const log = createModuleLogger("archive");

/**
 * Persisted daily reports keyed by period label (YYYY-MM-DD).
 * `write` overwrites; `readRange` is inclusive and ascending.
 */
export interface ReportArchive {
  write(date: string, report: DailyReport): Promise<void>;
  read(date: string): Promise<DailyReport | null>;
  readRange(startDate: string, endDate: string): Promise<DailyReport[]>;
  /** Whether a report file is stored for `date`, valid or not. */
  exists(date: string): Promise<boolean>;
  /** Stored labels, ascending. */
  listDates(): Promise<string[]>;
}

export interface ArchivedRun {
  date: string;
  generatedAt: string;
  stats: ReportStats;
  usage: RunUsage;
  spotlight: number;
}

export interface ArchiveStats {
  /** Newest first. */
  recentRuns: ArchivedRun[];
}

/** Counts of the `limit` most recent stored reports; unreadable ones are left out. */
export async function archiveStats(archive: ReportArchive, limit: number): Promise<ArchiveStats> {
  const dates = (await archive.listDates()).reverse().slice(0, Math.max(0, limit));
  const recentRuns: ArchivedRun[] = [];
  for (const date of dates) {
    const report = await archive.read(date);
    if (!report) continue;
    recentRuns.push({
      date,
      generatedAt: report.generatedAt,
      stats: report.stats,
      usage: report.usage,
      spotlight: report.spotlight.length
    });
  }
  return { recentRuns };
}

/** The stored report for `date` as pretty-printed JSON. */
export async function exportReport(archive: ReportArchive, date: string): Promise<string> {
  const report = await archive.read(date);
  if (!report) throw new ReportNotFoundError(date);
  return JSON.stringify(report, null, 2);
}

const DATE_FILE = /^(\d{4}-\d{2}-\d{2})\.json$/;

export class FileReportArchive implements ReportArchive {
  private readonly folder: string;

  constructor(private store: FileStore, rootFolder: string) {
    this.folder = path.join(rootFolder, "reports");
  }

  private reportPath(date: string): string {
    return path.join(this.folder, `${date}.json`);
  }

  async write(date: string, report: DailyReport): Promise<void> {
    try {
      await this.store.writeFile(this.reportPath(date), JSON.stringify(report, null, 2));
    } catch (err) {
      throw new PersistenceError(`Failed to write report ${date}: ${errorMessage(err)}`, err);
    }
  }

  async read(date: string): Promise<DailyReport | null> {
    const content = await this.store.readFile(this.reportPath(date));
    if (content === null) return null;
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      log.warn(`report ${date} is not valid JSON, ignoring`, { error: errorMessage(err) });
      return null;
    }
    const parsed = DailyReportSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(`report ${date} failed validation, ignoring`, { issue: parsed.error.issues[0]?.message });
      return null;
    }
    const report: DailyReport = parsed.data;
    return report;
  }

  async exists(date: string): Promise<boolean> {
    return this.store.fileExists(this.reportPath(date));
  }

  async listDates(): Promise<string[]> {
    const files = await this.store.listFolder(this.folder);
    const dates: string[] = [];
    for (const f of files) {
      const m = DATE_FILE.exec(f);
      if (m) dates.push(m[1]);
    }
    return dates.sort();
  }

  async readRange(startDate: string, endDate: string): Promise<DailyReport[]> {
    const dates = await this.listDates();
    const filtered = dates.filter(d => d >= startDate && d <= endDate);
    const results: DailyReport[] = [];
    for (const d of filtered) {
      const report = await this.read(d);
      if (report) results.push(report);
    }
    return results;
  }
}
