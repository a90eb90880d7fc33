#!/usr/bin/env node
import { loadSettings } from "./settings";
import { USAGE, UsageError, parseCommand } from "./cli";
import { createPipelineDeps, runDailyPipeline, type DailyPipelineOptions, type PipelineDeps } from "./pipeline/dailyPipeline";
import { runBackfillPipeline } from "./pipeline/backfillPipeline";
import { archiveStats, exportReport } from "./storage/reportArchive";
import { Scheduler } from "./scheduler/scheduler";
import { errorMessage } from "./errors";
import { createModuleLogger } from "./logging/logger";

const log = createModuleLogger("main");

const CONFIG_PATH = process.env.DIGEST_CONFIG ?? "digest.config.json";

async function runOnce(deps: PipelineDeps, options: DailyPipelineOptions = {}): Promise<void> {
  const result = await runDailyPipeline(deps, { ...options, onProgress: msg => log.info(msg) });
  switch (result.status) {
    case "no-update":
      log.info(`no update (${result.reason}); nothing written`);
      break;
    case "dry-run":
      log.info(`dry run ${result.date}: ${result.candidates} candidates written to ${result.path}`);
      break;
    case "written":
      log.info(`report ${result.report.date} written: ${result.report.papers.length} papers, ${result.report.spotlight.length} spotlight`);
      break;
  }
}

async function startScheduler(deps: PipelineDeps): Promise<void> {
  const { settings } = deps;
  const scheduler = new Scheduler(() => settings, deps.stateStore, {
    onDaily: () => runOnce(deps),
    reportExists: date => deps.archive.exists(date)
  });
  scheduler.start();
  log.info(`scheduler started, daily run at ${settings.schedule.dailyTime} (${settings.search.timezone})`);
  // First check now, so a missed run is caught up on startup.
  await scheduler.tick();

  const shutdown = () => {
    log.info(scheduler.isRunning() ? "shutting down after the current run" : "shutting down");
    scheduler.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  const settings = await loadSettings(CONFIG_PATH);
  const deps = createPipelineDeps(settings);
  await deps.stateStore.load();

  const callsModels = command.kind === "auto" || command.kind === "schedule" || command.kind === "backfill"
    || (command.kind === "run" && !command.dryRun);
  if (callsModels && !settings.llm.apiKey) {
    log.warn("no LLM API key configured; model calls will fail and degrade");
  }

  switch (command.kind) {
    case "auto":
      if (settings.schedule.enabled) await startScheduler(deps);
      else await runOnce(deps);
      return;
    case "run":
      await runOnce(deps, { targetDate: command.date, dryRun: command.dryRun });
      return;
    case "schedule":
      await startScheduler(deps);
      return;
    case "backfill": {
      const result = await runBackfillPipeline(deps, {
        startDate: command.startDate,
        endDate: command.endDate,
        onProgress: (date, index, total) => log.info(`backfill ${index}/${total}: ${date}`)
      });
      const failed = Object.entries(result.errors);
      log.info(`backfill done: ${result.processed.length} written, ${result.noUpdate.length} without update, ${failed.length} failed`);
      for (const [date, message] of failed) log.error(`backfill ${date}: ${message}`);
      if (failed.length > 0) process.exitCode = 1;
      return;
    }
    case "stats":
      process.stdout.write(JSON.stringify(await archiveStats(deps.archive, command.days), null, 2) + "\n");
      return;
    case "export": {
      const json = await exportReport(deps.archive, command.date);
      if (command.out) {
        await deps.files.writeFile(command.out, json);
        log.info(`report ${command.date} exported to ${command.out}`);
      } else {
        process.stdout.write(json + "\n");
      }
      return;
    }
  }
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    process.stderr.write(`${err.message}\n\n${USAGE}\n`);
  } else {
    log.error(`fatal: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
});
