export type Command =
  | { kind: "auto" }
  | { kind: "run"; date?: string; dryRun: boolean }
  | { kind: "schedule" }
  | { kind: "backfill"; startDate: string; endDate: string }
  | { kind: "stats"; days: number }
  | { kind: "export"; date: string; out?: string };

export const USAGE = `Usage: arxiv-digest [command] [options]

Commands:
  (none)                        run once, or start the scheduler when schedule.enabled
  run [--date D] [--dry-run]    one daily run; --dry-run only harvests candidates
  schedule                      start the daily scheduler
  backfill --from D --to D      one run per day in the range, oldest first
  stats [--days N]              counts of the N most recent reports (default 30)
  export --date D [--out FILE]  print or save the stored report for D

Dates are YYYY-MM-DD. The config file is $DIGEST_CONFIG or ./digest.config.json.`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const DATE = /^\d{4}-\d{2}-\d{2}$/;

function readFlags(argv: string[], valued: string[], boolean: string[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (boolean.includes(token)) {
      flags.set(token, "true");
      continue;
    }
    if (valued.includes(token)) {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) throw new UsageError(`${token} needs a value`);
      flags.set(token, next);
      i++;
      continue;
    }
    throw new UsageError(`unknown argument: ${token}`);
  }
  return flags;
}

function dateFlag(flags: Map<string, string>, name: string): string | undefined {
  const value = flags.get(name);
  if (value !== undefined && !DATE.test(value)) throw new UsageError(`${name} expects YYYY-MM-DD, got ${value}`);
  return value;
}

function requiredDate(flags: Map<string, string>, name: string): string {
  const value = dateFlag(flags, name);
  if (value === undefined) throw new UsageError(`${name} is required`);
  return value;
}

export function parseCommand(argv: string[]): Command {
  const name: string | undefined = argv[0];
  const rest = argv.slice(1);
  switch (name) {
    case undefined:
      return { kind: "auto" };
    case "run": {
      const flags = readFlags(rest, ["--date"], ["--dry-run"]);
      return { kind: "run", date: dateFlag(flags, "--date"), dryRun: flags.has("--dry-run") };
    }
    case "schedule":
      readFlags(rest, [], []);
      return { kind: "schedule" };
    case "backfill": {
      const flags = readFlags(rest, ["--from", "--to"], []);
      return { kind: "backfill", startDate: requiredDate(flags, "--from"), endDate: requiredDate(flags, "--to") };
    }
    case "stats": {
      const flags = readFlags(rest, ["--days"], []);
      const days = Number(flags.get("--days") ?? "30");
      if (!Number.isInteger(days) || days < 1) throw new UsageError(`--days expects a positive integer, got ${flags.get("--days")}`);
      return { kind: "stats", days };
    }
    case "export": {
      const flags = readFlags(rest, ["--date", "--out"], []);
      return { kind: "export", date: requiredDate(flags, "--date"), out: flags.get("--out") };
    }
    default:
      throw new UsageError(`unknown command: ${name}`);
  }
}
