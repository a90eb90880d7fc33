// Calendar helpers over "YYYY-MM-DD" labels. Labels are timezone-free; the
// timezone only matters when converting between labels and instants.

const DAY_MS = 86400000;

function parseLabel(label: string): { y: number; m: number; d: number } {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(label);
  if (!match) throw new Error(`Invalid date label: ${label}`);
  return { y: Number(match[1]), m: Number(match[2]), d: Number(match[3]) };
}

function labelFromUTC(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

export function addDays(label: string, n: number): string {
  const { y, m, d } = parseLabel(label);
  return labelFromUTC(Date.UTC(y, m - 1, d) + n * DAY_MS);
}

/** Days from `a` to `b` (positive when b is later). */
export function diffDays(a: string, b: string): number {
  const pa = parseLabel(a);
  const pb = parseLabel(b);
  return Math.round((Date.UTC(pb.y, pb.m - 1, pb.d) - Date.UTC(pa.y, pa.m - 1, pa.d)) / DAY_MS);
}

/** Calendar date of `instant` as seen in `timeZone`. */
export function formatDateInZone(instant: Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  const parts = formatter.formatToParts(instant);
  const get = (type: string) => parts.find(p => p.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")}`;
}

/** Offset of `timeZone` from UTC at `instant`, in milliseconds (east positive). */
function zoneOffsetMs(instant: Date, timeZone: string): number {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
    second: "numeric",
  });
  const values: Record<string, number> = {};
  for (const part of formatter.formatToParts(instant)) {
    if (part.type !== "literal") values[part.type] = Number(part.value);
  }
  const asUTC = Date.UTC(values.year, values.month - 1, values.day, values.hour, values.minute, values.second);
  const truncated = Math.floor(instant.getTime() / 1000) * 1000;
  return asUTC - truncated;
}

/** Instant of local midnight starting `label` in `timeZone`. */
export function startOfDayInZone(label: string, timeZone: string): Date {
  const { y, m, d } = parseLabel(label);
  const wallClock = Date.UTC(y, m - 1, d);
  const firstGuess = wallClock - zoneOffsetMs(new Date(wallClock), timeZone);
  // Re-evaluate at the guess so a DST change between UTC and local midnight is honoured.
  return new Date(wallClock - zoneOffsetMs(new Date(firstGuess), timeZone));
}

/** `[start, end)` of calendar day `label` in `timeZone`. */
export function dayBounds(label: string, timeZone: string): { start: Date; end: Date } {
  return {
    start: startOfDayInZone(label, timeZone),
    end: startOfDayInZone(addDays(label, 1), timeZone),
  };
}

/** Monday of the ISO week containing `label`. */
export function startOfIsoWeek(label: string): string {
  const { y, m, d } = parseLabel(label);
  const weekday = new Date(Date.UTC(y, m - 1, d)).getUTCDay(); // 0 = Sunday
  return addDays(label, -((weekday + 6) % 7));
}

export function startOfMonth(label: string): string {
  return `${label.slice(0, 7)}-01`;
}

/** Inclusive list of labels from `start` to `end`. */
export function labelsBetween(start: string, end: string): string[] {
  const out: string[] = [];
  for (let cur = start; cur <= end; cur = addDays(cur, 1)) {
    out.push(cur);
  }
  return out;
}
