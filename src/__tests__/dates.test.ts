import { describe, it, expect } from "vitest";
import {
  addDays,
  dayBounds,
  diffDays,
  formatDateInZone,
  labelsBetween,
  startOfDayInZone,
  startOfIsoWeek,
  startOfMonth
} from "../util/dates";

describe("date labels", () => {
  it("adds days across month and leap boundaries", () => {
    expect(addDays("2025-02-28", 1)).toBe("2025-03-01");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2025-01-01", -1)).toBe("2024-12-31");
  });

  it("counts days between labels", () => {
    expect(diffDays("2025-01-01", "2025-01-31")).toBe(30);
    expect(diffDays("2025-01-31", "2025-01-01")).toBe(-30);
  });

  it("rejects malformed labels", () => {
    expect(() => addDays("2025/01/01", 1)).toThrow("Invalid date label");
  });

  it("lists labels inclusively", () => {
    expect(labelsBetween("2025-01-30", "2025-02-02")).toEqual(["2025-01-30", "2025-01-31", "2025-02-01", "2025-02-02"]);
    expect(labelsBetween("2025-01-02", "2025-01-01")).toEqual([]);
  });

  it("finds the ISO week start and month start", () => {
    expect(startOfIsoWeek("2025-01-19")).toBe("2025-01-13");
    expect(startOfIsoWeek("2025-01-13")).toBe("2025-01-13");
    expect(startOfMonth("2025-01-19")).toBe("2025-01-01");
  });
});

describe("timezones", () => {
  it("formats an instant as the local calendar date", () => {
    const instant = new Date("2025-01-15T23:30:00Z");
    expect(formatDateInZone(instant, "UTC")).toBe("2025-01-15");
    expect(formatDateInZone(instant, "Asia/Shanghai")).toBe("2025-01-16");
  });

  it("finds local midnight", () => {
    expect(startOfDayInZone("2025-01-16", "Asia/Shanghai").toISOString()).toBe("2025-01-15T16:00:00.000Z");
    expect(startOfDayInZone("2025-01-16", "UTC").toISOString()).toBe("2025-01-16T00:00:00.000Z");
  });

  it("gives a 23-hour day on a spring-forward date", () => {
    const { start, end } = dayBounds("2025-03-09", "America/New_York");
    expect(start.toISOString()).toBe("2025-03-09T05:00:00.000Z");
    expect(end.toISOString()).toBe("2025-03-10T04:00:00.000Z");
  });
});
