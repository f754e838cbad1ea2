import { describe, expect, it } from "vitest";
import {
  generateCandidateSlots,
  isWithinWorkingHours,
  parseLocalTime
} from "../src/availability/slot-generation";
import type { WorkingHours } from "../src/availability/types";

const weekdays: WorkingHours = { weekdays: [1, 2, 3, 4, 5], start: "09:00", end: "17:00", timezone: "UTC" };

function starts(slots: Iterable<{ start: Date }>) {
  return [...slots].map((s) => s.start.toISOString());
}

describe("generateCandidateSlots", () => {
  it("covers a working day at the step granularity", () => {
    const slots = [
      ...generateCandidateSlots({
        earliestStart: new Date("2026-03-02T08:10:00.000Z"),
        latestEnd: new Date("2026-03-02T18:00:00.000Z"),
        durationMinutes: 60,
        granularityMinutes: 30,
        workingHours: weekdays
      })
    ];

    expect(slots).toHaveLength(15);
    expect(slots[0]?.start.toISOString()).toBe("2026-03-02T09:00:00.000Z");
    expect(slots.at(-1)?.start.toISOString()).toBe("2026-03-02T16:00:00.000Z");
    for (const slot of slots) {
      expect(slot.end.getTime() - slot.start.getTime()).toBe(60 * 60_000);
      expect(isWithinWorkingHours(slot, weekdays)).toBe(true);
    }
  });

  it("rounds the first start up to the granularity", () => {
    const result = starts(
      generateCandidateSlots({
        earliestStart: new Date("2026-03-02T09:10:00.000Z"),
        latestEnd: new Date("2026-03-02T11:00:00.000Z"),
        durationMinutes: 60,
        granularityMinutes: 30,
        workingHours: weekdays
      })
    );

    expect(result).toEqual(["2026-03-02T09:30:00.000Z", "2026-03-02T10:00:00.000Z"]);
  });

  it("skips weekends and never runs past the latest end", () => {
    const result = starts(
      generateCandidateSlots({
        earliestStart: new Date("2026-03-06T15:00:00.000Z"),
        latestEnd: new Date("2026-03-09T11:00:00.000Z"),
        durationMinutes: 60,
        granularityMinutes: 30,
        workingHours: weekdays
      })
    );

    expect(result).toEqual([
      "2026-03-06T15:00:00.000Z",
      "2026-03-06T15:30:00.000Z",
      "2026-03-06T16:00:00.000Z",
      "2026-03-09T09:00:00.000Z",
      "2026-03-09T09:30:00.000Z",
      "2026-03-09T10:00:00.000Z"
    ]);
  });

  it("reads working hours in the calendar timezone", () => {
    const result = starts(
      generateCandidateSlots({
        earliestStart: new Date("2026-03-02T00:00:00.000Z"),
        latestEnd: new Date("2026-03-02T23:00:00.000Z"),
        durationMinutes: 60,
        granularityMinutes: 60,
        workingHours: { ...weekdays, timezone: "Europe/Berlin" }
      })
    );

    expect(result[0]).toBe("2026-03-02T08:00:00.000Z");
    expect(result.at(-1)).toBe("2026-03-02T15:00:00.000Z");
    expect(result).toHaveLength(8);
  });

  it("yields nothing when the duration does not fit", () => {
    const tooLong = generateCandidateSlots({
      earliestStart: new Date("2026-03-02T09:00:00.000Z"),
      latestEnd: new Date("2026-03-02T10:00:00.000Z"),
      durationMinutes: 90,
      granularityMinutes: 30,
      workingHours: weekdays
    });
    const zero = generateCandidateSlots({
      earliestStart: new Date("2026-03-02T09:00:00.000Z"),
      latestEnd: new Date("2026-03-02T10:00:00.000Z"),
      durationMinutes: 0,
      granularityMinutes: 30,
      workingHours: weekdays
    });

    expect([...tooLong]).toEqual([]);
    expect([...zero]).toEqual([]);
  });

  it("restarts from the first slot on every iteration", () => {
    const slots = generateCandidateSlots({
      earliestStart: new Date("2026-03-02T09:00:00.000Z"),
      latestEnd: new Date("2026-03-02T12:00:00.000Z"),
      durationMinutes: 60,
      granularityMinutes: 30,
      workingHours: weekdays
    });

    expect(starts(slots)).toEqual(starts(slots));
    expect(starts(slots)).toHaveLength(5);
  });
});

describe("isWithinWorkingHours", () => {
  it("requires the whole slot inside the band on an allowed day", () => {
    const at = (start: string, end: string) => ({ start: new Date(start), end: new Date(end) });

    expect(isWithinWorkingHours(at("2026-03-02T16:00:00.000Z", "2026-03-02T17:00:00.000Z"), weekdays)).toBe(true);
    expect(isWithinWorkingHours(at("2026-03-02T16:30:00.000Z", "2026-03-02T17:30:00.000Z"), weekdays)).toBe(false);
    expect(isWithinWorkingHours(at("2026-03-02T08:30:00.000Z", "2026-03-02T09:30:00.000Z"), weekdays)).toBe(false);
    expect(isWithinWorkingHours(at("2026-03-07T10:00:00.000Z", "2026-03-07T11:00:00.000Z"), weekdays)).toBe(false);
  });

  it("parses HH:mm", () => {
    expect(parseLocalTime("09:30")).toEqual({ hour: 9, minute: 30 });
  });
});
