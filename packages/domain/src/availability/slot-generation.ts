import { DateTime } from "luxon";
import { addMinutes } from "./interval";
import type { SlotSearch, TimeInterval, WorkingHours } from "./types";

export const DEFAULT_GRANULARITY_MINUTES = 30;

function alignToGranularity(date: Date, granularityMinutes: number): Date {
  const ms = granularityMinutes * 60_000;
  const aligned = Math.ceil(date.getTime() / ms) * ms;
  return new Date(aligned);
}

export function parseLocalTime(value: string): { hour: number; minute: number } {
  const [hour, minute] = value.split(":").map(Number);
  return { hour: hour ?? 0, minute: minute ?? 0 };
}

export function isWithinWorkingHours(slot: TimeInterval, hours: WorkingHours): boolean {
  const localStart = DateTime.fromJSDate(slot.start, { zone: hours.timezone });
  if (!localStart.isValid || !hours.weekdays.includes(localStart.weekday)) return false;

  const open = localStart.set({ ...parseLocalTime(hours.start), second: 0, millisecond: 0 });
  const close = localStart.set({ ...parseLocalTime(hours.end), second: 0, millisecond: 0 });
  return localStart.toMillis() >= open.toMillis() && slot.end.getTime() <= close.toMillis();
}

/**
 * Candidate windows for a search, in start order. Each iteration of the returned iterable
 * walks the search range again from the first aligned start.
 */
export function generateCandidateSlots(search: SlotSearch): Iterable<TimeInterval> {
  return {
    *[Symbol.iterator]() {
      if (search.durationMinutes <= 0 || search.granularityMinutes <= 0) return;

      const spanMs = search.durationMinutes * 60_000;
      let cursor = alignToGranularity(search.earliestStart, search.granularityMinutes);

      while (cursor.getTime() + spanMs <= search.latestEnd.getTime()) {
        const slot = { start: cursor, end: new Date(cursor.getTime() + spanMs) };
        if (isWithinWorkingHours(slot, search.workingHours)) {
          yield slot;
        }
        cursor = addMinutes(cursor, search.granularityMinutes);
      }
    }
  };
}
