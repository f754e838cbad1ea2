import type { TimeSlot } from "./slot-scorer";

export const MAX_ALTERNATES = 3;

export type NonEmptyArray<T> = [T, ...T[]];

export type SlotSelection = {
  chosen: TimeSlot;
  alternates: TimeSlot[];
};

/** Higher score first; equal scores fall back to the earlier start. */
export function compareSlots(a: TimeSlot, b: TimeSlot): number {
  return b.score - a.score || a.start.getTime() - b.start.getTime();
}

export function rankSlots(slots: readonly TimeSlot[]): TimeSlot[] {
  return [...slots].sort(compareSlots);
}

export function isNonEmpty<T>(items: T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

export function selectSlots(ranked: NonEmptyArray<TimeSlot>, maxAlternates = MAX_ALTERNATES): SlotSelection {
  const [chosen, ...rest] = ranked;
  return { chosen, alternates: rest.slice(0, maxAlternates) };
}
