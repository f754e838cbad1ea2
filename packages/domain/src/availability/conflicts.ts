import { DateTime } from "luxon";
import { overlaps } from "./interval";
import type { AvailabilitySnapshot, CandidateSlot, ConflictDescription, TimeInterval } from "./types";

function formatClock(date: Date, timezone: string): string {
  return DateTime.fromJSDate(date, { zone: timezone }).toFormat("HH:mm");
}

function formatWindow(window: TimeInterval, timezone: string): string {
  return `${formatClock(window.start, timezone)}-${formatClock(window.end, timezone)}`;
}

/**
 * Conflicts per participant for one interval. Participants without an entry are free.
 * Only `busy` markers count; `available` markers never block a slot.
 */
export function detectSlotConflicts(
  slot: TimeInterval,
  participantIds: readonly string[],
  snapshot: AvailabilitySnapshot,
  timezone: string
): Map<string, ConflictDescription[]> {
  const conflicts = new Map<string, ConflictDescription[]>();

  for (const participantId of participantIds) {
    const data = snapshot.get(participantId);
    if (!data) continue;

    const found: ConflictDescription[] = [];

    for (const booking of data.bookings) {
      if (!overlaps(slot, booking)) continue;
      found.push({
        participantId,
        source: "interview",
        reason: `Existing interview: ${booking.title} (${formatWindow(booking, timezone)})`,
        window: { start: booking.start, end: booking.end }
      });
    }

    for (const marker of data.markers) {
      if (marker.type !== "busy" || !overlaps(slot, marker)) continue;
      found.push({
        participantId,
        source: "busy",
        reason: `Busy: ${marker.notes ?? "Unavailable"} (${formatWindow(marker, timezone)})`,
        window: { start: marker.start, end: marker.end }
      });
    }

    if (found.length > 0) conflicts.set(participantId, found);
  }

  return conflicts;
}

/** Splits participants by conflict state. Returns null when nobody is available. */
export function evaluateSlot(
  slot: TimeInterval,
  participantIds: readonly string[],
  snapshot: AvailabilitySnapshot,
  timezone: string
): CandidateSlot | null {
  const byParticipant = detectSlotConflicts(slot, participantIds, snapshot, timezone);
  const participantsAvailable = participantIds.filter((id) => !byParticipant.has(id));
  if (participantsAvailable.length === 0) return null;

  return {
    start: slot.start,
    end: slot.end,
    conflicts: [...byParticipant.values()].flat().map((c) => c.reason),
    participantsAvailable,
    participantsUnavailable: participantIds.filter((id) => byParticipant.has(id))
  };
}
