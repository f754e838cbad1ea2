import { AvailabilityGatherTimeoutError } from "@interview-scheduler/shared";
import type { AvailabilityMarker, AvailabilitySnapshot, Booking, TimeInterval } from "./types";

/**
 * Source of existing bookings and explicit availability markers. Implementations return
 * empty collections for participants they know nothing about.
 */
export interface AvailabilityGateway {
  getBookings(participantIds: readonly string[], window: TimeInterval): Promise<Booking[]>;
  getBusySlots(participantIds: readonly string[], window: TimeInterval): Promise<AvailabilityMarker[]>;
}

/** Provider `none`: no calendar data for anyone. */
export class EmptyAvailabilityGateway implements AvailabilityGateway {
  async getBookings(): Promise<Booking[]> {
    return [];
  }

  async getBusySlots(): Promise<AvailabilityMarker[]> {
    return [];
  }
}

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AvailabilityGatherTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetches every participant's calendar independently and in parallel, then merges.
 * Bookings listed in `excludeBookingIds` are ignored (an interview being rescheduled
 * must not block its own replacement).
 */
export async function gatherAvailability(
  gateway: AvailabilityGateway,
  participantIds: readonly string[],
  window: TimeInterval,
  options: { timeoutMs: number; excludeBookingIds?: readonly string[] }
): Promise<AvailabilitySnapshot> {
  const excluded = new Set(options.excludeBookingIds ?? []);

  const perParticipant = await Promise.all(
    participantIds.map(async (participantId) => {
      const [bookings, markers] = await withTimeout(
        Promise.all([gateway.getBookings([participantId], window), gateway.getBusySlots([participantId], window)]),
        options.timeoutMs,
        `Availability lookup for ${participantId}`
      );
      return {
        participantId,
        bookings: bookings.filter((b) => !excluded.has(b.id) && b.participantIds.includes(participantId)),
        markers: markers.filter((m) => m.participantId === participantId)
      };
    })
  );

  const snapshot: AvailabilitySnapshot = new Map();
  for (const entry of perParticipant) {
    snapshot.set(entry.participantId, { bookings: entry.bookings, markers: entry.markers });
  }
  return snapshot;
}
