import { and, arrayOverlaps, gt, inArray, lt } from "drizzle-orm";
import { availabilitySlots, interviews, type DbClient } from "@interview-scheduler/db";
import type { AvailabilityGateway } from "./gateway";
import type { AvailabilityMarker, Booking, TimeInterval } from "./types";

const ACTIVE_STATUSES = ["scheduled", "confirmed"] as const;

export class DatabaseAvailabilityGateway implements AvailabilityGateway {
  constructor(private readonly db: DbClient) {}

  async getBookings(participantIds: readonly string[], window: TimeInterval): Promise<Booking[]> {
    if (participantIds.length === 0) return [];

    const rows = await this.db
      .select({
        id: interviews.id,
        title: interviews.title,
        start: interviews.scheduledStart,
        end: interviews.scheduledEnd,
        participantIds: interviews.interviewerEmails
      })
      .from(interviews)
      .where(
        and(
          inArray(interviews.status, [...ACTIVE_STATUSES]),
          arrayOverlaps(interviews.interviewerEmails, [...participantIds]),
          lt(interviews.scheduledStart, window.end),
          gt(interviews.scheduledEnd, window.start)
        )
      );

    return rows;
  }

  async getBusySlots(participantIds: readonly string[], window: TimeInterval): Promise<AvailabilityMarker[]> {
    if (participantIds.length === 0) return [];

    const rows = await this.db
      .select({
        participantId: availabilitySlots.email,
        start: availabilitySlots.startTime,
        end: availabilitySlots.endTime,
        type: availabilitySlots.availabilityType,
        recurring: availabilitySlots.isRecurring,
        notes: availabilitySlots.notes
      })
      .from(availabilitySlots)
      .where(
        and(
          inArray(availabilitySlots.email, [...participantIds]),
          lt(availabilitySlots.startTime, window.end),
          gt(availabilitySlots.endTime, window.start)
        )
      );

    return rows;
  }
}
