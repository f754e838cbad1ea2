import {
  and,
  arrayContains,
  arrayOverlaps,
  count,
  desc,
  eq,
  gt,
  gte,
  inArray,
  lt,
  lte,
  ne,
  sql,
  type SQL
} from "drizzle-orm";
import {
  availabilitySlots,
  calendarIntegrations,
  candidates,
  interviews,
  jobPositions,
  schedulingLogs,
  type DbClient
} from "@interview-scheduler/db";
import { ConcurrentModificationError } from "@interview-scheduler/shared";
import { z } from "zod";
import type { AvailabilityMarker } from "../availability/types";
import type {
  CandidateRecord,
  DirectoryLookup,
  Interview,
  InterviewFilter,
  InterviewPage,
  InterviewStore,
  JobPositionRecord,
  NewInterview,
  ParticipantCalendar,
  RecordedAvailability,
  RescheduleCommit,
  SchedulingLogEntry,
  SchedulingLogSink,
  StatusTransition
} from "./types";

type InterviewRow = typeof interviews.$inferSelect;
type Tx = Parameters<Parameters<DbClient["transaction"]>[0]>[0];

const uuidSchema = z.string().uuid();

function toInterview(row: InterviewRow): Interview {
  const { interviewerEmails, ...rest } = row;
  return { ...rest, interviewerIds: interviewerEmails };
}

function toRow(input: NewInterview) {
  const { interviewerIds, ...rest } = input;
  return { ...rest, interviewerEmails: interviewerIds, status: "scheduled" as const, autoScheduled: true };
}

export class SchedulingRepository implements InterviewStore, DirectoryLookup, SchedulingLogSink {
  constructor(private readonly db: DbClient) {}

  async getCandidate(candidateId: string): Promise<CandidateRecord | null> {
    if (!uuidSchema.safeParse(candidateId).success) return null;
    const row = await this.db.query.candidates.findFirst({ where: eq(candidates.id, candidateId) });
    return row ? { id: row.id, name: row.name, email: row.email, timezone: row.timezone } : null;
  }

  async getJobPosition(jobPositionId: string): Promise<JobPositionRecord | null> {
    if (!uuidSchema.safeParse(jobPositionId).success) return null;
    const row = await this.db.query.jobPositions.findFirst({ where: eq(jobPositions.id, jobPositionId) });
    return row ? { id: row.id, title: row.title } : null;
  }

  async getCalendarIntegration(participantId: string): Promise<ParticipantCalendar | null> {
    const row = await this.db.query.calendarIntegrations.findFirst({
      where: eq(calendarIntegrations.email, participantId)
    });
    if (!row) return null;
    return {
      participantId: row.email,
      provider: row.provider,
      integrationStatus: row.integrationStatus,
      workingHours: {
        weekdays: row.workingDays,
        start: row.workingHoursStart,
        end: row.workingHoursEnd,
        timezone: row.timezone
      },
      lastSyncAt: row.lastSyncAt
    };
  }

  async getInterview(interviewId: string): Promise<Interview | null> {
    if (!uuidSchema.safeParse(interviewId).success) return null;
    const row = await this.db.query.interviews.findFirst({ where: eq(interviews.id, interviewId) });
    return row ? toInterview(row) : null;
  }

  async createInterview(input: NewInterview): Promise<Interview> {
    return this.db.transaction(async (tx) => {
      await this.lockAndCheckOverlap(tx, input, null);
      const [row] = await tx.insert(interviews).values(toRow(input)).returning();
      if (!row) throw new Error("Failed to insert interview");
      return toInterview(row);
    });
  }

  async commitReschedule(input: RescheduleCommit): Promise<{ original: Interview; replacement: Interview }> {
    return this.db.transaction(async (tx) => {
      const now = new Date();
      const [original] = await tx
        .update(interviews)
        .set({
          status: "rescheduled",
          rescheduleCount: sql`${interviews.rescheduleCount} + 1`,
          rescheduleReason: input.reason,
          version: sql`${interviews.version} + 1`,
          updatedAt: now
        })
        .where(
          and(
            eq(interviews.id, input.originalId),
            eq(interviews.version, input.expectedVersion),
            inArray(interviews.status, ["scheduled", "confirmed"])
          )
        )
        .returning();
      if (!original) {
        throw new ConcurrentModificationError(`Interview ${input.originalId} was modified concurrently`);
      }

      await this.lockAndCheckOverlap(tx, input.replacement, original.id);
      const [replacement] = await tx
        .insert(interviews)
        .values({
          ...toRow(input.replacement),
          rescheduleCount: original.rescheduleCount,
          originalInterviewId: original.id
        })
        .returning();
      if (!replacement) throw new Error("Failed to insert replacement interview");

      return { original: toInterview(original), replacement: toInterview(replacement) };
    });
  }

  async transitionStatus(input: StatusTransition): Promise<Interview> {
    const [row] = await this.db
      .update(interviews)
      .set({ status: input.to, version: sql`${interviews.version} + 1`, updatedAt: new Date() })
      .where(and(eq(interviews.id, input.interviewId), eq(interviews.version, input.expectedVersion)))
      .returning();
    if (!row) {
      throw new ConcurrentModificationError(`Interview ${input.interviewId} was modified concurrently`);
    }
    return toInterview(row);
  }

  async listInterviews(filter: InterviewFilter): Promise<InterviewPage> {
    if (filter.candidateId !== undefined && !uuidSchema.safeParse(filter.candidateId).success) {
      return { interviews: [], totalCount: 0 };
    }

    const filters: SQL[] = [];
    if (filter.status) filters.push(eq(interviews.status, filter.status));
    if (filter.interviewerId) filters.push(arrayContains(interviews.interviewerEmails, [filter.interviewerId]));
    if (filter.candidateId) filters.push(eq(interviews.candidateId, filter.candidateId));
    if (filter.from) filters.push(gte(interviews.scheduledStart, filter.from));
    if (filter.to) filters.push(lte(interviews.scheduledStart, filter.to));
    const where = and(...filters);

    const [rows, [total]] = await Promise.all([
      this.db
        .select()
        .from(interviews)
        .where(where)
        .orderBy(desc(interviews.scheduledStart), desc(interviews.createdAt))
        .limit(filter.limit)
        .offset(filter.offset),
      this.db.select({ value: count() }).from(interviews).where(where)
    ]);

    return { interviews: rows.map(toInterview), totalCount: total?.value ?? 0 };
  }

  async recordAvailability(marker: AvailabilityMarker): Promise<RecordedAvailability> {
    const [row] = await this.db
      .insert(availabilitySlots)
      .values({
        email: marker.participantId,
        startTime: marker.start,
        endTime: marker.end,
        availabilityType: marker.type,
        isRecurring: marker.recurring,
        notes: marker.notes
      })
      .returning();
    if (!row) throw new Error("Failed to insert availability slot");

    return {
      id: row.id,
      participantId: row.email,
      start: row.startTime,
      end: row.endTime,
      type: row.availabilityType,
      recurring: row.isRecurring,
      notes: row.notes
    };
  }

  async appendSchedulingLog(entry: SchedulingLogEntry): Promise<void> {
    await this.db.insert(schedulingLogs).values({
      interviewId: entry.interviewId,
      actionType: entry.action,
      actionStatus: entry.status,
      algorithmUsed: entry.strategy,
      slotsEvaluated: entry.slotsEvaluated,
      processingTimeMs: entry.processingTimeMs,
      successScore: entry.chosenScore,
      alternativesConsidered: entry.alternates,
      errorType: entry.errorType,
      errorMessages: entry.errors.length > 0 ? entry.errors : null
    });
  }

  /**
   * Takes transaction-scoped advisory locks per interviewer in sorted order, then rejects
   * the write if any of them got booked in the meantime.
   */
  private async lockAndCheckOverlap(tx: Tx, input: NewInterview, ignoreInterviewId: string | null) {
    const participants = [...input.interviewerIds].sort();
    for (const participant of participants) {
      await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${participant}))`);
    }

    const clash = await tx
      .select({ id: interviews.id })
      .from(interviews)
      .where(
        and(
          inArray(interviews.status, ["scheduled", "confirmed"]),
          arrayOverlaps(interviews.interviewerEmails, participants),
          lt(interviews.scheduledStart, input.scheduledEnd),
          gt(interviews.scheduledEnd, input.scheduledStart),
          ...(ignoreInterviewId ? [ne(interviews.id, ignoreInterviewId)] : [])
        )
      )
      .limit(1);

    if (clash.length > 0) {
      throw new ConcurrentModificationError("Selected slot was booked by a concurrent request");
    }
  }
}
