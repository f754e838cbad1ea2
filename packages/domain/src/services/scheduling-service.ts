import { DateTime, IANAZone } from "luxon";
import {
  errorMessage,
  InterviewNotFoundError,
  InvalidTransitionError,
  CannotRescheduleError,
  NoSlotsAvailableError,
  SchedulingAbortedError,
  SchedulingError,
  ValidationFailedError,
  toSchedulingFailure,
  type InterviewEventPayload,
  type InterviewEventPublisher,
  type InterviewEventTopic,
  type InterviewStatus,
  type InterviewType,
  type Logger,
  type SchedulingFailure,
  type SchedulingOutcome,
  type SchedulingStrategy
} from "@interview-scheduler/shared";
import { evaluateSlot, detectSlotConflicts } from "../availability/conflicts";
import { gatherAvailability, withTimeout, type AvailabilityGateway } from "../availability/gateway";
import { overlaps } from "../availability/interval";
import { generateCandidateSlots } from "../availability/slot-generation";
import type {
  AvailabilityMarker,
  AvailabilitySnapshot,
  Booking,
  CandidateSlot,
  TimeInterval,
  WorkingHours
} from "../availability/types";
import { nextStatus, type StatusEvent } from "../policies/interview-status";
import { rescheduleViolations } from "../policies/rules";
import type {
  CandidateRecord,
  DirectoryLookup,
  Interview,
  InterviewPage,
  InterviewStore,
  NewInterview,
  RecordedAvailability,
  SchedulingLogEntry,
  SchedulingLogSink
} from "../repo/types";
import { isNonEmpty, rankSlots, selectSlots, type SlotSelection } from "../scoring/selector";
import { scoreSlot, type ScoreBreakdown, type TimeSlot } from "../scoring/slot-scorer";
import {
  createSchedulingRequest,
  requestRuleViolations,
  type RescheduleOverrides,
  type SchedulingRequest
} from "./scheduling-request";
import {
  availabilityViolations,
  resolveListQuery,
  type InterviewListQuery
} from "./interview-queries";
import type { SchedulerSettings } from "./settings";

export type SchedulingServiceDeps = {
  gateway: AvailabilityGateway;
  directory: DirectoryLookup;
  store: InterviewStore;
  auditLog: SchedulingLogSink;
  publisher: InterviewEventPublisher;
  logger: Logger;
  settings: SchedulerSettings;
  clock?: () => Date;
};

export type SlotAlternative = {
  startTime: string;
  endTime: string;
  score: number;
  reasons: string[];
};

export type ScheduleSuccess = {
  interview: Interview;
  slotDetails: {
    score: number;
    baseScore: number;
    breakdown: ScoreBreakdown;
    conflicts: string[];
    reasons: string[];
    participantsAvailable: string[];
    participantsUnavailable: string[];
  };
  alternatives: SlotAlternative[];
  metadata: {
    slotsEvaluated: number;
    processingTimeMs: number;
    strategyUsed: SchedulingStrategy;
  };
};

export type RescheduleSuccess = ScheduleSuccess & {
  originalInterviewId: string;
  rescheduleReason: string;
  rescheduleCount: number;
};

export type ParticipantAvailabilitySummary = {
  hasCalendarIntegration: boolean;
  integrationStatus: string;
  totalInterviews: number;
  busySlots: number;
  availableSlots: number;
  workingHours: WorkingHours;
  lastSync: string | null;
};

export type InterviewListing = InterviewPage & {
  limit: number;
  offset: number;
  hasMore: boolean;
};

export type RunOptions = {
  signal?: AbortSignal;
};

type SchedulingPlan = {
  request: SchedulingRequest;
  candidate: CandidateRecord;
  ranked: TimeSlot[];
  slotsEvaluated: number;
};

const TOP_REASONS = 3;

function interviewTitle(type: InterviewType, candidateName: string): string {
  const words = type
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
  return `${words} Interview - ${candidateName}`;
}

function toEventPayload(interview: Interview): InterviewEventPayload {
  return {
    interview_id: interview.id,
    candidate_id: interview.candidateId,
    job_position_id: interview.jobPositionId,
    interview_type: interview.interviewType,
    scheduled_start: interview.scheduledStart.toISOString(),
    scheduled_end: interview.scheduledEnd.toISOString(),
    interviewer_emails: interview.interviewerIds,
    original_interview_id: interview.originalInterviewId,
    meeting_details: {
      duration: interview.durationMinutes,
      timezone: interview.timezone,
      conflicts: interview.conflictsDetected
    }
  };
}

function throwIfAborted(signal: AbortSignal | undefined) {
  if (signal?.aborted) {
    throw new SchedulingAbortedError();
  }
}

/**
 * Finds, ranks and commits interview slots. Every public operation returns a structured
 * outcome; nothing thrown inside the pipeline escapes.
 */
export class SchedulingService {
  private readonly clock: () => Date;

  constructor(private readonly deps: SchedulingServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private get settings() {
    return this.deps.settings;
  }

  private get logger() {
    return this.deps.logger;
  }

  async scheduleInterview(
    request: SchedulingRequest,
    options: RunOptions = {}
  ): Promise<SchedulingOutcome<ScheduleSuccess>> {
    const startedAt = performance.now();
    this.logger.info("processing scheduling request", { candidateId: request.candidateId });

    try {
      const plan = await this.plan(request, {});
      const selection = this.select(plan);
      throwIfAborted(options.signal);

      const interview = await this.deps.store.createInterview(this.toNewInterview(selection.chosen, plan));
      const result = this.buildSuccess(interview, selection, plan, startedAt);

      await this.recordLog(this.successLogEntry("schedule", result, selection));
      await this.notify("interview.scheduled", interview);

      this.logger.info("interview scheduled", { interviewId: interview.id, score: selection.chosen.score });
      return { ok: true, ...result };
    } catch (error) {
      const failure = this.fail("schedule", error);
      if (!(error instanceof SchedulingAbortedError)) {
        await this.recordLog(this.failureLogEntry("schedule", null, request.strategy, failure, startedAt));
      }
      return failure;
    }
  }

  async rescheduleInterview(
    interviewId: string,
    reason: string,
    overrides: RescheduleOverrides = {},
    options: RunOptions = {}
  ): Promise<SchedulingOutcome<RescheduleSuccess>> {
    const startedAt = performance.now();
    this.logger.info("processing reschedule request", { interviewId });
    let strategy: SchedulingStrategy | null = overrides.strategy ?? null;

    try {
      const original = await this.loadInterview(interviewId);
      const now = this.clock();

      const violations = rescheduleViolations(original, now, { maxAttempts: this.settings.maxRescheduleAttempts });
      if (violations.length > 0) throw new CannotRescheduleError(violations);

      const request = createSchedulingRequest(
        {
          candidateId: original.candidateId,
          jobPositionId: original.jobPositionId,
          interviewType: original.interviewType,
          interviewerIds: overrides.interviewerIds ?? original.interviewerIds,
          durationMinutes: overrides.durationMinutes ?? original.durationMinutes,
          earliestStart: overrides.earliestStart,
          latestEnd: overrides.latestEnd,
          timezone: original.timezone,
          priority: overrides.priority ?? "high",
          strategy: overrides.strategy,
          requirements: original.schedulingPreferences
        },
        now
      );
      strategy = request.strategy;

      // The original only leaves the workload count; its own time stays off the table.
      const plan = await this.plan(request, {
        excludeInterviewIds: [original.id],
        blockedIntervals: [{ start: original.scheduledStart, end: original.scheduledEnd }]
      });
      const selection = this.select(plan);
      throwIfAborted(options.signal);

      const committed = await this.deps.store.commitReschedule({
        originalId: original.id,
        expectedVersion: original.version,
        reason,
        replacement: this.toNewInterview(selection.chosen, plan)
      });
      const result = this.buildSuccess(committed.replacement, selection, plan, startedAt);

      await this.recordLog(this.successLogEntry("reschedule", result, selection));
      await this.notify("interview.rescheduled", committed.replacement);

      this.logger.info("interview rescheduled", {
        originalInterviewId: original.id,
        interviewId: committed.replacement.id,
        rescheduleCount: committed.original.rescheduleCount
      });
      return {
        ok: true,
        ...result,
        originalInterviewId: original.id,
        rescheduleReason: reason,
        rescheduleCount: committed.original.rescheduleCount
      };
    } catch (error) {
      const failure = this.fail("reschedule", error);
      if (!(error instanceof SchedulingAbortedError)) {
        await this.recordLog(this.failureLogEntry("reschedule", interviewId, strategy, failure, startedAt));
      }
      return failure;
    }
  }

  /** Ranked slots for a request without booking anything. */
  async findOptimalSlots(
    request: SchedulingRequest,
    maxSlots = 10
  ): Promise<SchedulingOutcome<{ slots: TimeSlot[]; slotsEvaluated: number }>> {
    try {
      const plan = await this.plan(request, {});
      return { ok: true, slots: plan.ranked.slice(0, maxSlots), slotsEvaluated: plan.slotsEvaluated };
    } catch (error) {
      return this.fail("find_optimal_slots", error);
    }
  }

  async detectConflicts(
    start: Date,
    end: Date,
    participantIds: readonly string[]
  ): Promise<SchedulingOutcome<{ conflicts: Record<string, string[]>; participantsAvailable: string[] }>> {
    try {
      if (start >= end) throw new ValidationFailedError(["Start time must be before end time"]);
      const slot = { start, end };
      const snapshot = await this.gather(participantIds, slot, []);
      const found = detectSlotConflicts(slot, participantIds, snapshot, this.settings.workingHours.timezone);

      const conflicts: Record<string, string[]> = {};
      for (const [participantId, descriptions] of found) {
        conflicts[participantId] = descriptions.map((d) => d.reason);
      }
      return { ok: true, conflicts, participantsAvailable: participantIds.filter((id) => !found.has(id)) };
    } catch (error) {
      return this.fail("detect_conflicts", error);
    }
  }

  async getAvailabilitySummary(
    participantIds: readonly string[],
    start: Date,
    end: Date
  ): Promise<SchedulingOutcome<{ participants: Record<string, ParticipantAvailabilitySummary> }>> {
    try {
      if (start >= end) throw new ValidationFailedError(["Start time must be before end time"]);
      const window = { start, end };
      const [snapshot, calendars] = await Promise.all([
        this.gather(participantIds, window, []),
        Promise.all(
          participantIds.map((id) =>
            withTimeout(
              this.deps.directory.getCalendarIntegration(id),
              this.settings.externalTimeoutMs,
              `Calendar lookup for ${id}`
            )
          )
        )
      ]);

      const participants: Record<string, ParticipantAvailabilitySummary> = {};
      participantIds.forEach((participantId, index) => {
        const data = snapshot.get(participantId) ?? { bookings: [], markers: [] };
        const calendar = calendars[index] ?? null;
        participants[participantId] = {
          hasCalendarIntegration: calendar !== null,
          integrationStatus: calendar?.integrationStatus ?? "none",
          totalInterviews: data.bookings.length,
          busySlots: data.markers.filter((m) => m.type === "busy").length,
          availableSlots: data.markers.filter((m) => m.type === "available").length,
          workingHours: calendar?.workingHours ?? this.settings.workingHours,
          lastSync: calendar?.lastSyncAt ? calendar.lastSyncAt.toISOString() : null
        };
      });
      return { ok: true, participants };
    } catch (error) {
      return this.fail("availability_summary", error);
    }
  }

  async getInterview(interviewId: string): Promise<SchedulingOutcome<{ interview: Interview }>> {
    try {
      return { ok: true, interview: await this.loadInterview(interviewId) };
    } catch (error) {
      return this.fail("get_interview", error);
    }
  }

  async listInterviews(query: InterviewListQuery = {}): Promise<SchedulingOutcome<InterviewListing>> {
    try {
      const { filter, violations } = resolveListQuery(query);
      if (violations.length > 0) throw new ValidationFailedError(violations);

      const page = await withTimeout(
        this.deps.store.listInterviews(filter),
        this.settings.externalTimeoutMs,
        "Interview listing"
      );
      return {
        ok: true,
        ...page,
        limit: filter.limit,
        offset: filter.offset,
        hasMore: filter.offset + filter.limit < page.totalCount
      };
    } catch (error) {
      return this.fail("list_interviews", error);
    }
  }

  /** Stores a busy or available marker; later searches see it as a conflict source. */
  async recordAvailability(
    marker: AvailabilityMarker
  ): Promise<SchedulingOutcome<{ availability: RecordedAvailability }>> {
    try {
      const violations = availabilityViolations(marker);
      if (violations.length > 0) throw new ValidationFailedError(violations);

      const availability = await withTimeout(
        this.deps.store.recordAvailability(marker),
        this.settings.externalTimeoutMs,
        "Availability write"
      );
      this.logger.info("availability recorded", {
        participantId: availability.participantId,
        type: availability.type,
        availabilityId: availability.id
      });
      return { ok: true, availability };
    } catch (error) {
      return this.fail("record_availability", error);
    }
  }

  async updateInterviewStatus(
    interviewId: string,
    event: StatusEvent
  ): Promise<SchedulingOutcome<{ interview: Interview; previousStatus: InterviewStatus }>> {
    try {
      const interview = await this.loadInterview(interviewId);
      const to = nextStatus(interview.status, event);
      if (to === null) throw new InvalidTransitionError(interview.status, event);

      const updated = await this.deps.store.transitionStatus({
        interviewId,
        expectedVersion: interview.version,
        to
      });
      this.logger.info("interview status changed", { interviewId, from: interview.status, to });
      return { ok: true, interview: updated, previousStatus: interview.status };
    } catch (error) {
      return this.fail("update_status", error);
    }
  }

  private async loadInterview(interviewId: string): Promise<Interview> {
    const interview = await withTimeout(
      this.deps.store.getInterview(interviewId),
      this.settings.externalTimeoutMs,
      "Interview lookup"
    );
    if (!interview) throw new InterviewNotFoundError(interviewId);
    return interview;
  }

  private async validate(request: SchedulingRequest): Promise<CandidateRecord> {
    const [candidate, job] = await withTimeout(
      Promise.all([
        this.deps.directory.getCandidate(request.candidateId),
        this.deps.directory.getJobPosition(request.jobPositionId)
      ]),
      this.settings.externalTimeoutMs,
      "Candidate and job lookup"
    );

    const violations: string[] = [];
    if (!candidate) violations.push("Candidate not found");
    if (!job) violations.push("Job position not found");
    violations.push(...requestRuleViolations(request));

    if (!candidate || violations.length > 0) throw new ValidationFailedError(violations);
    return candidate;
  }

  private gather(
    participantIds: readonly string[],
    window: TimeInterval,
    excludeInterviewIds: readonly string[]
  ): Promise<AvailabilitySnapshot> {
    return gatherAvailability(this.deps.gateway, participantIds, window, {
      timeoutMs: this.settings.externalTimeoutMs,
      excludeBookingIds: excludeInterviewIds
    });
  }

  /** Validation, availability, generation, conflict filtering and ranking. No writes. */
  private async plan(
    request: SchedulingRequest,
    options: { excludeInterviewIds?: readonly string[]; blockedIntervals?: readonly TimeInterval[] }
  ): Promise<SchedulingPlan> {
    const candidate = await this.validate(request);
    const { workingHours, granularityMinutes, scoring } = this.settings;

    // Whole calendar days, so same-day workload sees bookings outside the search range.
    const window = {
      start: DateTime.fromJSDate(request.earliestStart, { zone: workingHours.timezone }).startOf("day").toJSDate(),
      end: DateTime.fromJSDate(request.latestEnd, { zone: workingHours.timezone }).endOf("day").toJSDate()
    };
    const snapshot = await this.gather(request.interviewerIds, window, options.excludeInterviewIds ?? []);
    const displayZone = IANAZone.isValidZone(request.timezone) ? request.timezone : workingHours.timezone;
    const blocked = options.blockedIntervals ?? [];

    const viable: CandidateSlot[] = [];
    for (const interval of generateCandidateSlots({
      earliestStart: request.earliestStart,
      latestEnd: request.latestEnd,
      durationMinutes: request.durationMinutes,
      granularityMinutes,
      workingHours
    })) {
      if (blocked.some((b) => overlaps(interval, b))) continue;
      const slot = evaluateSlot(interval, request.interviewerIds, snapshot, displayZone);
      if (slot) viable.push(slot);
    }

    const bookingsByParticipant = new Map<string, readonly Booking[]>();
    for (const [participantId, data] of snapshot) bookingsByParticipant.set(participantId, data.bookings);
    const now = this.clock();
    const ranked = rankSlots(
      viable.map((slot) =>
        scoreSlot(slot, {
          requestedParticipants: request.interviewerIds,
          bookingsByParticipant,
          priority: request.priority,
          candidateTimezone: request.timezone,
          calendarTimezone: workingHours.timezone,
          now,
          config: scoring
        })
      )
    );

    this.logger.debug("slot search finished", { viableSlots: viable.length, candidateId: request.candidateId });
    return { request, candidate, ranked, slotsEvaluated: viable.length };
  }

  private select(plan: SchedulingPlan): SlotSelection {
    if (!isNonEmpty(plan.ranked)) throw new NoSlotsAvailableError();
    return selectSlots(plan.ranked);
  }

  private toNewInterview(slot: TimeSlot, plan: SchedulingPlan): NewInterview {
    const { request, candidate } = plan;
    const preferences: Record<string, unknown> = { ...request.requirements };
    if (request.preferredTimes.length > 0) {
      preferences.preferred_times = request.preferredTimes.map((p) => ({
        start_at: p.start.toISOString(),
        end_at: p.end.toISOString()
      }));
    }

    return {
      candidateId: request.candidateId,
      jobPositionId: request.jobPositionId,
      title: interviewTitle(request.interviewType, candidate.name),
      interviewType: request.interviewType,
      scheduledStart: slot.start,
      scheduledEnd: slot.end,
      durationMinutes: request.durationMinutes,
      timezone: request.timezone,
      interviewerIds: [...slot.participantsAvailable],
      primaryInterviewer: slot.participantsAvailable[0] ?? null,
      schedulingPreferences: preferences,
      conflictsDetected: [...slot.conflicts]
    };
  }

  private buildSuccess(
    interview: Interview,
    selection: SlotSelection,
    plan: SchedulingPlan,
    startedAt: number
  ): ScheduleSuccess {
    const { chosen } = selection;
    return {
      interview,
      slotDetails: {
        score: chosen.score,
        baseScore: chosen.baseScore,
        breakdown: chosen.breakdown,
        conflicts: chosen.conflicts,
        reasons: chosen.reasons,
        participantsAvailable: chosen.participantsAvailable,
        participantsUnavailable: chosen.participantsUnavailable
      },
      alternatives: selection.alternates.map((slot) => ({
        startTime: slot.start.toISOString(),
        endTime: slot.end.toISOString(),
        score: slot.score,
        reasons: slot.reasons.slice(0, TOP_REASONS)
      })),
      metadata: {
        slotsEvaluated: plan.slotsEvaluated,
        processingTimeMs: Math.round(performance.now() - startedAt),
        strategyUsed: plan.request.strategy
      }
    };
  }

  private successLogEntry(
    action: SchedulingLogEntry["action"],
    result: ScheduleSuccess,
    selection: SlotSelection
  ): SchedulingLogEntry {
    return {
      interviewId: result.interview.id,
      action,
      status: "success",
      strategy: result.metadata.strategyUsed,
      slotsEvaluated: result.metadata.slotsEvaluated,
      processingTimeMs: result.metadata.processingTimeMs,
      chosenScore: selection.chosen.score,
      alternates: selection.alternates.map((slot) => ({
        start: slot.start.toISOString(),
        end: slot.end.toISOString(),
        score: slot.score,
        reasons: slot.reasons
      })),
      errorType: null,
      errors: []
    };
  }

  private failureLogEntry(
    action: SchedulingLogEntry["action"],
    interviewId: string | null,
    strategy: SchedulingStrategy | null,
    failure: SchedulingFailure,
    startedAt: number
  ): SchedulingLogEntry {
    return {
      interviewId: failure.errorType === "interview_not_found" ? null : interviewId,
      action,
      status: "failed",
      strategy,
      slotsEvaluated: null,
      processingTimeMs: Math.round(performance.now() - startedAt),
      chosenScore: null,
      alternates: [],
      errorType: failure.errorType,
      errors: failure.errors
    };
  }

  /** Audit writes never undo a commit; failures are logged. */
  private async recordLog(entry: SchedulingLogEntry): Promise<void> {
    try {
      await withTimeout(
        this.deps.auditLog.appendSchedulingLog(entry),
        this.settings.externalTimeoutMs,
        "Scheduling log append"
      );
    } catch (error) {
      this.logger.error("failed to append scheduling log", {
        action: entry.action,
        status: entry.status,
        error: errorMessage(error)
      });
    }
  }

  /** Best-effort: the committed interview stands whether or not the event goes out. */
  private async notify(topic: InterviewEventTopic, interview: Interview): Promise<void> {
    try {
      await withTimeout(
        this.deps.publisher.publish(topic, toEventPayload(interview)),
        this.settings.externalTimeoutMs,
        `Publishing ${topic}`
      );
    } catch (error) {
      this.logger.error("failed to publish interview event", {
        topic,
        interviewId: interview.id,
        error: errorMessage(error)
      });
    }
  }

  private fail(operation: string, error: unknown): SchedulingFailure {
    const failure = toSchedulingFailure(error, this.clock());
    const context = { operation, errorType: failure.errorType, errors: failure.errors };
    if (error instanceof SchedulingError && !error.retryable) {
      this.logger.warn("scheduling operation rejected", context);
    } else {
      this.logger.error("scheduling operation failed", context);
    }
    return failure;
  }
}
