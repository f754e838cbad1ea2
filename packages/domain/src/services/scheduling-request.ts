import {
  rescheduleRequestSchema,
  schedulingRequestSchema,
  type InterviewType,
  type SchedulingPriority,
  type SchedulingStrategy
} from "@interview-scheduler/shared";
import type { TimeInterval } from "../availability/types";

export const MIN_DURATION_MINUTES = 15;
export const MAX_DURATION_MINUTES = 480;
const DEFAULT_LEAD_HOURS = 24;
const DEFAULT_SEARCH_DAYS = 30;

export type SchedulingRequest = Readonly<{
  candidateId: string;
  jobPositionId: string;
  interviewType: InterviewType;
  interviewerIds: readonly string[];
  durationMinutes: number;
  earliestStart: Date;
  latestEnd: Date;
  timezone: string;
  priority: SchedulingPriority;
  strategy: SchedulingStrategy;
  preferredTimes: readonly TimeInterval[];
  requirements: Readonly<Record<string, unknown>>;
}>;

export type SchedulingRequestInit = {
  candidateId: string;
  jobPositionId: string;
  interviewType: InterviewType;
  interviewerIds: readonly string[];
  durationMinutes?: number | undefined;
  earliestStart?: Date | undefined;
  latestEnd?: Date | undefined;
  timezone?: string | undefined;
  priority?: SchedulingPriority | undefined;
  strategy?: SchedulingStrategy | undefined;
  preferredTimes?: readonly TimeInterval[] | undefined;
  requirements?: Record<string, unknown> | undefined;
};

/** Builds the immutable request, filling the default search window relative to `now`. */
export function createSchedulingRequest(init: SchedulingRequestInit, now: Date): SchedulingRequest {
  return Object.freeze({
    candidateId: init.candidateId,
    jobPositionId: init.jobPositionId,
    interviewType: init.interviewType,
    interviewerIds: Object.freeze([...init.interviewerIds]),
    durationMinutes: init.durationMinutes ?? 60,
    earliestStart: init.earliestStart ?? new Date(now.getTime() + DEFAULT_LEAD_HOURS * 3_600_000),
    latestEnd: init.latestEnd ?? new Date(now.getTime() + DEFAULT_SEARCH_DAYS * 86_400_000),
    timezone: init.timezone ?? "UTC",
    priority: init.priority ?? "medium",
    strategy: init.strategy ?? "balanced",
    preferredTimes: Object.freeze([...(init.preferredTimes ?? [])]),
    requirements: Object.freeze({ ...(init.requirements ?? {}) })
  });
}

export type ParsedRequest = { ok: true; request: SchedulingRequest } | { ok: false; errors: string[] };

/** Parses the snake_case wire shape. Shape errors are returned, range rules are left to validation. */
export function parseSchedulingRequest(payload: unknown, now: Date): ParsedRequest {
  const parsed = schedulingRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    };
  }

  const input = parsed.data;
  return {
    ok: true,
    request: createSchedulingRequest(
      {
        candidateId: input.candidate_id,
        jobPositionId: input.job_position_id,
        interviewType: input.interview_type,
        interviewerIds: input.interviewer_emails,
        durationMinutes: input.duration_minutes,
        earliestStart: input.earliest_start ? new Date(input.earliest_start) : undefined,
        latestEnd: input.latest_end ? new Date(input.latest_end) : undefined,
        timezone: input.timezone,
        priority: input.priority,
        strategy: input.strategy,
        preferredTimes: input.preferred_times.map((p) => ({ start: new Date(p.start_at), end: new Date(p.end_at) })),
        requirements: input.requirements
      },
      now
    )
  };
}

/** Structural rules on the request itself, in reporting order. */
export function requestRuleViolations(request: SchedulingRequest): string[] {
  const violations: string[] = [];

  if (request.earliestStart >= request.latestEnd) {
    violations.push("Earliest start time must be before latest end time");
  }
  if (
    !Number.isInteger(request.durationMinutes) ||
    request.durationMinutes < MIN_DURATION_MINUTES ||
    request.durationMinutes > MAX_DURATION_MINUTES
  ) {
    violations.push("Duration must be between 15 minutes and 8 hours");
  }
  if (request.interviewerIds.length === 0) {
    violations.push("At least one interviewer is required");
  } else {
    if (request.interviewerIds.some((id) => id.trim().length === 0)) {
      violations.push("Interviewer identifiers must not be blank");
    }
    if (new Set(request.interviewerIds).size !== request.interviewerIds.length) {
      violations.push("Interviewer identifiers must be unique");
    }
  }

  return violations;
}

export type RescheduleOverrides = {
  earliestStart?: Date | undefined;
  latestEnd?: Date | undefined;
  interviewerIds?: readonly string[] | undefined;
  durationMinutes?: number | undefined;
  priority?: SchedulingPriority | undefined;
  strategy?: SchedulingStrategy | undefined;
};

export type ParsedReschedule =
  | { ok: true; reason: string; overrides: RescheduleOverrides }
  | { ok: false; errors: string[] };

export function parseRescheduleRequest(payload: unknown): ParsedReschedule {
  const parsed = rescheduleRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    };
  }

  const input = parsed.data;
  return {
    ok: true,
    reason: input.reason,
    overrides: {
      earliestStart: input.new_earliest_start ? new Date(input.new_earliest_start) : undefined,
      latestEnd: input.new_latest_end ? new Date(input.new_latest_end) : undefined,
      interviewerIds: input.new_interviewer_emails,
      durationMinutes: input.new_duration_minutes,
      priority: input.priority,
      strategy: input.strategy
    }
  };
}
