import { z } from "zod";

export const schedulingErrorTypeEnum = z.enum([
  "validation_failed",
  "no_slots_available",
  "interview_not_found",
  "cannot_reschedule",
  "invalid_transition",
  "scheduling_error",
  "availability_gather_timeout"
]);

export type SchedulingErrorType = z.infer<typeof schedulingErrorTypeEnum>;

const RETRYABLE: ReadonlySet<SchedulingErrorType> = new Set(["scheduling_error", "availability_gather_timeout"]);

export function isRetryable(errorType: SchedulingErrorType): boolean {
  return RETRYABLE.has(errorType);
}

export class SchedulingError extends Error {
  constructor(
    readonly errorType: SchedulingErrorType,
    readonly errors: string[],
    message = errors[0] ?? errorType
  ) {
    super(message);
    this.name = "SchedulingError";
  }

  get retryable(): boolean {
    return isRetryable(this.errorType);
  }
}

export class ValidationFailedError extends SchedulingError {
  constructor(errors: string[]) {
    super("validation_failed", errors, `Scheduling request is invalid: ${errors.join("; ")}`);
    this.name = "ValidationFailedError";
  }
}

export class NoSlotsAvailableError extends SchedulingError {
  constructor() {
    super("no_slots_available", ["No suitable time slots found for the given constraints"]);
    this.name = "NoSlotsAvailableError";
  }
}

export class InterviewNotFoundError extends SchedulingError {
  constructor(interviewId: string) {
    super("interview_not_found", [`Interview ${interviewId} not found`]);
    this.name = "InterviewNotFoundError";
  }
}

export class CannotRescheduleError extends SchedulingError {
  constructor(errors: string[]) {
    super("cannot_reschedule", errors);
    this.name = "CannotRescheduleError";
  }
}

export class InvalidTransitionError extends SchedulingError {
  constructor(from: string, event: string) {
    super("invalid_transition", [`Cannot ${event} an interview in status "${from}"`]);
    this.name = "InvalidTransitionError";
  }
}

export class AvailabilityGatherTimeoutError extends SchedulingError {
  constructor(label: string, timeoutMs: number) {
    super("availability_gather_timeout", [`${label} did not respond within ${timeoutMs}ms`]);
    this.name = "AvailabilityGatherTimeoutError";
  }
}

/** Commit-time conflicts: a competing writer booked the slot or modified the row first. */
export class ConcurrentModificationError extends SchedulingError {
  constructor(detail: string) {
    super("scheduling_error", [detail]);
    this.name = "ConcurrentModificationError";
  }
}

/** The caller gave up before commit. Nothing is written, not even an audit entry. */
export class SchedulingAbortedError extends SchedulingError {
  constructor() {
    super("scheduling_error", ["Scheduling request was aborted before commit"]);
    this.name = "SchedulingAbortedError";
  }
}

export type SchedulingFailure = {
  ok: false;
  errorType: SchedulingErrorType;
  errors: string[];
  retryable: boolean;
  timestamp: string;
};

export type SchedulingOutcome<T extends object> = ({ ok: true } & T) | SchedulingFailure;

export function toSchedulingFailure(error: unknown, now: Date): SchedulingFailure {
  if (error instanceof SchedulingError) {
    return {
      ok: false,
      errorType: error.errorType,
      errors: error.errors,
      retryable: error.retryable,
      timestamp: now.toISOString()
    };
  }

  return {
    ok: false,
    errorType: "scheduling_error",
    errors: [error instanceof Error ? error.message : String(error)],
    retryable: true,
    timestamp: now.toISOString()
  };
}
