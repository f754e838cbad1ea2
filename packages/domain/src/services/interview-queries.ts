import { availabilityMarkerSchema, interviewListQuerySchema } from "@interview-scheduler/shared";
import type { AvailabilityMarker } from "../availability/types";
import type { InterviewFilter } from "../repo/types";

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export type InterviewListQuery = Partial<InterviewFilter>;

export type ParsedListQuery = { ok: true; query: InterviewListQuery } | { ok: false; errors: string[] };

export type ParsedMarker = { ok: true; marker: AvailabilityMarker } | { ok: false; errors: string[] };

function issuesOf(error: { issues: { path: (string | number)[]; message: string }[] }, root: string): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || root}: ${issue.message}`);
}

export function parseInterviewListQuery(payload: unknown): ParsedListQuery {
  const parsed = interviewListQuerySchema.safeParse(payload);
  if (!parsed.success) return { ok: false, errors: issuesOf(parsed.error, "query") };

  const input = parsed.data;
  return {
    ok: true,
    query: {
      status: input.status,
      interviewerId: input.interviewer_email,
      candidateId: input.candidate_id,
      from: input.start_date ? new Date(input.start_date) : undefined,
      to: input.end_date ? new Date(input.end_date) : undefined,
      limit: input.limit,
      offset: input.offset
    }
  };
}

export function parseAvailabilityMarker(payload: unknown): ParsedMarker {
  const parsed = availabilityMarkerSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, errors: issuesOf(parsed.error, "marker") };

  const input = parsed.data;
  return {
    ok: true,
    marker: {
      participantId: input.email,
      start: new Date(input.start_time),
      end: new Date(input.end_time),
      type: input.availability_type,
      recurring: input.recurring,
      notes: input.notes ?? null
    }
  };
}

/** Fills paging defaults and lists every rule the query breaks. */
export function resolveListQuery(query: InterviewListQuery): { filter: InterviewFilter; violations: string[] } {
  const limit = query.limit ?? DEFAULT_PAGE_SIZE;
  const offset = query.offset ?? 0;
  const violations: string[] = [];

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    violations.push(`Limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    violations.push("Offset must be a non-negative integer");
  }
  if (query.from && query.to && query.from > query.to) {
    violations.push("Start date must not be after end date");
  }

  return { filter: { ...query, limit, offset }, violations };
}

export function availabilityViolations(marker: AvailabilityMarker): string[] {
  const violations: string[] = [];
  if (marker.participantId.trim().length === 0) violations.push("Participant is required");
  if (marker.start >= marker.end) violations.push("Start time must be before end time");
  return violations;
}
