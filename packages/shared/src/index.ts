import { z } from "zod";
export * from "./config";
export * from "./errors";
export * from "./events";
export * from "./logger";

export const interviewStatusEnum = z.enum([
  "scheduled",
  "confirmed",
  "rescheduled",
  "cancelled",
  "completed",
  "no_show"
]);

export const interviewTypeEnum = z.enum([
  "phone_screen",
  "video_call",
  "in_person",
  "technical",
  "panel",
  "final"
]);

export const schedulingPriorityEnum = z.enum(["urgent", "high", "medium", "low"]);

export const schedulingStrategyEnum = z.enum([
  "optimize_time",
  "optimize_quality",
  "optimize_candidate",
  "balanced"
]);

export const availabilityTypeEnum = z.enum(["busy", "available"]);

export type InterviewStatus = z.infer<typeof interviewStatusEnum>;
export type InterviewType = z.infer<typeof interviewTypeEnum>;
export type SchedulingPriority = z.infer<typeof schedulingPriorityEnum>;
export type SchedulingStrategy = z.infer<typeof schedulingStrategyEnum>;
export type AvailabilityType = z.infer<typeof availabilityTypeEnum>;

export const utcIsoSchema = z.string().datetime({ offset: true });

export const preferredTimeSchema = z.object({
  start_at: utcIsoSchema,
  end_at: utcIsoSchema
});

// Range rules (duration bounds, window ordering, interviewer count) live in the scheduler's
// request validation, not here.
export const schedulingRequestSchema = z.object({
  candidate_id: z.string().min(1),
  job_position_id: z.string().min(1),
  interview_type: interviewTypeEnum,
  interviewer_emails: z.array(z.string()),
  duration_minutes: z.number().int().default(60),
  earliest_start: utcIsoSchema.optional(),
  latest_end: utcIsoSchema.optional(),
  timezone: z.string().min(1).default("UTC"),
  priority: schedulingPriorityEnum.default("medium"),
  strategy: schedulingStrategyEnum.default("balanced"),
  preferred_times: z.array(preferredTimeSchema).default([]),
  requirements: z.record(z.string(), z.unknown()).default({})
});

export const rescheduleRequestSchema = z.object({
  reason: z.string().min(1).max(500),
  new_earliest_start: utcIsoSchema.optional(),
  new_latest_end: utcIsoSchema.optional(),
  new_interviewer_emails: z.array(z.string()).optional(),
  new_duration_minutes: z.number().int().optional(),
  priority: schedulingPriorityEnum.optional(),
  strategy: schedulingStrategyEnum.optional()
});

// Query strings arrive as text, hence the coercion on the paging fields.
export const interviewListQuerySchema = z.object({
  status: interviewStatusEnum.optional(),
  interviewer_email: z.string().min(1).optional(),
  candidate_id: z.string().min(1).optional(),
  start_date: utcIsoSchema.optional(),
  end_date: utcIsoSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0)
});

export const availabilityMarkerSchema = z.object({
  email: z.string().min(1),
  start_time: utcIsoSchema,
  end_time: utcIsoSchema,
  availability_type: availabilityTypeEnum.default("busy"),
  recurring: z.boolean().default(false),
  notes: z.string().max(255).optional()
});

export type SchedulingRequestPayload = z.input<typeof schedulingRequestSchema>;
export type RescheduleRequestPayload = z.input<typeof rescheduleRequestSchema>;
export type InterviewListQueryPayload = z.input<typeof interviewListQuerySchema>;
export type AvailabilityMarkerPayload = z.input<typeof availabilityMarkerSchema>;

export type SchedulingLogAlternative = {
  start: string;
  end: string;
  score: number;
  reasons: string[];
};
