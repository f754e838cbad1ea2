import {
  type AnyPgColumn,
  boolean,
  check,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import {
  availabilityTypeEnum,
  interviewStatusEnum,
  interviewTypeEnum,
  type SchedulingLogAlternative
} from "@interview-scheduler/shared";

const timestamps = {
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull()
};

export const interviewStatus = pgEnum("interview_status", interviewStatusEnum.options);
export const interviewType = pgEnum("interview_type", interviewTypeEnum.options);
export const availabilityType = pgEnum("availability_type", availabilityTypeEnum.options);
export const schedulingAction = pgEnum("scheduling_action", ["schedule", "reschedule"]);
export const schedulingActionStatus = pgEnum("scheduling_action_status", ["success", "failed"]);

export const candidates = pgTable(
  "candidates",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: varchar("name", { length: 160 }).notNull(),
    email: varchar("email", { length: 255 }).notNull(),
    timezone: varchar("timezone", { length: 64 }),
    ...timestamps
  },
  (table) => [uniqueIndex("candidates_email_uidx").on(table.email)]
);

export const jobPositions = pgTable("job_positions", {
  id: uuid("id").primaryKey().defaultRandom(),
  title: varchar("title", { length: 200 }).notNull(),
  department: varchar("department", { length: 120 }),
  ...timestamps
});

export const interviews = pgTable(
  "interviews",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    candidateId: uuid("candidate_id")
      .references(() => candidates.id, { onDelete: "restrict" })
      .notNull(),
    jobPositionId: uuid("job_position_id")
      .references(() => jobPositions.id, { onDelete: "restrict" })
      .notNull(),
    title: varchar("title", { length: 255 }).notNull(),
    interviewType: interviewType("interview_type").notNull(),
    status: interviewStatus("status").default("scheduled").notNull(),
    scheduledStart: timestamp("scheduled_start", { withTimezone: true }).notNull(),
    scheduledEnd: timestamp("scheduled_end", { withTimezone: true }).notNull(),
    durationMinutes: integer("duration_minutes").notNull(),
    timezone: varchar("timezone", { length: 64 }).default("UTC").notNull(),
    interviewerEmails: text("interviewer_emails").array().notNull(),
    primaryInterviewer: varchar("primary_interviewer", { length: 255 }),
    autoScheduled: boolean("auto_scheduled").default(true).notNull(),
    schedulingPreferences: jsonb("scheduling_preferences_jsonb")
      .$type<Record<string, unknown>>()
      .default(sql`'{}'::jsonb`)
      .notNull(),
    conflictsDetected: jsonb("conflicts_detected_jsonb").$type<string[]>().default(sql`'[]'::jsonb`).notNull(),
    rescheduleCount: integer("reschedule_count").default(0).notNull(),
    rescheduleReason: varchar("reschedule_reason", { length: 500 }),
    originalInterviewId: uuid("original_interview_id").references((): AnyPgColumn => interviews.id),
    version: integer("version").default(1).notNull(),
    ...timestamps
  },
  (table) => [
    check("interviews_range_check", sql`${table.scheduledEnd} > ${table.scheduledStart}`),
    check("interviews_duration_check", sql`${table.durationMinutes} BETWEEN 15 AND 480`),
    index("interviews_status_start_idx").on(table.status, table.scheduledStart),
    index("interviews_interviewers_gin_idx").using("gin", table.interviewerEmails),
    index("interviews_original_idx").on(table.originalInterviewId)
  ]
);

export const availabilitySlots = pgTable(
  "availability_slots",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    email: varchar("email", { length: 255 }).notNull(),
    startTime: timestamp("start_time", { withTimezone: true }).notNull(),
    endTime: timestamp("end_time", { withTimezone: true }).notNull(),
    availabilityType: availabilityType("availability_type").notNull(),
    isRecurring: boolean("is_recurring").default(false).notNull(),
    notes: varchar("notes", { length: 255 }),
    ...timestamps
  },
  (table) => [
    check("availability_slots_range_check", sql`${table.endTime} > ${table.startTime}`),
    index("availability_slots_email_start_idx").on(table.email, table.startTime)
  ]
);

export const calendarIntegrations = pgTable(
  "calendar_integrations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    email: varchar("email", { length: 255 }).notNull(),
    provider: varchar("provider", { length: 60 }).notNull(),
    integrationStatus: varchar("integration_status", { length: 40 }).default("active").notNull(),
    workingHoursStart: varchar("working_hours_start", { length: 5 }).default("09:00").notNull(),
    workingHoursEnd: varchar("working_hours_end", { length: 5 }).default("17:00").notNull(),
    workingDays: integer("working_days").array().default(sql`'{1,2,3,4,5}'::integer[]`).notNull(),
    timezone: varchar("timezone", { length: 64 }).default("UTC").notNull(),
    lastSyncAt: timestamp("last_sync_at", { withTimezone: true }),
    ...timestamps
  },
  (table) => [uniqueIndex("calendar_integrations_email_uidx").on(table.email)]
);

export const schedulingLogs = pgTable(
  "scheduling_logs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    interviewId: uuid("interview_id").references(() => interviews.id, { onDelete: "set null" }),
    actionType: schedulingAction("action_type").notNull(),
    actionStatus: schedulingActionStatus("action_status").notNull(),
    algorithmUsed: varchar("algorithm_used", { length: 60 }),
    slotsEvaluated: integer("slots_evaluated"),
    processingTimeMs: integer("processing_time_ms").notNull(),
    successScore: doublePrecision("success_score"),
    alternativesConsidered: jsonb("alternatives_jsonb")
      .$type<SchedulingLogAlternative[]>()
      .default(sql`'[]'::jsonb`)
      .notNull(),
    errorType: varchar("error_type", { length: 60 }),
    errorMessages: jsonb("error_messages_jsonb").$type<string[]>(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
  },
  (table) => [index("scheduling_logs_interview_created_idx").on(table.interviewId, table.createdAt)]
);
