import type {
  InterviewStatus,
  InterviewType,
  SchedulingErrorType,
  SchedulingLogAlternative,
  SchedulingStrategy
} from "@interview-scheduler/shared";
import type { AvailabilityMarker, WorkingHours } from "../availability/types";

export type Interview = {
  id: string;
  candidateId: string;
  jobPositionId: string;
  title: string;
  interviewType: InterviewType;
  status: InterviewStatus;
  scheduledStart: Date;
  scheduledEnd: Date;
  durationMinutes: number;
  timezone: string;
  interviewerIds: string[];
  primaryInterviewer: string | null;
  autoScheduled: boolean;
  schedulingPreferences: Record<string, unknown>;
  conflictsDetected: string[];
  rescheduleCount: number;
  rescheduleReason: string | null;
  originalInterviewId: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type NewInterview = Pick<
  Interview,
  | "candidateId"
  | "jobPositionId"
  | "title"
  | "interviewType"
  | "scheduledStart"
  | "scheduledEnd"
  | "durationMinutes"
  | "timezone"
  | "interviewerIds"
  | "primaryInterviewer"
  | "schedulingPreferences"
  | "conflictsDetected"
>;

export type CandidateRecord = {
  id: string;
  name: string;
  email: string;
  timezone: string | null;
};

export type JobPositionRecord = {
  id: string;
  title: string;
};

export type ParticipantCalendar = {
  participantId: string;
  provider: string;
  integrationStatus: string;
  workingHours: WorkingHours;
  lastSyncAt: Date | null;
};

export interface DirectoryLookup {
  getCandidate(candidateId: string): Promise<CandidateRecord | null>;
  getJobPosition(jobPositionId: string): Promise<JobPositionRecord | null>;
  getCalendarIntegration(participantId: string): Promise<ParticipantCalendar | null>;
}

export type RescheduleCommit = {
  originalId: string;
  expectedVersion: number;
  reason: string;
  replacement: NewInterview;
};

export type StatusTransition = {
  interviewId: string;
  expectedVersion: number;
  to: InterviewStatus;
};

/** `from` and `to` bound `scheduledStart`, both inclusive. */
export type InterviewFilter = {
  status?: InterviewStatus | undefined;
  interviewerId?: string | undefined;
  candidateId?: string | undefined;
  from?: Date | undefined;
  to?: Date | undefined;
  limit: number;
  offset: number;
};

export type InterviewPage = {
  interviews: Interview[];
  totalCount: number;
};

export type RecordedAvailability = AvailabilityMarker & { id: string };

/**
 * Interview persistence. Writers must serialize on the affected rows: creation re-checks
 * interviewer overlap under a lock, updates compare `version`. A lost race surfaces as
 * `ConcurrentModificationError`.
 */
export interface InterviewStore {
  getInterview(interviewId: string): Promise<Interview | null>;
  createInterview(input: NewInterview): Promise<Interview>;
  commitReschedule(input: RescheduleCommit): Promise<{ original: Interview; replacement: Interview }>;
  transitionStatus(input: StatusTransition): Promise<Interview>;
  /** Newest `scheduledStart` first; `totalCount` ignores `limit` and `offset`. */
  listInterviews(filter: InterviewFilter): Promise<InterviewPage>;
  /** Stores a busy or available marker where the availability gateway will read it. */
  recordAvailability(marker: AvailabilityMarker): Promise<RecordedAvailability>;
}

export type SchedulingLogEntry = {
  interviewId: string | null;
  action: "schedule" | "reschedule";
  status: "success" | "failed";
  strategy: SchedulingStrategy | null;
  slotsEvaluated: number | null;
  processingTimeMs: number;
  chosenScore: number | null;
  alternates: SchedulingLogAlternative[];
  errorType: SchedulingErrorType | null;
  errors: string[];
};

export interface SchedulingLogSink {
  appendSchedulingLog(entry: SchedulingLogEntry): Promise<void>;
}
