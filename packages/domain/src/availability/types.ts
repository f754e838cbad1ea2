import type { AvailabilityType } from "@interview-scheduler/shared";

export type TimeInterval = {
  start: Date;
  end: Date;
};

/** Allowed ISO weekdays (1 = Monday … 7 = Sunday) and a daily `HH:mm` band in `timezone`. */
export type WorkingHours = {
  weekdays: readonly number[];
  start: string;
  end: string;
  timezone: string;
};

export type SlotSearch = {
  earliestStart: Date;
  latestEnd: Date;
  durationMinutes: number;
  granularityMinutes: number;
  workingHours: WorkingHours;
};

/** An existing scheduled or confirmed interview, as seen by the availability gateway. */
export type Booking = TimeInterval & {
  id: string;
  title: string;
  participantIds: string[];
};

export type AvailabilityMarker = TimeInterval & {
  participantId: string;
  type: AvailabilityType;
  recurring: boolean;
  notes: string | null;
};

export type ParticipantAvailability = {
  bookings: Booking[];
  markers: AvailabilityMarker[];
};

/** Per-participant bookings and markers gathered for one search window. */
export type AvailabilitySnapshot = Map<string, ParticipantAvailability>;

export type ConflictDescription = {
  participantId: string;
  source: "interview" | "busy";
  reason: string;
  window: TimeInterval;
};

export type CandidateSlot = TimeInterval & {
  conflicts: string[];
  participantsAvailable: string[];
  participantsUnavailable: string[];
};
