import { DateTime } from "luxon";
import type { SchedulingPriority } from "@interview-scheduler/shared";
import type { Booking, CandidateSlot } from "../availability/types";

export type ScoreFactor =
  | "timePreference"
  | "availabilityQuality"
  | "interviewerWorkload"
  | "candidateConvenience"
  | "urgency";

export type ScoreBreakdown = Record<ScoreFactor, number>;

/** Inclusive on both hours: `{ fromHour: 9, toHour: 11 }` covers 09:00 through 11:59. */
export type HourBand = { fromHour: number; toHour: number; score: number };

export type WorkloadBucket = { maxBookings: number; score: number };

export type LeadTimeBand = { withinHours: number; score: number };

export type ScoringConfig = {
  weights: ScoreWeights;
  timePreference: { bands: HourBand[]; fallback: number };
  candidateConvenience: { bands: HourBand[]; fallback: number; unresolvedTimezone: number };
  workload: { buckets: WorkloadBucket[]; fallback: number };
  urgency: {
    urgent: { bands: LeadTimeBand[]; fallback: number };
    high: { bands: LeadTimeBand[]; fallback: number };
    /** medium and low: slots too close to now are discouraged. */
    standard: { minLeadHours: number; score: number; tooSoon: number };
  };
  reasonThresholds: ScoreBreakdown;
  conflictPenalty: number;
};

export type ScoreWeights = ScoreBreakdown;

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  weights: {
    timePreference: 0.3,
    availabilityQuality: 0.25,
    interviewerWorkload: 0.2,
    candidateConvenience: 0.15,
    urgency: 0.1
  },
  timePreference: {
    bands: [
      { fromHour: 9, toHour: 11, score: 1.0 },
      { fromHour: 13, toHour: 15, score: 0.9 },
      { fromHour: 8, toHour: 17, score: 0.7 }
    ],
    fallback: 0.3
  },
  candidateConvenience: {
    bands: [
      { fromHour: 9, toHour: 17, score: 1.0 },
      { fromHour: 8, toHour: 18, score: 0.8 }
    ],
    fallback: 0.4,
    unresolvedTimezone: 0.8
  },
  workload: {
    buckets: [
      { maxBookings: 0, score: 1.0 },
      { maxBookings: 2, score: 0.8 },
      { maxBookings: 4, score: 0.6 }
    ],
    fallback: 0.3
  },
  urgency: {
    urgent: {
      bands: [
        { withinHours: 24, score: 1.0 },
        { withinHours: 48, score: 0.8 }
      ],
      fallback: 0.5
    },
    high: { bands: [{ withinHours: 72, score: 1.0 }], fallback: 0.7 },
    standard: { minLeadHours: 24, score: 1.0, tooSoon: 0.6 }
  },
  reasonThresholds: {
    timePreference: 0.7,
    availabilityQuality: 0.8,
    interviewerWorkload: 0.7,
    candidateConvenience: 0.8,
    urgency: 0.5
  },
  conflictPenalty: 0.7
};

const WEIGHT_TOLERANCE = 1e-9;

/** Merges overrides onto the defaults; weights must still sum to 1. */
export function resolveScoringConfig(overrides: Partial<ScoringConfig> = {}): ScoringConfig {
  const config: ScoringConfig = { ...DEFAULT_SCORING_CONFIG, ...overrides };
  const total = Object.values(config.weights).reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new Error(`Scoring weights must sum to 1.0, got ${total}`);
  }
  if (config.conflictPenalty < 0 || config.conflictPenalty > 1) {
    throw new Error("Conflict penalty must be within [0, 1]");
  }
  return config;
}

export type ScoringContext = {
  requestedParticipants: readonly string[];
  bookingsByParticipant: ReadonlyMap<string, readonly Booking[]>;
  priority: SchedulingPriority;
  candidateTimezone: string;
  calendarTimezone: string;
  now: Date;
  config: ScoringConfig;
};

export type TimeSlot = CandidateSlot & {
  score: number;
  /** Score before the conflict penalty. */
  baseScore: number;
  breakdown: ScoreBreakdown;
  reasons: string[];
};

function bandLookup(hour: number, bands: readonly HourBand[], fallback: number): number {
  const band = bands.find((b) => hour >= b.fromHour && hour <= b.toHour);
  return band ? band.score : fallback;
}

export function scoreTimePreference(slot: CandidateSlot, ctx: ScoringContext): number {
  const hour = DateTime.fromJSDate(slot.start, { zone: ctx.calendarTimezone }).hour;
  return bandLookup(hour, ctx.config.timePreference.bands, ctx.config.timePreference.fallback);
}

export function scoreAvailabilityQuality(slot: CandidateSlot, ctx: ScoringContext): number {
  if (ctx.requestedParticipants.length === 0) return 0;
  return slot.participantsAvailable.length / ctx.requestedParticipants.length;
}

export function scoreInterviewerWorkload(slot: CandidateSlot, ctx: ScoringContext): number {
  if (slot.participantsAvailable.length === 0) return 0;

  const slotDay = DateTime.fromJSDate(slot.start, { zone: ctx.calendarTimezone }).toISODate();
  const { buckets, fallback } = ctx.config.workload;

  let total = 0;
  for (const participantId of slot.participantsAvailable) {
    const bookings = ctx.bookingsByParticipant.get(participantId) ?? [];
    const sameDay = bookings.filter(
      (b) => DateTime.fromJSDate(b.start, { zone: ctx.calendarTimezone }).toISODate() === slotDay
    ).length;
    const bucket = buckets.find((b) => sameDay <= b.maxBookings);
    total += bucket ? bucket.score : fallback;
  }
  return total / slot.participantsAvailable.length;
}

export function scoreCandidateConvenience(slot: CandidateSlot, ctx: ScoringContext): number {
  const local = DateTime.fromJSDate(slot.start, { zone: ctx.candidateTimezone });
  const { bands, fallback, unresolvedTimezone } = ctx.config.candidateConvenience;
  if (!local.isValid) return unresolvedTimezone;
  return bandLookup(local.hour, bands, fallback);
}

export function scoreUrgency(slot: CandidateSlot, ctx: ScoringContext): number {
  const hoursUntil = (slot.start.getTime() - ctx.now.getTime()) / 3_600_000;
  const rules = ctx.config.urgency;

  switch (ctx.priority) {
    case "urgent":
    case "high": {
      const table = rules[ctx.priority];
      const band = table.bands.find((b) => hoursUntil <= b.withinHours);
      return band ? band.score : table.fallback;
    }
    case "medium":
    case "low":
      return hoursUntil >= rules.standard.minLeadHours ? rules.standard.score : rules.standard.tooSoon;
    default: {
      const unknownPriority: never = ctx.priority;
      throw new Error(`Unknown priority: ${String(unknownPriority)}`);
    }
  }
}

function reasonsFor(breakdown: ScoreBreakdown, thresholds: ScoreBreakdown): string[] {
  const reasons: string[] = [];
  if (breakdown.timePreference > thresholds.timePreference) {
    reasons.push(`Good time match (score: ${breakdown.timePreference.toFixed(1)})`);
  }
  if (breakdown.availabilityQuality > thresholds.availabilityQuality) reasons.push("High availability quality");
  if (breakdown.interviewerWorkload > thresholds.interviewerWorkload) reasons.push("Good interviewer availability");
  if (breakdown.candidateConvenience > thresholds.candidateConvenience) reasons.push("Convenient for candidate");
  if (breakdown.urgency > thresholds.urgency) reasons.push("Meets urgency requirements");
  return reasons;
}

export function scoreSlot(slot: CandidateSlot, ctx: ScoringContext): TimeSlot {
  const breakdown: ScoreBreakdown = {
    timePreference: scoreTimePreference(slot, ctx),
    availabilityQuality: scoreAvailabilityQuality(slot, ctx),
    interviewerWorkload: scoreInterviewerWorkload(slot, ctx),
    candidateConvenience: scoreCandidateConvenience(slot, ctx),
    urgency: scoreUrgency(slot, ctx)
  };

  const { weights } = ctx.config;
  const weighted =
    breakdown.timePreference * weights.timePreference +
    breakdown.availabilityQuality * weights.availabilityQuality +
    breakdown.interviewerWorkload * weights.interviewerWorkload +
    breakdown.candidateConvenience * weights.candidateConvenience +
    breakdown.urgency * weights.urgency;
  const baseScore = Math.min(1, Math.max(0, weighted));

  const reasons = reasonsFor(breakdown, ctx.config.reasonThresholds);
  let score = baseScore;
  if (slot.conflicts.length > 0) {
    score = baseScore * ctx.config.conflictPenalty;
    reasons.push(`Has ${slot.conflicts.length} conflicts`);
  }

  return { ...slot, score, baseScore, breakdown, reasons };
}
