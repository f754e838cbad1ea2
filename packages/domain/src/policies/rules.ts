import type { Interview } from "../repo/types";
import { nextStatus } from "./interview-status";

export type ReschedulePolicy = {
  maxAttempts: number;
};

/**
 * Every guard the interview fails for a reschedule at `now`; empty when allowed.
 * Guards: active status, start still in the future, attempts remaining.
 */
export function rescheduleViolations(interview: Interview, now: Date, policy: ReschedulePolicy): string[] {
  const violations: string[] = [];

  if (nextStatus(interview.status, "reschedule") === null) {
    violations.push(`Interview status "${interview.status}" does not allow rescheduling`);
  }
  if (now >= interview.scheduledStart) {
    violations.push("Interview has already started or is in the past");
  }
  if (interview.rescheduleCount >= policy.maxAttempts) {
    violations.push(`Reschedule limit of ${policy.maxAttempts} attempts reached`);
  }

  return violations;
}

export function canReschedule(interview: Interview, now: Date, policy: ReschedulePolicy): boolean {
  return rescheduleViolations(interview, now, policy).length === 0;
}
