import type { InterviewStatus } from "@interview-scheduler/shared";

export type InterviewEvent = "confirm" | "reschedule" | "cancel" | "complete" | "no_show";

/** Events callers may apply directly; `reschedule` only happens through the reschedule flow. */
export type StatusEvent = Exclude<InterviewEvent, "reschedule">;

export const TERMINAL_STATUSES: readonly InterviewStatus[] = ["rescheduled", "cancelled", "completed", "no_show"];

function fromActive(event: InterviewEvent): InterviewStatus {
  switch (event) {
    case "confirm":
      return "confirmed";
    case "reschedule":
      return "rescheduled";
    case "cancel":
      return "cancelled";
    case "complete":
      return "completed";
    case "no_show":
      return "no_show";
  }
}

/** Target status for `event`, or null when the transition is not allowed. */
export function nextStatus(status: InterviewStatus, event: InterviewEvent): InterviewStatus | null {
  switch (status) {
    case "scheduled":
      return fromActive(event);
    case "confirmed":
      return event === "confirm" ? null : fromActive(event);
    case "rescheduled":
    case "cancelled":
    case "completed":
    case "no_show":
      return null;
  }
}

export function isTerminal(status: InterviewStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
