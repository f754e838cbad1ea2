import { describe, expect, it } from "vitest";
import {
  createSchedulingRequest,
  parseRescheduleRequest,
  parseSchedulingRequest,
  requestRuleViolations
} from "../src/services/scheduling-request";

const NOW = new Date("2026-02-23T08:00:00.000Z");

describe("createSchedulingRequest", () => {
  it("fills defaults relative to now and freezes the result", () => {
    const request = createSchedulingRequest(
      { candidateId: "c-1", jobPositionId: "j-1", interviewType: "panel", interviewerIds: ["a"] },
      NOW
    );

    expect(request.durationMinutes).toBe(60);
    expect(request.earliestStart.toISOString()).toBe("2026-02-24T08:00:00.000Z");
    expect(request.latestEnd.toISOString()).toBe("2026-03-25T08:00:00.000Z");
    expect(request.timezone).toBe("UTC");
    expect(request.priority).toBe("medium");
    expect(request.strategy).toBe("balanced");
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.interviewerIds)).toBe(true);
  });

  it("copies the interviewer list", () => {
    const interviewers = ["a", "b"];
    const request = createSchedulingRequest(
      { candidateId: "c-1", jobPositionId: "j-1", interviewType: "panel", interviewerIds: interviewers },
      NOW
    );
    interviewers.push("c");
    expect(request.interviewerIds).toEqual(["a", "b"]);
  });
});

describe("parseSchedulingRequest", () => {
  it("maps the snake_case payload", () => {
    const parsed = parseSchedulingRequest(
      {
        candidate_id: "c-1",
        job_position_id: "j-1",
        interview_type: "video_call",
        interviewer_emails: ["a@example.test"],
        duration_minutes: 45,
        earliest_start: "2026-03-02T09:00:00Z",
        latest_end: "2026-03-06T17:00:00Z",
        timezone: "Europe/Berlin",
        priority: "urgent",
        preferred_times: [{ start_at: "2026-03-02T09:00:00Z", end_at: "2026-03-02T10:00:00Z" }],
        requirements: { language: "en" }
      },
      NOW
    );

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.request).toMatchObject({
      candidateId: "c-1",
      jobPositionId: "j-1",
      interviewType: "video_call",
      interviewerIds: ["a@example.test"],
      durationMinutes: 45,
      timezone: "Europe/Berlin",
      priority: "urgent",
      strategy: "balanced",
      requirements: { language: "en" }
    });
    expect(parsed.request.earliestStart.toISOString()).toBe("2026-03-02T09:00:00.000Z");
    expect(parsed.request.preferredTimes).toHaveLength(1);
  });

  it("returns shape errors with their paths", () => {
    const parsed = parseSchedulingRequest(
      { candidate_id: "c-1", job_position_id: "j-1", interview_type: "coffee", interviewer_emails: [] },
      NOW
    );

    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.errors).toHaveLength(1);
    expect(parsed.errors[0]).toMatch(/^interview_type: /);
  });
});

describe("requestRuleViolations", () => {
  const base = { candidateId: "c-1", jobPositionId: "j-1", interviewType: "technical" as const };

  it("accepts a well-formed request", () => {
    expect(requestRuleViolations(createSchedulingRequest({ ...base, interviewerIds: ["a", "b"] }, NOW))).toEqual([]);
  });

  it("enforces the duration bounds inclusively", () => {
    const violations = (durationMinutes: number) =>
      requestRuleViolations(createSchedulingRequest({ ...base, interviewerIds: ["a"], durationMinutes }, NOW));

    expect(violations(15)).toEqual([]);
    expect(violations(480)).toEqual([]);
    expect(violations(14)).toEqual(["Duration must be between 15 minutes and 8 hours"]);
    expect(violations(481)).toEqual(["Duration must be between 15 minutes and 8 hours"]);
  });

  it("flags blank and duplicate interviewers", () => {
    const request = createSchedulingRequest({ ...base, interviewerIds: ["a", " ", "a"] }, NOW);
    expect(requestRuleViolations(request)).toEqual([
      "Interviewer identifiers must not be blank",
      "Interviewer identifiers must be unique"
    ]);
  });
});

describe("parseRescheduleRequest", () => {
  it("maps overrides and leaves absent ones undefined", () => {
    const parsed = parseRescheduleRequest({
      reason: "Interviewer is sick",
      new_earliest_start: "2026-03-03T09:00:00Z",
      new_interviewer_emails: ["c@example.test"]
    });

    expect(parsed).toEqual({
      ok: true,
      reason: "Interviewer is sick",
      overrides: {
        earliestStart: new Date("2026-03-03T09:00:00.000Z"),
        latestEnd: undefined,
        interviewerIds: ["c@example.test"],
        durationMinutes: undefined,
        priority: undefined,
        strategy: undefined
      }
    });
  });

  it("requires a reason", () => {
    const parsed = parseRescheduleRequest({});
    expect(parsed.ok).toBe(false);
  });
});
