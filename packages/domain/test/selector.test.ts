import { describe, expect, it } from "vitest";
import { compareSlots, isNonEmpty, rankSlots, selectSlots } from "../src/scoring/selector";
import type { TimeSlot } from "../src/scoring/slot-scorer";

function slot(startIso: string, score: number): TimeSlot {
  const start = new Date(startIso);
  return {
    start,
    end: new Date(start.getTime() + 60 * 60_000),
    conflicts: [],
    participantsAvailable: ["a"],
    participantsUnavailable: [],
    score,
    baseScore: score,
    breakdown: { timePreference: 1, availabilityQuality: 1, interviewerWorkload: 1, candidateConvenience: 1, urgency: 1 },
    reasons: []
  };
}

describe("rankSlots", () => {
  it("orders by score, then by earliest start", () => {
    const ranked = rankSlots([
      slot("2026-03-02T14:00:00.000Z", 0.9),
      slot("2026-03-02T11:00:00.000Z", 0.95),
      slot("2026-03-02T09:00:00.000Z", 0.95),
      slot("2026-03-02T10:00:00.000Z", 0.6)
    ]);

    expect(ranked.map((s) => s.start.toISOString())).toEqual([
      "2026-03-02T09:00:00.000Z",
      "2026-03-02T11:00:00.000Z",
      "2026-03-02T14:00:00.000Z",
      "2026-03-02T10:00:00.000Z"
    ]);
  });

  it("does not reorder its input", () => {
    const input = [slot("2026-03-02T10:00:00.000Z", 0.5), slot("2026-03-02T09:00:00.000Z", 0.9)];
    rankSlots(input);
    expect(input[0]?.score).toBe(0.5);
  });

  it("compares equal slots as equal", () => {
    expect(compareSlots(slot("2026-03-02T09:00:00.000Z", 0.7), slot("2026-03-02T09:00:00.000Z", 0.7))).toBe(0);
  });
});

describe("selectSlots", () => {
  it("returns the best slot and at most three alternates", () => {
    const ranked = rankSlots([
      slot("2026-03-02T09:00:00.000Z", 0.9),
      slot("2026-03-02T10:00:00.000Z", 0.8),
      slot("2026-03-02T11:00:00.000Z", 0.7),
      slot("2026-03-02T12:00:00.000Z", 0.6),
      slot("2026-03-02T13:00:00.000Z", 0.5)
    ]);
    if (!isNonEmpty(ranked)) throw new Error("expected slots");

    const { chosen, alternates } = selectSlots(ranked);

    expect(chosen.start.toISOString()).toBe("2026-03-02T09:00:00.000Z");
    expect(alternates.map((s) => s.score)).toEqual([0.8, 0.7, 0.6]);
  });

  it("returns fewer alternates when fewer slots exist", () => {
    const { alternates } = selectSlots([slot("2026-03-02T09:00:00.000Z", 0.9)]);
    expect(alternates).toEqual([]);
  });

  it("recognises empty lists", () => {
    expect(isNonEmpty([])).toBe(false);
  });
});
