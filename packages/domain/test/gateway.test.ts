import { describe, expect, it, vi } from "vitest";
import { AvailabilityGatherTimeoutError } from "@interview-scheduler/shared";
import {
  EmptyAvailabilityGateway,
  gatherAvailability,
  withTimeout,
  type AvailabilityGateway
} from "../src/availability/gateway";
import type { Booking } from "../src/availability/types";

const window = { start: new Date("2026-03-02T00:00:00.000Z"), end: new Date("2026-03-03T00:00:00.000Z") };

function bookingFor(id: string, participantIds: string[]): Booking {
  return {
    id,
    title: `Interview ${id}`,
    start: new Date("2026-03-02T10:00:00.000Z"),
    end: new Date("2026-03-02T11:00:00.000Z"),
    participantIds
  };
}

describe("withTimeout", () => {
  it("passes through a result that arrives in time", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50, "lookup")).resolves.toBe("done");
  });

  it("rejects with a timeout error when the work is too slow", async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(new Promise<string>(() => undefined), 100, "Calendar lookup");
      const assertion = expect(pending).rejects.toThrow(AvailabilityGatherTimeoutError);
      await vi.advanceTimersByTimeAsync(100);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("gatherAvailability", () => {
  it("asks for each participant separately and keeps only their own data", async () => {
    const shared = bookingFor("i-1", ["a", "b"]);
    const gateway: AvailabilityGateway = {
      getBookings: vi.fn(async (ids: readonly string[]) =>
        ids[0] === "a" ? [shared, bookingFor("i-2", ["c"])] : [shared]
      ),
      getBusySlots: vi.fn(async (ids: readonly string[]) => [
        {
          participantId: "b",
          start: new Date("2026-03-02T12:00:00.000Z"),
          end: new Date("2026-03-02T13:00:00.000Z"),
          type: "busy" as const,
          recurring: false,
          notes: null
        }
      ].filter((m) => ids.includes(m.participantId)))
    };

    const snapshot = await gatherAvailability(gateway, ["a", "b"], window, { timeoutMs: 100 });

    expect(gateway.getBookings).toHaveBeenCalledWith(["a"], window);
    expect(gateway.getBookings).toHaveBeenCalledWith(["b"], window);
    expect(snapshot.get("a")?.bookings.map((b) => b.id)).toEqual(["i-1"]);
    expect(snapshot.get("a")?.markers).toEqual([]);
    expect(snapshot.get("b")?.bookings.map((b) => b.id)).toEqual(["i-1"]);
    expect(snapshot.get("b")?.markers).toHaveLength(1);
  });

  it("drops excluded bookings", async () => {
    const gateway: AvailabilityGateway = {
      getBookings: async () => [bookingFor("i-1", ["a"]), bookingFor("i-2", ["a"])],
      getBusySlots: async () => []
    };

    const snapshot = await gatherAvailability(gateway, ["a"], window, { timeoutMs: 100, excludeBookingIds: ["i-1"] });

    expect(snapshot.get("a")?.bookings.map((b) => b.id)).toEqual(["i-2"]);
  });

  it("returns empty data from the empty provider", async () => {
    const snapshot = await gatherAvailability(new EmptyAvailabilityGateway(), ["a"], window, { timeoutMs: 100 });
    expect(snapshot.get("a")).toEqual({ bookings: [], markers: [] });
  });
});
