import { describe, expect, it } from "vitest";
import { loadConfig } from "@interview-scheduler/shared";
import { createSchedulingContext } from "../src/context";
import { SchedulingService } from "../src/services/scheduling-service";

describe("createSchedulingContext", () => {
  it("builds a service from configuration without connecting", async () => {
    const context = createSchedulingContext(loadConfig({ AVAILABILITY_PROVIDER: "none", LOG_LEVEL: "silent" }));

    expect(context.service).toBeInstanceOf(SchedulingService);
    expect(context.config.availabilityProvider).toBe("none");
    await context.close();
  });

  it("rejects invalid scoring overrides up front", () => {
    expect(() =>
      createSchedulingContext(loadConfig({ LOG_LEVEL: "silent" }), { conflictPenalty: -1 })
    ).toThrow("Conflict penalty must be within [0, 1]");
  });
});
