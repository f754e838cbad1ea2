import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies scheduler defaults when the environment is empty", () => {
    const config = loadConfig({});

    expect(config.availabilityProvider).toBe("database");
    expect(config.logLevel).toBe("info");
    expect(config.scheduler).toEqual({
      slotGranularityMinutes: 30,
      maxRescheduleAttempts: 3,
      externalTimeoutMs: 5000,
      workingHours: { weekdays: [1, 2, 3, 4, 5], start: "09:00", end: "17:00", timezone: "UTC" }
    });
    expect(config.events).toEqual({ webhookUrl: null, webhookSecret: null });
  });

  it("coerces numeric and list settings", () => {
    const config = loadConfig({
      AVAILABILITY_PROVIDER: "none",
      SCHEDULER_MAX_RESCHEDULE_ATTEMPTS: "5",
      SCHEDULER_EXTERNAL_TIMEOUT_MS: "250",
      SCHEDULER_WORKING_DAYS: "1, 3,5",
      SCHEDULER_WORKING_TIMEZONE: "Europe/Berlin",
      EVENTS_WEBHOOK_URL: "https://hooks.example.test/interviews",
      EVENTS_WEBHOOK_SECRET: "test-secret"
    });

    expect(config.availabilityProvider).toBe("none");
    expect(config.scheduler.maxRescheduleAttempts).toBe(5);
    expect(config.scheduler.externalTimeoutMs).toBe(250);
    expect(config.scheduler.workingHours.weekdays).toEqual([1, 3, 5]);
    expect(config.scheduler.workingHours.timezone).toBe("Europe/Berlin");
    expect(config.events).toEqual({ webhookUrl: "https://hooks.example.test/interviews", webhookSecret: "test-secret" });
  });

  it("rejects an unknown timezone", () => {
    expect(() => loadConfig({ SCHEDULER_WORKING_TIMEZONE: "Mars/Olympus" })).toThrow(
      "Invalid configuration: SCHEDULER_WORKING_TIMEZONE: must be a valid IANA timezone"
    );
  });

  it("rejects an inverted working day", () => {
    expect(() =>
      loadConfig({ SCHEDULER_WORKING_HOURS_START: "18:00", SCHEDULER_WORKING_HOURS_END: "09:00" })
    ).toThrow("SCHEDULER_WORKING_HOURS_START must be before SCHEDULER_WORKING_HOURS_END");
  });
});
