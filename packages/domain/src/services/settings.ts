import type { AppConfig } from "@interview-scheduler/shared";
import type { WorkingHours } from "../availability/types";
import { resolveScoringConfig, type ScoringConfig } from "../scoring/slot-scorer";

export type SchedulerSettings = {
  workingHours: WorkingHours;
  granularityMinutes: number;
  maxRescheduleAttempts: number;
  /** Upper bound for every external read (availability, directory, audit, publish). */
  externalTimeoutMs: number;
  scoring: ScoringConfig;
};

export function schedulerSettingsFromConfig(
  config: AppConfig,
  scoringOverrides: Partial<ScoringConfig> = {}
): SchedulerSettings {
  return {
    workingHours: config.scheduler.workingHours,
    granularityMinutes: config.scheduler.slotGranularityMinutes,
    maxRescheduleAttempts: config.scheduler.maxRescheduleAttempts,
    externalTimeoutMs: config.scheduler.externalTimeoutMs,
    scoring: resolveScoringConfig(scoringOverrides)
  };
}
