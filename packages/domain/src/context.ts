import { createDbClient } from "@interview-scheduler/db";
import { createEventPublisher } from "@interview-scheduler/integrations";
import { createLogger, loadConfig, type AppConfig } from "@interview-scheduler/shared";
import { createAvailabilityGateway } from "./availability/providers";
import { SchedulingRepository } from "./repo/scheduling-repo";
import type { ScoringConfig } from "./scoring/slot-scorer";
import { SchedulingService } from "./services/scheduling-service";
import { schedulerSettingsFromConfig } from "./services/settings";

export type SchedulingContext = {
  config: AppConfig;
  service: SchedulingService;
  close: () => Promise<void>;
};

/** Wires the service against Postgres. The caller owns the returned `close`. */
export function createSchedulingContext(
  config: AppConfig = loadConfig(),
  scoringOverrides: Partial<ScoringConfig> = {}
): SchedulingContext {
  const settings = schedulerSettingsFromConfig(config, scoringOverrides);
  const logger = createLogger("scheduler", config.logLevel);
  const { db, close } = createDbClient(config.databaseUrl);
  const repo = new SchedulingRepository(db);

  const service = new SchedulingService({
    gateway: createAvailabilityGateway(config.availabilityProvider, { db }),
    directory: repo,
    store: repo,
    auditLog: repo,
    publisher: createEventPublisher(config, logger.child("events")),
    logger,
    settings
  });

  return { config, service, close };
}
