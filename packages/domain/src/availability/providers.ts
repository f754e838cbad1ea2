import type { AvailabilityProvider } from "@interview-scheduler/shared";
import type { DbClient } from "@interview-scheduler/db";
import { DatabaseAvailabilityGateway } from "./database-gateway";
import { EmptyAvailabilityGateway, type AvailabilityGateway } from "./gateway";

export function createAvailabilityGateway(provider: AvailabilityProvider, deps: { db: DbClient }): AvailabilityGateway {
  switch (provider) {
    case "database":
      return new DatabaseAvailabilityGateway(deps.db);
    case "none":
      return new EmptyAvailabilityGateway();
    default: {
      const unknownProvider: never = provider;
      throw new Error(`Unknown availability provider: ${String(unknownProvider)}`);
    }
  }
}
