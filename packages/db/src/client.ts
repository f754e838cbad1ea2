import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema";

export function createDbClient(connectionString: string, options: { maxConnections?: number } = {}) {
  const client = postgres(connectionString, { max: options.maxConnections ?? 10 });
  const db = drizzle(client, { schema });
  return { db, close: () => client.end() };
}

export type DbClient = ReturnType<typeof createDbClient>["db"];
