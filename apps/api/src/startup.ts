import { ensureSchema, listTables, type DbPool, type ScopedDbClient } from "./db";
import type { Logger } from "./logger";

export interface InitializeOptions {
  schema: string;
  /** Create the schema and tables if absent (development only). */
  ensureCreated: boolean;
}

/**
 * Checks the database is reachable and logs the tables in the configured
 * schema. Runs once before the server starts listening; any error is rethrown
 * and treated as fatal by the caller.
 */
export async function initializeDatabase(
  pool: DbPool,
  { schema, ensureCreated }: InitializeOptions,
  logger: Logger,
): Promise<string[]> {
  const log = logger.child({ component: "startup" });

  let client: ScopedDbClient;
  try {
    client = await pool.connect();
  } catch (err) {
    log.error({ err }, "Error while connecting to database");
    throw err;
  }

  try {
    if (ensureCreated) {
      await ensureSchema(client, schema);
      log.debug({ schema }, "Ensured schema and tables exist");
    }

    const tables = await listTables(client, schema);

    log.info("Connected to database successfully!");
    log.info(`Available tables in schema '${schema}':`);
    for (const table of tables) {
      log.info(`- ${table}`);
    }
    if (!tables.length) {
      log.warn(`Schema '${schema}' has no tables (it may not exist)`);
    }

    client.release();
    return tables;
  } catch (err) {
    log.error({ err }, "Error while connecting to database");
    // Discard the connection rather than returning it to the pool
    client.release(err instanceof Error ? err : true);
    throw err;
  }
}
