import { Pool, escapeIdentifier, type PoolConfig, type QueryResultRow } from "pg";
import type { DbConfig } from "./config";
import type { Logger } from "./logger";

// Postgres splits `options` on whitespace; a backslash keeps a space inside one value
export const searchPathOption = (schema: string): string =>
  `-c search_path=${escapeIdentifier(schema).replace(/[\\ ]/g, "\\$&")}`;

export const poolConfig = (db: DbConfig): PoolConfig => ({
  host:     db.host,
  port:     db.port,
  database: db.database,
  user:     db.user,
  password: db.password,
  options:  searchPathOption(db.schema),

  max: 5,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5_000,
});

// ─── Database Pool ────────────────────────────────────────
// Startup only needs one connection; requests never touch the DB,
// so a small pool is plenty.
export const createPool = (db: DbConfig, logger: Logger): Pool => {
  const pool = new Pool(poolConfig(db));

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
};

// The slice of pg's API the startup path uses; a PoolClient satisfies DbClient/ScopedDbClient
// and a Pool satisfies DbPool
export interface DbClient {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
  escapeIdentifier(str: string): string;
}

export interface ScopedDbClient extends DbClient {
  release(err?: Error | boolean): void;
}

export interface DbPool {
  connect(): Promise<ScopedDbClient>;
}

// Idempotent; only used in development mode
export const ensureSchema = async (client: DbClient, schema: string): Promise<void> => {
  const s = client.escapeIdentifier(schema);

  await client.query(`CREATE SCHEMA IF NOT EXISTS ${s}`);
  await client.query(
    `CREATE TABLE IF NOT EXISTS ${s}.todos (
       id        SERIAL PRIMARY KEY,
       user_id   INTEGER NOT NULL,
       title     TEXT    NOT NULL,
       completed BOOLEAN NOT NULL DEFAULT FALSE
     )`,
  );
  await client.query(
    `CREATE TABLE IF NOT EXISTS ${s}.users (
       id       SERIAL PRIMARY KEY,
       name     TEXT,
       username TEXT,
       email    TEXT
     )`,
  );
};

export const listTables = async (client: DbClient, schema: string): Promise<string[]> => {
  const { rows } = await client.query(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = $1
     ORDER BY table_name`,
    [schema],
  );
  return rows.map((r) => String(r.table_name));
};
