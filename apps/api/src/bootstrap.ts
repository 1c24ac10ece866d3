import type { Express } from "express";
import {
  ConfigError,
  loadConfig,
  redactConnectionString,
  type AppConfig,
  type DbConfig,
  type Env,
} from "./config";
import { createLogger, type Logger } from "./logger";
import { createPool, type DbPool } from "./db";
import { initializeDatabase } from "./startup";
import { PlaceholderClient } from "./placeholder";
import { createApp } from "./app";

export interface StartupPool extends DbPool {
  end(): Promise<void>;
}

export interface Listening {
  close(callback?: (err?: Error) => void): unknown;
}

export interface BootstrapDeps {
  env: Env;
  exit: (code: number) => void;
  writeError?: (message: string) => void;
  makeLogger?: (config: AppConfig) => Logger;
  makePool?: (db: DbConfig, logger: Logger) => StartupPool;
  listen?: (app: Express, port: number, onListening: () => void) => Listening;
}

export interface Running {
  config: AppConfig;
  app: Express;
  server: Listening;
  /** Closes the server, then the pool, then exits. Later calls are no-ops. */
  shutdown: (signal: string) => void;
}

const defaults = {
  writeError: (message: string) => {
    process.stderr.write(message);
  },
  makeLogger: (config: AppConfig) =>
    createLogger({ level: config.logLevel, pretty: config.env !== "production" }),
  makePool: createPool,
  listen: (app: Express, port: number, onListening: () => void) => app.listen(port, onListening),
} satisfies Omit<Required<BootstrapDeps>, "env" | "exit">;

/**
 * Config → logger → pool → database check → HTTP.
 * Resolves to undefined when startup failed and `exit` was called.
 */
export async function bootstrap(deps: BootstrapDeps): Promise<Running | undefined> {
  const { env, exit } = deps;
  const { writeError, makeLogger, makePool, listen } = { ...defaults, ...deps };

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      writeError(`${err.message}\n`);
      exit(1);
      return undefined;
    }
    throw err;
  }

  const logger = makeLogger(config);
  const pool = makePool(config.db, logger);

  // Resolves to whether the pool closed cleanly
  const closePool = (): Promise<boolean> =>
    pool.end().then(
      () => true,
      (err: unknown) => {
        logger.error({ err }, "Error closing database pool");
        return false;
      },
    );

  logger.info({ db: redactConnectionString(config.db.connectionString) }, "Connecting to database");
  try {
    await initializeDatabase(
      pool,
      { schema: config.db.schema, ensureCreated: config.isDevelopment },
      logger,
    );
  } catch (err) {
    logger.fatal({ err }, "An error occurred while initializing the database.");
    await closePool();
    exit(1);
    return undefined;
  }

  const app = createApp({
    client: new PlaceholderClient(config.placeholderApiUrl, logger),
    logger,
  });

  const server = listen(app, config.port, () => {
    logger.info(`Listening on :${config.port} (${config.env})`);
  });

  // ─── Graceful Shutdown ────────────────────────────────────
  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;

    logger.info(`${signal} — shutting down`);
    const force = setTimeout(() => exit(1), 10_000);
    force.unref();

    server.close(() => {
      void closePool().then((closed) => {
        clearTimeout(force);
        exit(closed ? 0 : 1);
      });
    });
  };

  return { config, app, server, shutdown };
}
