import { z } from "zod";

// ─── Configuration ────────────────────────────────────────
// Built once in server.ts and handed to whoever needs it.
// Nothing below the entry point reads process.env directly.

export const REQUIRED_ENV = [
  "DB_HOST",
  "DB_PORT",
  "DB_NAME",
  "DB_USER",
  "DB_PASSWORD",
  "DB_SCHEMA",
] as const;

export const DEFAULT_PLACEHOLDER_API_URL = "https://jsonplaceholder.typicode.com";

export type Env = Record<string, string | undefined>;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  schema: string;
  connectionString: string;
}

export interface AppConfig {
  env: string;
  isDevelopment: boolean;
  port: number;
  logLevel: LogLevel;
  placeholderApiUrl: string;
  db: Readonly<DbConfig>;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly missing: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const portSchema = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z.object({
  DB_HOST: z.string(),
  DB_PORT: portSchema,
  DB_NAME: z.string(),
  DB_USER: z.string(),
  DB_PASSWORD: z.string(),
  DB_SCHEMA: z.string(),
  PORT: portSchema.default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  NODE_ENV: z.string().default("development"),
  PLACEHOLDER_API_URL: z.string().url().default(DEFAULT_PLACEHOLDER_API_URL),
});

const isBlank = (value: string | undefined): boolean => !value || !value.trim();

const formatHost = (host: string): string =>
  host.includes(":") && !host.startsWith("[") ? `[${host}]` : host; // IPv6 literal

/**
 * libpq-style URL. A host starting with "/" is a unix-socket directory and
 * has no place in the authority, so it travels as `?host=` instead.
 */
export const buildConnectionString = (db: Omit<DbConfig, "connectionString" | "schema">): string => {
  const auth = `${encodeURIComponent(db.user)}:${encodeURIComponent(db.password)}`;
  const database = encodeURIComponent(db.database);

  if (db.host.startsWith("/")) {
    return `postgresql://${auth}@/${database}?host=${encodeURIComponent(db.host)}&port=${db.port}`;
  }
  return `postgresql://${auth}@${formatHost(db.host)}:${db.port}/${database}`;
};

/** Connection string with the password masked, for logs. */
// The password is URI-encoded, so it holds no "@"
export const redactConnectionString = (connectionString: string): string =>
  connectionString.replace(/^(postgresql:\/\/[^:@/]*:)[^@]*@/, "$1***@");

/**
 * Validates the environment and returns a frozen config.
 *
 * Every missing variable is reported in a single error rather than stopping
 * at the first one, so an operator can fix the env file in one pass.
 */
export function loadConfig(env: Env): AppConfig {
  const missing = REQUIRED_ENV.filter((name) => isBlank(env[name]));
  if (missing.length) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}. ` +
        "Please ensure all required environment variables are set in the .env file.",
      missing,
    );
  }

  // Blank optional values fall back to their defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => !isBlank(value)),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment variables: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  const db = {
    host: e.DB_HOST.trim(),
    port: e.DB_PORT,
    database: e.DB_NAME.trim(),
    user: e.DB_USER.trim(),
    password: e.DB_PASSWORD,
    schema: e.DB_SCHEMA.trim(),
  };

  return Object.freeze({
    env: e.NODE_ENV,
    isDevelopment: e.NODE_ENV === "development",
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    placeholderApiUrl: e.PLACEHOLDER_API_URL.replace(/\/+$/, ""),
    db: Object.freeze({ ...db, connectionString: buildConnectionString(db) }),
  });
}
