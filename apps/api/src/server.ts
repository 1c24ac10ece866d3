/**
 * ─────────────────────────────────────────────────────────
 *  placeholder-api
 *  Stack: Node.js + TypeScript + Express + PostgreSQL (pg)
 * ─────────────────────────────────────────────────────────
 *
 *  Startup order (see bootstrap.ts):
 *  1. Load .env (or ENV_FILE) and validate configuration
 *  2. Connect to Postgres, create tables in development, log the schema
 *  3. Only then start accepting HTTP traffic
 */

import path from "node:path";
import { config as loadEnv } from "dotenv";
import { bootstrap } from "./bootstrap";

loadEnv({ path: path.resolve(process.cwd(), process.env.ENV_FILE?.trim() || ".env") });

bootstrap({ env: process.env, exit: (code) => process.exit(code) })
  .then((running) => {
    if (!running) return;
    process.on("SIGTERM", () => running.shutdown("SIGTERM"));
    process.on("SIGINT", () => running.shutdown("SIGINT"));
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
