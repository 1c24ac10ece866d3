import express, { type Express, type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import helmet from "helmet";
import type { ErrorBody } from "@placeholder-api/types";
import type { Logger } from "./logger";
import { createRouter, type TodoUserSource } from "./routes";

export interface AppDeps {
  client: TodoUserSource;
  logger: Logger;
}

export const createApp = ({ client, logger }: AppDeps): Express => {
  const log = logger.child({ component: "http" });
  const app = express();

  app.use(helmet()); // secure HTTP headers
  app.use(compression());

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      log.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  });

  app.use(createRouter(client));

  app.use((_req: Request, res: Response<ErrorBody>) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response<ErrorBody>, _next: NextFunction) => {
    log.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
};
