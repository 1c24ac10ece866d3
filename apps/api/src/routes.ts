import { Router, type Request, type Response, type NextFunction } from "express";
import { z } from "zod";
import type { ErrorBody, HealthStatus, Todo, UsersResponse } from "@placeholder-api/types";
import type { PlaceholderClient } from "./placeholder";

export type TodoUserSource = Pick<PlaceholderClient, "fetchTodos" | "fetchUsers">;

// ?count=true|false, case-insensitive; absent or empty means false
const CountQuery = z
  .string()
  .regex(/^(true|false)?$/i)
  .transform((v) => v.toLowerCase() === "true")
  .optional();

export const createRouter = (client: TodoUserSource): Router => {
  const router = Router();

  router.get("/health", (_req: Request, res: Response<HealthStatus>) => {
    res.json({
      status: "healthy",
      database: "connected",
      application: "running",
      timestamp: new Date().toISOString(),
    });
  });

  // Proxy todos as-is; no pagination
  router.get("/todos", async (_req: Request, res: Response<Todo[]>, next: NextFunction) => {
    try {
      res.json(await client.fetchTodos());
    } catch (err) {
      next(err);
    }
  });

  router.get("/users", async (req: Request, res: Response<UsersResponse | ErrorBody>, next: NextFunction) => {
    const count = CountQuery.safeParse(req.query.count);
    if (!count.success) {
      res.status(400).json({ error: "Invalid query parameter 'count': expected true or false" });
      return;
    }

    try {
      const users = await client.fetchUsers();
      const body: UsersResponse = count.data ? { count: users.length, users } : { users };
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
};
