import axios, { type AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import type { Todo, User } from "@placeholder-api/types";
import type { Logger } from "./logger";

// ─── Wire schemas ─────────────────────────────────────────
// Unknown keys are stripped so responses carry exactly these shapes.
export const TodoSchema: z.ZodType<Todo> = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  title: z.string().min(1),
  completed: z.boolean(),
});

export const UserSchema: z.ZodType<User> = z.object({
  id: z.number().int(),
  name: z.string().nullish(),
  username: z.string().nullish(),
  email: z.string().nullish(),
});

export type Resource = "todos" | "users";

export class UpstreamError extends Error {
  constructor(
    readonly resource: Resource,
    readonly kind: "transport" | "parse",
    readonly status: number | undefined,
    options: { cause: unknown },
  ) {
    super(
      kind === "parse"
        ? `Malformed ${resource} response from the placeholder API`
        : `Failed to fetch ${resource} from the placeholder API` + (status ? ` (HTTP ${status})` : ""),
      options,
    );
    this.name = "UpstreamError";
  }
}

/**
 * Thin client for the JSONPlaceholder demo API. One axios instance is
 * shared by every request; it holds no per-request state.
 */
export class PlaceholderClient {
  private readonly http: AxiosInstance;
  private readonly log: Logger;

  constructor(baseURL: string, logger: Logger) {
    this.http = axios.create({ baseURL, headers: { accept: "application/json" } });
    this.log = logger.child({ component: "placeholder" });
  }

  fetchTodos(): Promise<Todo[]> {
    return this.fetchList("todos", TodoSchema);
  }

  fetchUsers(): Promise<User[]> {
    return this.fetchList("users", UserSchema);
  }

  private async fetchList<T>(resource: Resource, schema: z.ZodType<T>): Promise<T[]> {
    const url = `/${resource}`;

    let body: unknown;
    try {
      // Non-2xx rejects (axios default validateStatus)
      const res = await this.http.get<unknown>(url);
      body = res.data;
    } catch (err) {
      const status = isAxiosError(err) ? err.response?.status : undefined;
      this.log.error({ err, status, url }, `Error fetching ${resource} from the placeholder API`);
      throw new UpstreamError(resource, "transport", status, { cause: err });
    }

    const parsed = z.array(schema).safeParse(body);
    if (!parsed.success) {
      this.log.error({ issues: parsed.error.issues, url }, `Error deserializing ${resource} response`);
      throw new UpstreamError(resource, "parse", undefined, { cause: parsed.error });
    }
    return parsed.data;
  }
}
