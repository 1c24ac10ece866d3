import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp } from "../src/app";
import { PlaceholderClient } from "../src/placeholder";
import { captureLogger, messages, type LogLine } from "./helpers/logger";
import { startUpstream, type Upstream } from "./helpers/upstream";
import { todos, users } from "./fixtures";

let upstream: Upstream;
let app: Express;
let lines: LogLine[];

beforeAll(async () => {
  upstream = await startUpstream();
});

afterAll(async () => {
  await upstream.close();
});

beforeEach(() => {
  const captured = captureLogger();
  lines = captured.lines;
  app = createApp({ client: new PlaceholderClient(upstream.url, captured.logger), logger: captured.logger });
  upstream.hits.length = 0;
});

describe("GET /health", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("reports healthy with a timestamp that moves forward", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });

    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
    const first = await request(app).get("/health").expect(200);
    vi.setSystemTime(new Date("2026-03-01T10:00:01.500Z"));
    const second = await request(app).get("/health").expect(200);

    expect(first.body).toEqual({
      status: "healthy",
      database: "connected",
      application: "running",
      timestamp: "2026-03-01T10:00:00.000Z",
    });
    expect(second.body.timestamp).toBe("2026-03-01T10:00:01.500Z");
    expect(Date.parse(second.body.timestamp)).toBeGreaterThan(Date.parse(first.body.timestamp));
  });

  it("sets the helmet security headers", async () => {
    const res = await request(app).get("/health");
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
  });
});

describe("GET /todos", () => {
  it("returns the upstream records unmodified", async () => {
    upstream.reply("/todos", 200, todos);

    const res = await request(app).get("/todos").expect(200);

    expect(res.body).toEqual(todos);
    expect(upstream.hits).toEqual(["/todos"]);
  });

  it("answers 500 with no partial data when upstream fails", async () => {
    upstream.reply("/todos", 502, [todos[0]]);

    const res = await request(app).get("/todos").expect(500);

    expect(res.body).toEqual({ error: "Internal server error" });
    expect(messages(lines, "placeholder")).toEqual(["Error fetching todos from the placeholder API"]);
    expect(messages(lines, "http")).toContain("Unhandled error");
  });

  it("answers 500 when the upstream body is malformed", async () => {
    upstream.reply("/todos", 200, [{ id: "one", title: "x" }]);

    const res = await request(app).get("/todos").expect(500);

    expect(res.body).toEqual({ error: "Internal server error" });
    expect(messages(lines, "placeholder")).toEqual(["Error deserializing todos response"]);
  });
});

describe("GET /users", () => {
  beforeEach(() => {
    upstream.reply("/users", 200, users);
  });

  it("wraps users without a count by default", async () => {
    const res = await request(app).get("/users").expect(200);

    expect(res.body).toEqual({ users });
    expect(res.body).not.toHaveProperty("count");
  });

  it("adds the count when count=true", async () => {
    const res = await request(app).get("/users?count=true").expect(200);
    expect(res.body).toEqual({ count: 2, users });
  });

  it("treats the flag case-insensitively and honours count=false", async () => {
    await request(app).get("/users?count=TRUE").expect(200, { count: 2, users });
    await request(app).get("/users?count=false").expect(200, { users });
  });

  it("treats an empty count as absent", async () => {
    const res = await request(app).get("/users?count=").expect(200);
    expect(res.body).toEqual({ users });
  });

  it("rejects a count that is not a boolean without calling upstream", async () => {
    const res = await request(app).get("/users?count=yes").expect(400);

    expect(res.body).toEqual({ error: "Invalid query parameter 'count': expected true or false" });
    expect(upstream.hits).toEqual([]);
  });

  it("answers 500 when upstream fails", async () => {
    upstream.reply("/users", 500, {});

    const res = await request(app).get("/users?count=true").expect(500);
    expect(res.body).toEqual({ error: "Internal server error" });
  });
});

describe("request handling", () => {
  it("answers unknown routes with 404", async () => {
    await request(app).get("/nope").expect(404, { error: "Not found" });
  });

  it("logs one line per finished request", async () => {
    await request(app).get("/health").expect(200);

    const access = lines.filter((l) => l.component === "http" && l.method === "GET");
    expect(access).toHaveLength(1);
    expect(access[0]).toMatchObject({ method: "GET", path: "/health", status: 200 });
  });
});
