/**
 * Tests for the pattern-matching Router.
 *
 * Covers:
 *   - Static and parameterized route matching
 *   - 404 for unknown paths, 405 for a known path with another method
 *   - Error boundary: typed errors keep their status, others become 500
 *   - Query parameter forwarding
 *   - splitPath and matchSegments utilities
 */

import { describe, expect, test, vi } from "vitest";

import { Router, splitPath, matchSegments } from "../src/router";
import { jsonResponse } from "../src/routes/helpers";
import { ThreadBusyError } from "../src/graphs/email-assistant/errors";

function makeRequest(path: string, method = "GET"): Request {
  return new Request(`http://localhost:3000${path}`, { method });
}

// ---------------------------------------------------------------------------
// splitPath
// ---------------------------------------------------------------------------

describe("splitPath", () => {
  test("root path returns empty array", () => {
    expect(splitPath("/")).toEqual([]);
  });

  test("strips trailing slash", () => {
    expect(splitPath("/health/")).toEqual(["health"]);
  });

  test("handles double slashes", () => {
    expect(splitPath("/threads//abc")).toEqual(["threads", "abc"]);
  });

  test("parameterized pattern", () => {
    expect(splitPath("/threads/:thread_id/resume")).toEqual([
      "threads",
      ":thread_id",
      "resume",
    ]);
  });
});

// ---------------------------------------------------------------------------
// matchSegments
// ---------------------------------------------------------------------------

describe("matchSegments", () => {
  test("captures parameters", () => {
    expect(matchSegments(["threads", ":thread_id"], ["threads", "abc"])).toEqual({
      thread_id: "abc",
    });
  });

  test("decodes percent-encoded values", () => {
    expect(matchSegments(["threads", ":thread_id"], ["threads", "a%20b"])).toEqual({
      thread_id: "a b",
    });
  });

  test("length mismatch returns null", () => {
    expect(matchSegments(["threads", ":id"], ["threads"])).toBeNull();
  });

  test("static mismatch returns null", () => {
    expect(matchSegments(["threads", ":id"], ["runs", "abc"])).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Router.handle
// ---------------------------------------------------------------------------

describe("Router", () => {
  test("dispatches to the matching handler with params", async () => {
    const router = new Router();
    router.get("/threads/:thread_id/state", (_req, params) =>
      jsonResponse({ thread: params.thread_id }),
    );

    const response = await router.handle(makeRequest("/threads/t-1/state/"));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ thread: "t-1" });
  });

  test("forwards query parameters", async () => {
    const router = new Router();
    router.get("/state", (_req, _params, query) =>
      jsonResponse({ graph: query.get("graph_id") }),
    );

    const response = await router.handle(makeRequest("/state?graph_id=email_assistant_hitl"));
    expect(await response.json()).toEqual({ graph: "email_assistant_hitl" });
  });

  test("unknown path returns 404", async () => {
    const router = new Router();
    const response = await router.handle(makeRequest("/nope"));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: "Not found" });
  });

  test("known path with another method returns 405", async () => {
    const router = new Router();
    router.get("/health", () => jsonResponse({ status: "ok" }));
    const response = await router.handle(makeRequest("/health", "POST"));
    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({ detail: "Method not allowed" });
  });

  test("unsupported method returns 405", async () => {
    const router = new Router();
    router.get("/health", () => jsonResponse({ status: "ok" }));
    const response = await router.handle(makeRequest("/health", "OPTIONS"));
    expect(response.status).toBe(405);
  });

  test("typed errors keep their status and kind", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const router = new Router();
    router.post("/threads/:thread_id/runs", (_req, params) => {
      throw new ThreadBusyError(params.thread_id);
    });

    const response = await router.handle(makeRequest("/threads/t-7/runs", "POST"));
    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      detail: "Thread t-7 is waiting for review input; resume it before submitting new input",
      kind: "thread_busy",
    });
  });

  test("untyped errors become 500", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const router = new Router();
    router.get("/boom", async () => {
      throw new Error("kaboom");
    });

    const response = await router.handle(makeRequest("/boom"));
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "kaboom" });
  });

  test("routeCount counts registered routes", () => {
    const router = new Router();
    router.get("/a", () => jsonResponse({})).post("/b/:id", () => jsonResponse({}));
    expect(router.routeCount).toBe(2);
  });

  test("first matching route wins", async () => {
    const router = new Router();
    router
      .get("/threads/:thread_id", () => jsonResponse({ route: "param" }))
      .get("/threads/latest", () => jsonResponse({ route: "static" }));

    const response = await router.handle(makeRequest("/threads/latest"));
    expect(await response.json()).toEqual({ route: "param" });
  });
});
