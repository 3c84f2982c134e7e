/**
 * Tests for shared request/response helpers.
 */

import { describe, expect, test } from "vitest";
import { z } from "zod";

import {
  errorFromException,
  errorResponse,
  jsonResponse,
  parseBody,
  requireBody,
  validationError,
} from "../src/routes/helpers";
import {
  ClassificationContractError,
  IterationLimitError,
  NoPendingInterruptError,
  ReviewDecisionError,
} from "../src/graphs/email-assistant/errors";

function makeJsonRequest(body: string, contentType = "application/json"): Request {
  return new Request("http://localhost:3000/test", {
    method: "POST",
    headers: { "Content-Type": contentType },
    body,
  });
}

const BodySchema = z.object({ name: z.string().min(1) });

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

describe("jsonResponse", () => {
  test("serializes with JSON content type and custom headers", async () => {
    const response = jsonResponse({ ok: true }, 201, { "X-Trace": "abc" });
    expect(response.status).toBe(201);
    expect(response.headers.get("Content-Type")).toBe("application/json");
    expect(response.headers.get("X-Trace")).toBe("abc");
    expect(await response.json()).toEqual({ ok: true });
  });
});

describe("errorResponse", () => {
  test("omits kind when not given", async () => {
    const response = errorResponse("Broken");
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Broken" });
  });
});

describe("validationError", () => {
  test("includes field errors only when present", async () => {
    expect(await validationError("Bad").json()).toEqual({ detail: "Bad" });
    expect(
      await validationError("Bad", [{ field: "email.to", message: "Required" }]).json(),
    ).toEqual({ detail: "Bad", errors: [{ field: "email.to", message: "Required" }] });
  });
});

describe("errorFromException", () => {
  test.each([
    [new ClassificationContractError("bad label", "urgent"), 502, "classification_contract"],
    [new IterationLimitError(3), 500, "iteration_limit"],
    [new ReviewDecisionError("nope"), 422, "invalid_review"],
    [new NoPendingInterruptError("t1"), 409, "no_pending_interrupt"],
  ])("maps %s to its status", async (error, status, kind) => {
    const response = errorFromException(error);
    expect(response.status).toBe(status);
    expect(await response.json()).toEqual({ detail: error.message, kind });
  });

  test("non-Error values become a generic 500", async () => {
    const response = errorFromException("string thrown");
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ detail: "Internal server error" });
  });
});

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

describe("parseBody", () => {
  test("returns parsed JSON", async () => {
    expect(await parseBody(makeJsonRequest('{"a":1}'))).toEqual({ a: 1 });
  });

  test("returns null for invalid JSON", async () => {
    expect(await parseBody(makeJsonRequest("{not json"))).toBeNull();
  });

  test("returns null for an empty body", async () => {
    expect(await parseBody(makeJsonRequest(""))).toBeNull();
  });
});

describe("requireBody", () => {
  test("accepts a valid body", async () => {
    const result = await requireBody(makeJsonRequest('{"name":"robin"}'), BodySchema);
    expect(result).toEqual({ ok: true, body: { name: "robin" } });
  });

  test("rejects a non-JSON content type", async () => {
    const result = await requireBody(makeJsonRequest("{}", "text/plain"), BodySchema);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.response.status).toBe(422);
      expect(await result.response.json()).toEqual({
        detail: "Content-Type must be application/json",
      });
    }
  });

  test("rejects malformed JSON", async () => {
    const result = await requireBody(makeJsonRequest("{oops"), BodySchema);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(await result.response.json()).toEqual({
        detail: "Request body must be valid JSON",
      });
    }
  });

  test("lists schema issues by field", async () => {
    const result = await requireBody(makeJsonRequest('{"name":""}'), BodySchema);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(await result.response.json()).toEqual({
        detail: "Invalid request body",
        errors: [
          { field: "name", message: "String must contain at least 1 character(s)" },
        ],
      });
    }
  });
});
