/**
 * Shared request/response helpers.
 *
 * Every HTTP response flows through these helpers so Content-Type headers,
 * status codes and error shapes stay consistent:
 *   { "detail": "Error message describing what went wrong.", "kind"?: "..." }
 */

import type { z } from "zod";

import {
  isEmailAssistantError,
  type EmailAssistantErrorKind,
} from "../graphs/email-assistant/errors";
import type { ErrorResponse, ValidationErrorResponse, FieldError } from "../models/errors";

// ---------------------------------------------------------------------------
// Success responses
// ---------------------------------------------------------------------------

/**
 * Create a JSON response with the given data and status code.
 *
 * @param data - Serializable value to send as JSON.
 * @param status - HTTP status code (default 200).
 * @param headers - Additional headers to merge into the response.
 */
export function jsonResponse(
  data: unknown,
  status = 200,
  headers?: Record<string, string>,
): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  });
}

// ---------------------------------------------------------------------------
// Error responses
// ---------------------------------------------------------------------------

/**
 * Create a JSON error response.
 *
 * @param detail - Human-readable error message.
 * @param status - HTTP status code (default 500).
 * @param kind - Typed failure kind, when there is one.
 */
export function errorResponse(
  detail: string,
  status = 500,
  kind?: EmailAssistantErrorKind,
): Response {
  const body: ErrorResponse = kind ? { detail, kind } : { detail };
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * 404 Not Found response.
 *
 * @param detail - Optional custom message (default "Not found").
 */
export function notFound(detail = "Not found"): Response {
  return errorResponse(detail, 404);
}

/**
 * 405 Method Not Allowed response.
 *
 * @param detail - Optional custom message (default "Method not allowed").
 */
export function methodNotAllowed(detail = "Method not allowed"): Response {
  return errorResponse(detail, 405);
}

/**
 * 422 Validation Error response.
 *
 * Returns the standard ErrorResponse shape. When field-level errors are
 * provided, they are included as an `errors` array for client debugging.
 *
 * @param detail - Top-level validation error message.
 * @param errors - Optional per-field validation errors.
 */
export function validationError(
  detail: string,
  errors?: FieldError[],
): Response {
  const body: ValidationErrorResponse = { detail };
  if (errors && errors.length > 0) {
    body.errors = errors;
  }
  return new Response(JSON.stringify(body), {
    status: 422,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * HTTP status for each typed failure. Model contract failures are the
 * upstream model's fault, so they map to 502.
 */
export const STATUS_BY_ERROR_KIND: Record<EmailAssistantErrorKind, number> = {
  classification_contract: 502,
  protocol_violation: 502,
  tool_dispatch: 502,
  tool_arguments: 502,
  tool_execution: 500,
  iteration_limit: 500,
  invalid_review: 422,
  thread_busy: 409,
  no_pending_interrupt: 409,
};

/**
 * Map a thrown value to an error response.
 */
export function errorFromException(error: unknown): Response {
  if (isEmailAssistantError(error)) {
    return errorResponse(error.message, STATUS_BY_ERROR_KIND[error.kind], error.kind);
  }
  const message = error instanceof Error ? error.message : "Internal server error";
  return errorResponse(message, 500);
}

/**
 * 422 response listing every zod issue as a field error.
 */
export function zodValidationError(detail: string, error: z.ZodError): Response {
  return validationError(
    detail,
    error.issues.map((issue) => ({
      field: issue.path.length > 0 ? issue.path.join(".") : "body",
      message: issue.message,
    })),
  );
}

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

/**
 * Parse the JSON body of a request.
 *
 * @returns The parsed value, or `null` if the body is empty or not JSON.
 */
export async function parseBody(request: Request): Promise<unknown> {
  try {
    const text = await request.text();
    if (text.length === 0) {
      return null;
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return null;
  }
}

export type BodyResult<T> =
  | { ok: true; body: T }
  | { ok: false; response: Response };

/**
 * Parse and validate a required JSON body.
 *
 * Missing, malformed or invalid bodies produce a 422 response.
 */
export async function requireBody<S extends z.ZodTypeAny>(
  request: Request,
  schema: S,
): Promise<BodyResult<z.output<S>>> {
  const contentType = request.headers.get("Content-Type") || "";
  if (!contentType.includes("application/json")) {
    return {
      ok: false,
      response: validationError("Content-Type must be application/json"),
    };
  }

  const body = await parseBody(request);
  if (body === null) {
    return { ok: false, response: validationError("Request body must be valid JSON") };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      response: zodValidationError("Invalid request body", parsed.error),
    };
  }
  return { ok: true, body: parsed.data };
}
