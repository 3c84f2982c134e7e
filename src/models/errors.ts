/**
 * Error response shapes.
 *
 *   { "detail": "Error message describing what went wrong.", "kind": "thread_busy" }
 */

import type { EmailAssistantErrorKind } from "../graphs/email-assistant/errors";

/**
 * Every non-2xx JSON response uses this shape. `kind` is set when the
 * failure is one of the assistant's typed errors.
 */
export interface ErrorResponse {
  detail: string;
  kind?: EmailAssistantErrorKind;
}

/**
 * 422 responses for request bodies that fail validation.
 */
export interface ValidationErrorResponse extends ErrorResponse {
  errors?: FieldError[];
}

export interface FieldError {
  /** Dotted path to the invalid field (e.g., "email.author"). */
  field: string;
  message: string;
}
