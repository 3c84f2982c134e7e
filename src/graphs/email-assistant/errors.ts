/**
 * Error taxonomy for the email assistant graph.
 *
 * Every failure the assistant raises on purpose carries a `kind`
 * discriminant so callers (the runner, the HTTP error boundary, tests) can
 * branch on the failure without string-matching messages.
 *
 *   classification_contract — triage model answered outside the label set
 *   tool_dispatch           — model requested a tool that is not registered
 *   tool_arguments          — tool arguments failed schema validation
 *   tool_execution          — a registered tool threw while running
 *   protocol_violation      — mandatory tool turn came back without a call
 *   iteration_limit         — response loop exceeded `max_iterations`
 *   invalid_review          — reviewer resume value was malformed/disallowed
 *   thread_busy             — thread is suspended waiting on a reviewer
 *   no_pending_interrupt    — resume requested with nothing to resume
 */

export type EmailAssistantErrorKind =
  | "classification_contract"
  | "tool_dispatch"
  | "tool_arguments"
  | "tool_execution"
  | "protocol_violation"
  | "iteration_limit"
  | "invalid_review"
  | "thread_busy"
  | "no_pending_interrupt";

/**
 * Base class for all intentional email assistant failures.
 */
export abstract class EmailAssistantError extends Error {
  abstract readonly kind: EmailAssistantErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ClassificationContractError extends EmailAssistantError {
  readonly kind = "classification_contract";

  constructor(
    message: string,
    readonly received: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ToolDispatchError extends EmailAssistantError {
  readonly kind = "tool_dispatch";

  constructor(
    readonly toolName: string,
    readonly callId: string,
  ) {
    super(`Unknown tool "${toolName}" requested (call ${callId})`);
  }
}

export class ToolArgumentError extends EmailAssistantError {
  readonly kind = "tool_arguments";

  constructor(
    readonly toolName: string,
    readonly callId: string,
    readonly issues: string[],
  ) {
    super(
      `Invalid arguments for tool "${toolName}" (call ${callId}): ${issues.join("; ")}`,
    );
  }
}

export class ToolExecutionError extends EmailAssistantError {
  readonly kind = "tool_execution";

  constructor(
    readonly toolName: string,
    readonly callId: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Tool "${toolName}" failed (call ${callId}): ${reason}`, { cause });
  }
}

export class ProtocolViolationError extends EmailAssistantError {
  readonly kind = "protocol_violation";
}

export class IterationLimitError extends EmailAssistantError {
  readonly kind = "iteration_limit";

  constructor(readonly maxIterations: number) {
    super(
      `Response loop exceeded ${maxIterations} model turns without calling Done`,
    );
  }
}

export class ReviewDecisionError extends EmailAssistantError {
  readonly kind = "invalid_review";
}

export class ThreadBusyError extends EmailAssistantError {
  readonly kind = "thread_busy";

  constructor(readonly threadId: string) {
    super(
      `Thread ${threadId} is waiting for review input; resume it before submitting new input`,
    );
  }
}

export class NoPendingInterruptError extends EmailAssistantError {
  readonly kind = "no_pending_interrupt";

  constructor(readonly threadId: string) {
    super(`Thread ${threadId} has no pending interrupt to resume`);
  }
}

/**
 * Narrow an unknown thrown value to an `EmailAssistantError`.
 */
export function isEmailAssistantError(
  error: unknown,
): error is EmailAssistantError {
  return error instanceof EmailAssistantError;
}
