/**
 * Human review of tool calls and notifications.
 *
 * Review requests follow the Agent Inbox interrupt shape so existing inbox
 * UIs can render them; the reviewer answers with a `ReviewDecision`.
 * `applyReviewDecision()` is a pure function from (tool, decision) to what
 * the tool handler should do next, so the suspend/resume path never depends
 * on captured call-stack state.
 */

import { z } from "zod";

import { formatEmailMarkdown, formatToolCallForDisplay } from "./email";
import { ReviewDecisionError } from "./errors";
import type { EmailInput } from "./schemas";
import { isEmailToolName, toolArgIssues } from "./tools";

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type ReviewAction = "accept" | "edit" | "ignore" | "response";

export interface ReviewPermissions {
  allow_accept: boolean;
  allow_edit: boolean;
  allow_respond: boolean;
  allow_ignore: boolean;
}

export interface ReviewRequest {
  action_request: {
    action: string;
    args: Record<string, unknown>;
  };
  config: ReviewPermissions;
  description: string;
}

/** Tools that pause for a reviewer before running. */
export const REVIEWED_TOOLS = ["write_email", "schedule_meeting", "Question"] as const;

export type ReviewedToolName = (typeof REVIEWED_TOOLS)[number];

export function isReviewedTool(name: string): name is ReviewedToolName {
  return (REVIEWED_TOOLS as readonly string[]).includes(name);
}

const TOOL_PERMISSIONS: Record<ReviewedToolName, ReviewPermissions> = {
  write_email: { allow_accept: true, allow_edit: true, allow_respond: true, allow_ignore: true },
  schedule_meeting: { allow_accept: true, allow_edit: true, allow_respond: true, allow_ignore: true },
  Question: { allow_accept: false, allow_edit: false, allow_respond: true, allow_ignore: true },
};

const NOTIFY_PERMISSIONS: ReviewPermissions = {
  allow_accept: false,
  allow_edit: false,
  allow_respond: true,
  allow_ignore: true,
};

export function buildToolReviewRequest(
  toolName: ReviewedToolName,
  args: Record<string, unknown>,
  email: EmailInput | null,
): ReviewRequest {
  const emailBlock = email ? formatEmailMarkdown(email) : "";
  return {
    action_request: { action: toolName, args },
    config: TOOL_PERMISSIONS[toolName],
    description: emailBlock + formatToolCallForDisplay(toolName, args),
  };
}

export function buildNotifyReviewRequest(email: EmailInput): ReviewRequest {
  return {
    action_request: {
      action: "Email Assistant: notify",
      args: {},
    },
    config: NOTIFY_PERMISSIONS,
    description: formatEmailMarkdown(email),
  };
}

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

const ReviewDecisionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("accept"), args: z.unknown().optional() }),
  z.object({
    type: z.literal("edit"),
    args: z.object({
      action: z.string().optional(),
      args: z.record(z.unknown()),
    }),
  }),
  z.object({ type: z.literal("ignore"), args: z.unknown().optional() }),
  z.object({ type: z.literal("response"), args: z.string().min(1) }),
]);

export type ReviewDecision = z.infer<typeof ReviewDecisionSchema>;

/**
 * Validate a resume value. Accepts a single decision or the one-element
 * array that Agent Inbox clients send.
 *
 * @throws ReviewDecisionError
 */
export function parseReviewDecision(value: unknown): ReviewDecision {
  const candidate = Array.isArray(value) && value.length === 1 ? value[0] : value;
  const parsed = ReviewDecisionSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ReviewDecisionError(`Invalid review decision: ${issues}`);
  }
  return parsed.data;
}

function assertAllowed(
  permissions: ReviewPermissions,
  action: ReviewAction,
  subject: string,
): void {
  const allowed: Record<ReviewAction, boolean> = {
    accept: permissions.allow_accept,
    edit: permissions.allow_edit,
    response: permissions.allow_respond,
    ignore: permissions.allow_ignore,
  };
  if (!allowed[action]) {
    throw new ReviewDecisionError(`Review action "${action}" is not allowed for ${subject}`);
  }
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type ReviewOutcome =
  /** Run the tool with these args; `edited` when the reviewer changed them. */
  | { kind: "execute"; args: Record<string, unknown>; edited: boolean }
  /** Skip the tool; the reviewer's text becomes its result. */
  | { kind: "feedback"; message: string }
  /** Skip the tool and end the response loop. */
  | { kind: "stop"; message: string };

const FEEDBACK_TEMPLATES: Record<ReviewedToolName, string> = {
  write_email: "User gave feedback, which we can incorporate into the email. Feedback: ",
  schedule_meeting:
    "User gave feedback, which we can incorporate into the meeting request. Feedback: ",
  Question: "User answered the question, which we can use for any follow up actions. Feedback: ",
};

const IGNORE_MESSAGES: Record<ReviewedToolName, string> = {
  write_email: "User ignored this email draft. Ignore this email and end the workflow.",
  schedule_meeting:
    "User ignored this calendar meeting draft. Ignore this email and end the workflow.",
  Question: "User ignored this question. Ignore this email and end the workflow.",
};

/**
 * Map a reviewer decision on a pending tool call to the handler's next step.
 *
 * @throws ReviewDecisionError when the action is not permitted for the tool.
 */
export function applyReviewDecision(
  toolName: ReviewedToolName,
  originalArgs: Record<string, unknown>,
  decision: ReviewDecision,
): ReviewOutcome {
  assertAllowed(TOOL_PERMISSIONS[toolName], decision.type, `tool "${toolName}"`);

  switch (decision.type) {
    case "accept":
      return { kind: "execute", args: originalArgs, edited: false };
    case "edit":
      return { kind: "execute", args: decision.args.args, edited: true };
    case "response":
      return { kind: "feedback", message: FEEDBACK_TEMPLATES[toolName] + decision.args };
    case "ignore":
      return { kind: "stop", message: IGNORE_MESSAGES[toolName] };
  }
}

export type NotifyOutcome =
  | { kind: "respond"; feedback: string }
  | { kind: "ignore" };

/**
 * Map a reviewer decision on a `notify` email.
 *
 * @throws ReviewDecisionError when the action is not permitted.
 */
export function applyNotifyDecision(decision: ReviewDecision): NotifyOutcome {
  assertAllowed(NOTIFY_PERMISSIONS, decision.type, "notifications");
  if (decision.type === "response") {
    return { kind: "respond", feedback: decision.args };
  }
  return { kind: "ignore" };
}

/** Result recorded for calls left unexecuted after a reviewer stopped the run. */
export const SKIPPED_AFTER_STOP_MESSAGE =
  "Skipped: the reviewer ended the workflow before this call ran.";

/**
 * Check a decision against the request it answers. A resume value that
 * reaches the graph is replayed on every later resume, so it must be one
 * the tool handler accepts.
 *
 * @throws ReviewDecisionError when the request does not allow the action,
 *   or when edited args do not fit the tool's schema.
 */
export function assertDecisionPermitted(
  request: ReviewRequest,
  decision: ReviewDecision,
): void {
  const action = request.action_request.action;
  assertAllowed(request.config, decision.type, `"${action}"`);

  if (decision.type === "edit" && isEmailToolName(action)) {
    const issues = toolArgIssues(action, decision.args.args);
    if (issues.length > 0) {
      throw new ReviewDecisionError(
        `Edited arguments for "${action}" are invalid: ${issues.join("; ")}`,
      );
    }
  }
}

const ReviewRequestSchema = z.object({
  action_request: z.object({ action: z.string(), args: z.record(z.unknown()) }),
  config: z.object({
    allow_accept: z.boolean(),
    allow_edit: z.boolean(),
    allow_respond: z.boolean(),
    allow_ignore: z.boolean(),
  }),
  description: z.string(),
});

/** Read a pending interrupt value back as a review request, if it is one. */
export function asReviewRequest(value: unknown): ReviewRequest | null {
  const parsed = ReviewRequestSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}
