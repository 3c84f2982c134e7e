/**
 * Data model for the email assistant graph: email input, triage output,
 * and the LangGraph state annotation shared by every node.
 */

import { Annotation, MessagesAnnotation } from "@langchain/langgraph";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Email input
// ---------------------------------------------------------------------------

/**
 * Incoming email as submitted by the caller. `author` and `to` are
 * required; subject and thread body may legitimately be empty.
 */
export const EmailInputSchema = z.object({
  author: z.string().min(1, "author is required"),
  to: z.string().min(1, "to is required"),
  subject: z.string().default(""),
  email_thread: z.string().default(""),
});

export type EmailInput = z.infer<typeof EmailInputSchema>;

// ---------------------------------------------------------------------------
// Triage
// ---------------------------------------------------------------------------

export const CLASSIFICATION_DECISIONS = ["respond", "ignore", "notify"] as const;

export type ClassificationDecision = (typeof CLASSIFICATION_DECISIONS)[number];

/**
 * Structured output requested from the triage model.
 */
export const RouterSchema = z.object({
  reasoning: z
    .string()
    .describe("Step-by-step reasoning behind the classification."),
  classification: z
    .enum(CLASSIFICATION_DECISIONS)
    .describe(
      "The classification of an email: 'ignore' for irrelevant emails, " +
        "'notify' for important information that doesn't need a response, " +
        "'respond' for emails that need a reply",
    ),
});

export type RouterOutput = z.infer<typeof RouterSchema>;

/**
 * Where control goes once triage has decided.
 */
export type TriageStage = "response_agent" | "notify_review" | "end";

// ---------------------------------------------------------------------------
// Response loop
// ---------------------------------------------------------------------------

export type LoopPhase = "awaiting_model" | "awaiting_tool_results" | "done";

// ---------------------------------------------------------------------------
// Graph state
// ---------------------------------------------------------------------------

function replace<T>(_previous: T, next: T): T {
  return next;
}

/**
 * Run state for one thread. `messages` uses LangGraph's append/replace-by-id
 * reducer; every other channel is last-write-wins.
 */
export const EmailAssistantAnnotation = Annotation.Root({
  ...MessagesAnnotation.spec,

  /** Email under triage; null when the run started from a raw message. */
  emailInput: Annotation<EmailInput | null>({
    reducer: replace,
    default: () => null,
  }),

  classification: Annotation<ClassificationDecision | null>({
    reducer: replace,
    default: () => null,
  }),

  triageReasoning: Annotation<string>({
    reducer: replace,
    default: () => "",
  }),

  triageNext: Annotation<TriageStage>({
    reducer: replace,
    default: () => "end",
  }),

  loopPhase: Annotation<LoopPhase>({
    reducer: replace,
    default: () => "awaiting_model",
  }),

  /** Model turns taken by the response loop in this run. */
  turns: Annotation<number>({
    reducer: replace,
    default: () => 0,
  }),
});

export type EmailAssistantState = typeof EmailAssistantAnnotation.State;
export type EmailAssistantUpdate = typeof EmailAssistantAnnotation.Update;
