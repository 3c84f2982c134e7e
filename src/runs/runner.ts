/**
 * Caller-facing invocation of the email assistant graph.
 *
 * A run is one `graph.invoke()` on a thread. It either completes, fails
 * with a typed error, or stops at a reviewer interrupt, in which case the
 * checkpointer holds the suspended state until `resume()` supplies the
 * reviewer's answer through `Command({ resume })`.
 *
 * The runner reads the outcome back from the checkpointer after every
 * invoke so completed and interrupted runs are reported the same way.
 */

import {
  HumanMessage,
  isAIMessage,
  AIMessageChunk,
  isBaseMessage,
  isToolMessage,
  type BaseMessage,
} from "@langchain/core/messages";
import { Command, type LangGraphRunnableConfig } from "@langchain/langgraph";

import type { EmailAssistantGraph } from "../graphs/email-assistant/agent";
import {
  NoPendingInterruptError,
  ThreadBusyError,
} from "../graphs/email-assistant/errors";
import {
  asReviewRequest,
  assertDecisionPermitted,
  parseReviewDecision,
} from "../graphs/email-assistant/review";
import {
  CLASSIFICATION_DECISIONS,
  EmailInputSchema,
  type ClassificationDecision,
  type EmailAssistantUpdate,
  type EmailInput,
} from "../graphs/email-assistant/schemas";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunInput = { email: EmailInput } | { message: string };

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface SerializedToolCall {
  id: string | null;
  name: string;
  args: Record<string, unknown>;
}

export interface SerializedMessage {
  id: string | null;
  role: MessageRole;
  content: string;
  tool_calls?: SerializedToolCall[];
  tool_call_id?: string;
  name?: string;
}

export interface PendingInterrupt {
  id: string | null;
  value: unknown;
}

interface RunOutcomeBase {
  thread_id: string;
  classification: ClassificationDecision | null;
  messages: SerializedMessage[];
}

export type RunOutcome =
  | (RunOutcomeBase & { status: "completed" })
  | (RunOutcomeBase & { status: "interrupted"; interrupts: PendingInterrupt[] });

export interface ThreadSnapshot {
  thread_id: string;
  values: {
    email_input: EmailInput | null;
    classification: ClassificationDecision | null;
    triage_reasoning: string;
    loop_phase: string;
    turns: number;
    messages: SerializedMessage[];
  };
  /** Nodes scheduled to run next; empty when the thread is idle. */
  next: string[];
  interrupts: PendingInterrupt[];
}

export interface RunnerOptions {
  /** Model turns allowed per response loop; sizes the recursion limit. */
  maxIterations: number;
}

/** Graph steps outside the response loop: triage, review and one spare. */
const RECURSION_MARGIN = 5;

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

const ROLE_BY_TYPE: Record<string, MessageRole> = {
  human: "user",
  ai: "assistant",
  system: "system",
  tool: "tool",
};

function contentToText(content: BaseMessage["content"]): string {
  return typeof content === "string" ? content : JSON.stringify(content);
}

export function serializeMessage(message: BaseMessage): SerializedMessage {
  const serialized: SerializedMessage = {
    id: message.id ?? null,
    role: ROLE_BY_TYPE[message.getType()] ?? "user",
    content: contentToText(message.content),
  };

  if (isAIMessage(message) || AIMessageChunk.isInstance(message)) {
    const calls = message.tool_calls ?? [];
    if (calls.length > 0) {
      serialized.tool_calls = calls.map((call) => ({
        id: call.id ?? null,
        name: call.name,
        args: { ...call.args },
      }));
    }
  }

  if (isToolMessage(message)) {
    serialized.tool_call_id = message.tool_call_id;
    if (message.name) {
      serialized.name = message.name;
    }
  }

  return serialized;
}

function readMessages(value: unknown): BaseMessage[] {
  return Array.isArray(value) ? value.filter(isBaseMessage) : [];
}

function readClassification(value: unknown): ClassificationDecision | null {
  return CLASSIFICATION_DECISIONS.find((decision) => decision === value) ?? null;
}

function readEmail(value: unknown): EmailInput | null {
  const parsed = EmailInputSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export class EmailAssistantRunner {
  /** Threads with an invoke in flight in this process. */
  private readonly activeThreads = new Set<string>();

  constructor(
    private readonly graph: EmailAssistantGraph,
    private readonly options: RunnerOptions,
  ) {}

  get recursionLimit(): number {
    return this.options.maxIterations * 2 + RECURSION_MARGIN;
  }

  /**
   * Start a run. An email goes through triage; a raw message goes
   * straight to the response loop.
   *
   * @throws ThreadBusyError when the thread is running or awaiting review.
   */
  async submit(
    threadId: string,
    input: RunInput,
    configurable: Record<string, unknown> = {},
  ): Promise<RunOutcome> {
    return this.exclusive(threadId, async () => {
      const pending = await this.pendingInterrupts(threadId);
      if (pending.length > 0) {
        throw new ThreadBusyError(threadId);
      }

      const update: EmailAssistantUpdate =
        "email" in input
          ? {
              emailInput: input.email,
              classification: null,
              triageReasoning: "",
              triageNext: "end",
              loopPhase: "awaiting_model",
              turns: 0,
            }
          : {
              emailInput: null,
              messages: [new HumanMessage(input.message)],
              loopPhase: "awaiting_model",
              turns: 0,
            };

      console.info(
        `[runner] submit thread=${threadId} input=${"email" in input ? "email" : "message"}`,
      );
      await this.graph.invoke(update, this.runConfig(threadId, configurable));
      return this.outcome(threadId);
    });
  }

  /**
   * Answer the pending interrupt of a suspended thread.
   *
   * @throws NoPendingInterruptError when nothing is waiting for input.
   * @throws ReviewDecisionError when the value is malformed or not allowed
   *   by the pending review request.
   */
  async resume(
    threadId: string,
    value: unknown,
    configurable: Record<string, unknown> = {},
  ): Promise<RunOutcome> {
    return this.exclusive(threadId, async () => {
      const pending = await this.pendingInterrupts(threadId);
      const current = pending[0];
      if (current === undefined) {
        throw new NoPendingInterruptError(threadId);
      }

      const request = asReviewRequest(current.value);
      if (request !== null) {
        assertDecisionPermitted(request, parseReviewDecision(value));
      }

      console.info(`[runner] resume thread=${threadId}`);
      await this.graph.invoke(
        new Command({ resume: value }),
        this.runConfig(threadId, configurable),
      );
      return this.outcome(threadId);
    });
  }

  async getThreadState(threadId: string): Promise<ThreadSnapshot> {
    const snapshot = await this.graph.getState(this.runConfig(threadId));
    const values: Record<string, unknown> = { ...snapshot.values };

    return {
      thread_id: threadId,
      values: {
        email_input: readEmail(values.emailInput),
        classification: readClassification(values.classification),
        triage_reasoning:
          typeof values.triageReasoning === "string" ? values.triageReasoning : "",
        loop_phase: typeof values.loopPhase === "string" ? values.loopPhase : "awaiting_model",
        turns: typeof values.turns === "number" ? values.turns : 0,
        messages: readMessages(values.messages).map(serializeMessage),
      },
      next: [...snapshot.next],
      interrupts: snapshot.tasks.flatMap((task) =>
        task.interrupts.map((item) => ({ id: item.id ?? null, value: item.value })),
      ),
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private runConfig(
    threadId: string,
    configurable: Record<string, unknown> = {},
  ): LangGraphRunnableConfig {
    return {
      configurable: { ...configurable, thread_id: threadId },
      recursionLimit: this.recursionLimit,
    };
  }

  private async pendingInterrupts(threadId: string): Promise<PendingInterrupt[]> {
    const state = await this.getThreadState(threadId);
    return state.interrupts;
  }

  private async outcome(threadId: string): Promise<RunOutcome> {
    const state = await this.getThreadState(threadId);
    const base: RunOutcomeBase = {
      thread_id: threadId,
      classification: state.values.classification,
      messages: state.values.messages,
    };
    if (state.interrupts.length > 0) {
      console.info(
        `[runner] thread=${threadId} interrupted, awaiting review`,
      );
      return { ...base, status: "interrupted", interrupts: state.interrupts };
    }
    return { ...base, status: "completed" };
  }

  private async exclusive<T>(threadId: string, work: () => Promise<T>): Promise<T> {
    if (this.activeThreads.has(threadId)) {
      throw new ThreadBusyError(threadId);
    }
    this.activeThreads.add(threadId);
    try {
      return await work();
    } finally {
      this.activeThreads.delete(threadId);
    }
  }
}
