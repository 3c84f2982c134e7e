/**
 * Tool-calling response loop.
 *
 * The loop alternates between two graph nodes:
 *
 *   llm_call      — the tool-bound model takes one turn; tool use is
 *                   mandatory, so a turn without a call is a protocol error.
 *   tool_handler  — every call of that turn is dispatched in emission order
 *                   and answered with a ToolMessage carrying its call id.
 *
 * Both nodes record the next phase in state via `advanceLoop()`, and the
 * graph's conditional edges read it back through `LOOP_ROUTES`. The loop
 * ends only after a batch that ran `Done` (or a reviewer stopped it).
 */

import {
  AIMessage,
  SystemMessage,
  ToolMessage,
  isAIMessage,
  AIMessageChunk,
  type BaseMessage,
} from "@langchain/core/messages";
import { END, interrupt, type LangGraphRunnableConfig } from "@langchain/langgraph";

import { getPrompt } from "../../infra/prompts";
import {
  IterationLimitError,
  ProtocolViolationError,
} from "./errors";
import { feedbackForToolDecision, type PreferenceFeedback } from "./memory";
import { HITL_TOOLS_PROMPT, PROMPT_NAMES, TOOLS_PROMPT } from "./prompts";
import {
  SKIPPED_AFTER_STOP_MESSAGE,
  applyReviewDecision,
  buildToolReviewRequest,
  isReviewedTool,
  parseReviewDecision,
  type ReviewRequest,
} from "./review";
import type { EmailAssistantState, EmailAssistantUpdate, LoopPhase } from "./schemas";
import { executeTool, isTerminalTool, type ToolRegistry } from "./tools";

// ---------------------------------------------------------------------------
// Model boundary
// ---------------------------------------------------------------------------

/**
 * A chat model after `bindTools(..., { tool_choice: "any" })`.
 */
export interface ToolCallingModel {
  invoke(messages: BaseMessage[]): Promise<BaseMessage>;
}

// ---------------------------------------------------------------------------
// Phase transitions
// ---------------------------------------------------------------------------

export type LoopEvent =
  | { type: "model_turn"; toolCallCount: number }
  | { type: "tools_executed"; terminal: boolean };

/**
 * @throws ProtocolViolationError when a model turn carries no tool call.
 */
export function advanceLoop(phase: LoopPhase, event: LoopEvent): LoopPhase {
  if (phase === "done") {
    return "done";
  }
  switch (event.type) {
    case "model_turn":
      if (event.toolCallCount === 0) {
        throw new ProtocolViolationError(
          "Model turn returned no tool call; tool use is mandatory in the response loop",
        );
      }
      return "awaiting_tool_results";
    case "tools_executed":
      return event.terminal ? "done" : "awaiting_model";
  }
}

/** Graph node (or END) that handles each loop phase. */
export const LOOP_ROUTES = {
  awaiting_model: "llm_call",
  awaiting_tool_results: "tool_handler",
  done: END,
} as const satisfies Record<LoopPhase, string>;

// ---------------------------------------------------------------------------
// Tool calls
// ---------------------------------------------------------------------------

export interface RequestedToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

/**
 * Tool calls carried by an AI message, in emission order.
 *
 * @throws ProtocolViolationError when a call has no id to link its result to.
 */
export function extractToolCalls(message: BaseMessage): RequestedToolCall[] {
  if (!isAIMessage(message) && !AIMessageChunk.isInstance(message)) {
    return [];
  }
  return (message.tool_calls ?? []).map((call) => {
    if (!call.id) {
      throw new ProtocolViolationError(
        `Tool call "${call.name}" has no call id`,
      );
    }
    return { id: call.id, name: call.name, args: { ...call.args } };
  });
}

// ---------------------------------------------------------------------------
// llm_call
// ---------------------------------------------------------------------------

export interface AgentPreferences {
  background: string;
  responsePreferences: string;
  calPreferences: string;
}

export interface LlmCallOptions {
  model: ToolCallingModel;
  hitl: boolean;
  maxIterations: number;
  loadPreferences: (config: LangGraphRunnableConfig) => Promise<AgentPreferences>;
  now?: () => Date;
}

export function createLlmCallNode(options: LlmCallOptions) {
  const now = options.now ?? (() => new Date());

  return async function llmCall(
    state: EmailAssistantState,
    config: LangGraphRunnableConfig,
  ): Promise<EmailAssistantUpdate> {
    if (state.turns >= options.maxIterations) {
      throw new IterationLimitError(options.maxIterations);
    }

    const preferences = await options.loadPreferences(config);
    const systemPrompt = getPrompt({
      name: options.hitl ? PROMPT_NAMES.agentSystemHitl : PROMPT_NAMES.agentSystem,
      configurable: config.configurable,
      variables: {
        tools_prompt: options.hitl ? HITL_TOOLS_PROMPT : TOOLS_PROMPT,
        today: now().toISOString().slice(0, 10),
        background: preferences.background,
        response_preferences: preferences.responsePreferences,
        cal_preferences: preferences.calPreferences,
      },
    });

    const response = await options.model.invoke([
      new SystemMessage(systemPrompt),
      ...state.messages,
    ]);
    const calls = extractToolCalls(response);
    const loopPhase = advanceLoop(state.loopPhase, {
      type: "model_turn",
      toolCallCount: calls.length,
    });

    console.info(
      `[response-loop] turn ${state.turns + 1}: ${calls.map((call) => call.name).join(", ")}`,
    );

    return { messages: [response], loopPhase, turns: state.turns + 1 };
  };
}

// ---------------------------------------------------------------------------
// tool_handler
// ---------------------------------------------------------------------------

export interface ToolHandlerOptions {
  registry: ToolRegistry;
  /** Pause reviewed tools for a human decision. */
  hitl: boolean;
  /**
   * Receives the node's feedback once every interrupt in it is answered.
   * Only called when there is something to record.
   */
  onFeedback?: (
    feedback: PreferenceFeedback[],
    config: LangGraphRunnableConfig,
  ) => Promise<void>;
}

function lastToolCallingMessage(messages: BaseMessage[]): {
  message: BaseMessage;
  calls: RequestedToolCall[];
} {
  const message = messages.at(-1);
  const calls = message ? extractToolCalls(message) : [];
  if (!message || calls.length === 0) {
    throw new ProtocolViolationError(
      "tool_handler reached without pending tool calls",
    );
  }
  return { message, calls };
}

export function createToolHandlerNode(options: ToolHandlerOptions) {
  const { registry } = options;

  return async function toolHandler(
    state: EmailAssistantState,
    config: LangGraphRunnableConfig,
  ): Promise<EmailAssistantUpdate> {
    const { message, calls } = lastToolCallingMessage(state.messages);

    // Reject the whole batch before any call runs.
    const tools = calls.map((call) => registry.require(call.name, call.id));

    const results: ToolMessage[] = [];
    const feedback: PreferenceFeedback[] = [];
    const editedArgs = new Map<string, Record<string, unknown>>();
    let terminal = false;
    let stopped = false;

    for (const [index, call] of calls.entries()) {
      const tool = tools[index];
      const reply = (content: string): void => {
        results.push(new ToolMessage({ content, tool_call_id: call.id, name: call.name }));
      };

      if (stopped) {
        reply(SKIPPED_AFTER_STOP_MESSAGE);
        continue;
      }

      if (!options.hitl || !isReviewedTool(call.name)) {
        reply(await executeTool(tool, call.args, call.id));
        terminal = terminal || isTerminalTool(tool.name);
        continue;
      }

      const request = buildToolReviewRequest(call.name, call.args, state.emailInput);
      const decision = parseReviewDecision(interrupt<ReviewRequest, unknown>(request));
      const outcome = applyReviewDecision(call.name, call.args, decision);

      const event = feedbackForToolDecision(call.name, decision, call.args, state.messages);
      if (event !== null) {
        feedback.push(event);
      }

      switch (outcome.kind) {
        case "execute":
          if (outcome.edited) {
            editedArgs.set(call.id, outcome.args);
          }
          reply(await executeTool(tool, outcome.args, call.id));
          terminal = terminal || isTerminalTool(tool.name);
          break;
        case "feedback":
          reply(outcome.message);
          break;
        case "stop":
          reply(outcome.message);
          stopped = true;
          break;
      }
    }

    const loopPhase = advanceLoop(state.loopPhase, {
      type: "tools_executed",
      terminal: terminal || stopped,
    });

    if (feedback.length > 0 && options.onFeedback) {
      await options.onFeedback(feedback, config);
    }

    const messages: BaseMessage[] = [];
    if (editedArgs.size > 0) {
      messages.push(rewriteToolCalls(message, editedArgs));
    }
    messages.push(...results);

    return { messages, loopPhase };
  };
}

/**
 * Copy of an AI message with some tool call args replaced. It keeps the
 * original id so the messages reducer swaps it in place.
 */
export function rewriteToolCalls(
  message: BaseMessage,
  argsById: ReadonlyMap<string, Record<string, unknown>>,
): AIMessage {
  const calls = extractToolCalls(message).map((call) => ({
    ...call,
    args: argsById.get(call.id) ?? call.args,
    type: "tool_call" as const,
  }));
  return new AIMessage({
    id: message.id,
    content: message.content,
    tool_calls: calls,
  });
}
