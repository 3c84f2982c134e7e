/**
 * Email assistant graph.
 *
 *   START ─┬─ (email input) ──► triage_router ─┬─ respond ──► llm_call ◄──┐
 *          │                                   ├─ notify ───► triage_review (HITL)
 *          │                                   └─ ignore ───► END          │
 *          └─ (raw message) ──────────────────────────────► llm_call      │
 *                                                             │            │
 *                                                             ▼            │
 *                                                       tool_handler ──────┘
 *                                                             │ Done
 *                                                             ▼
 *                                                            END
 *
 * Routing never inspects node return values: each node writes the next
 * stage (`triageNext`) or loop phase (`loopPhase`) into state and the
 * conditional edges map those enumerated values to nodes.
 *
 * Variants are selected by configuration: `hitl` adds reviewer interrupts
 * and the `Question` tool, `memory` reads and learns preferences through
 * the LangGraph store.
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage } from "@langchain/core/messages";
import {
  END,
  START,
  StateGraph,
  interrupt,
  type BaseCheckpointSaver,
  type BaseStore,
  type LangGraphRunnableConfig,
} from "@langchain/langgraph";

import type { GraphFactoryOptions } from "../types";
import {
  parseEmailAssistantConfig,
  type EmailAssistantConfigValues,
} from "./configuration";
import { formatEmailMarkdown } from "./email";
import { ProtocolViolationError } from "./errors";
import {
  UserPreferencesSchema,
  applyPreferenceFeedback,
  feedbackForNotifyDecision,
  getPreferences,
  preferenceNamespace,
  type PreferenceCategory,
  type PreferenceFeedback,
} from "./memory";
import { createChatModel } from "./providers";
import {
  LOOP_ROUTES,
  createLlmCallNode,
  createToolHandlerNode,
  type AgentPreferences,
  type ToolCallingModel,
} from "./response-loop";
import {
  applyNotifyDecision,
  buildNotifyReviewRequest,
  parseReviewDecision,
  type ReviewRequest,
} from "./review";
import {
  EmailAssistantAnnotation,
  RouterSchema,
  type EmailAssistantState,
  type EmailAssistantUpdate,
  type TriageStage,
} from "./schemas";
import { createToolRegistry, type ToolRegistry } from "./tools";
import {
  buildResponseInstruction,
  classifyEmail,
  nextStageAfterTriage,
  type StructuredModel,
} from "./triage";

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export interface EmailAssistantModels {
  /** Structured-output model answering with `RouterSchema`. */
  router: StructuredModel;
  /** Tool-bound model with tool use forced on every turn. */
  agent: ToolCallingModel;
  /** Structured-output model answering with `UserPreferencesSchema`. */
  memory: StructuredModel | null;
}

/**
 * Derive the three model roles from one chat model.
 */
export function bindEmailAssistantModels(
  model: BaseChatModel,
  registry: ToolRegistry,
  options: { memory: boolean },
): EmailAssistantModels {
  if (typeof model.bindTools !== "function") {
    throw new Error(
      `[email-assistant] Model ${model.getName()} does not support tool calling`,
    );
  }
  return {
    router: model.withStructuredOutput(RouterSchema, { name: "RouterSchema" }),
    agent: model.bindTools(registry.list(), { tool_choice: "any" }),
    memory: options.memory
      ? model.withStructuredOutput(UserPreferencesSchema, { name: "UserPreferences" })
      : null,
  };
}

export function toolRegistryFor(config: EmailAssistantConfigValues): ToolRegistry {
  return createToolRegistry({ includeQuestion: config.hitl });
}

// ---------------------------------------------------------------------------
// Graph builder
// ---------------------------------------------------------------------------

export interface BuildEmailAssistantOptions {
  config: EmailAssistantConfigValues;
  registry?: ToolRegistry;
  checkpointer?: BaseCheckpointSaver;
  store?: BaseStore;
  now?: () => Date;
}

const TRIAGE_ROUTES = {
  response_agent: "llm_call",
  notify_review: "triage_review",
  end: END,
} as const satisfies Record<TriageStage, string>;

/** Run-level `user_id` wins over the assistant's configured owner. */
function resolveUserId(
  runConfig: LangGraphRunnableConfig,
  fallback: string,
): string {
  const fromRun: unknown = runConfig.configurable?.user_id;
  return typeof fromRun === "string" && fromRun.length > 0 ? fromRun : fallback;
}

/**
 * Construct and compile the email assistant graph.
 *
 * @throws Error when memory is enabled without a store or memory model.
 */
export function buildEmailAssistantGraph(
  models: EmailAssistantModels,
  options: BuildEmailAssistantOptions,
) {
  const { config, checkpointer, store } = options;
  const registry = options.registry ?? toolRegistryFor(config);

  const memoryModel = models.memory;
  let memoryStore: BaseStore | null = null;
  if (config.memory) {
    if (!store || !memoryModel) {
      throw new Error(
        "[email-assistant] memory requires both a store and a memory model",
      );
    }
    memoryStore = store;
  }

  async function readPreference(
    runConfig: LangGraphRunnableConfig,
    category: PreferenceCategory,
    fallback: string,
  ): Promise<string> {
    if (memoryStore === null) {
      return fallback;
    }
    const userId = resolveUserId(runConfig, config.user_id);
    return getPreferences(memoryStore, preferenceNamespace(userId, category), fallback);
  }

  async function recordFeedback(
    feedback: PreferenceFeedback[],
    runConfig: LangGraphRunnableConfig,
  ): Promise<void> {
    if (memoryStore === null || memoryModel === null) {
      return;
    }
    const userId = resolveUserId(runConfig, config.user_id);
    await applyPreferenceFeedback(memoryStore, memoryModel, userId, feedback);
  }

  async function loadAgentPreferences(
    runConfig: LangGraphRunnableConfig,
  ): Promise<AgentPreferences> {
    return {
      background: config.background,
      responsePreferences: await readPreference(
        runConfig,
        "response_preferences",
        config.response_preferences,
      ),
      calPreferences: await readPreference(
        runConfig,
        "cal_preferences",
        config.cal_preferences,
      ),
    };
  }

  // -------------------------------------------------------------------
  // Triage nodes
  // -------------------------------------------------------------------

  async function triageRouter(
    state: EmailAssistantState,
    runConfig: LangGraphRunnableConfig,
  ): Promise<EmailAssistantUpdate> {
    const email = state.emailInput;
    if (email === null) {
      throw new ProtocolViolationError("triage_router reached without an email");
    }

    const triageInstructions = await readPreference(
      runConfig,
      "triage_preferences",
      config.triage_instructions,
    );
    const result = await classifyEmail(models.router, email, {
      background: config.background,
      triageInstructions,
      configurable: runConfig.configurable,
    });

    return {
      classification: result.decision,
      triageReasoning: result.reasoning,
      triageNext: nextStageAfterTriage(result.decision, {
        reviewNotifications: config.hitl,
      }),
      messages: result.instruction ? [result.instruction] : [],
    };
  }

  async function triageReview(
    state: EmailAssistantState,
    runConfig: LangGraphRunnableConfig,
  ): Promise<EmailAssistantUpdate> {
    const email = state.emailInput;
    if (email === null) {
      throw new ProtocolViolationError("triage_review reached without an email");
    }

    const decision = parseReviewDecision(
      interrupt<ReviewRequest, unknown>(buildNotifyReviewRequest(email)),
    );
    const outcome = applyNotifyDecision(decision);

    const feedback = feedbackForNotifyDecision(decision, [
      new HumanMessage(`Email:${formatEmailMarkdown(email)}`),
    ]);
    if (feedback !== null) {
      await recordFeedback([feedback], runConfig);
    }

    if (outcome.kind === "ignore") {
      console.info(`[email-assistant] Notification dismissed: subject="${email.subject.slice(0, 80)}"`);
      return { triageNext: "end" };
    }

    return {
      triageNext: "response_agent",
      messages: [
        buildResponseInstruction(email),
        new HumanMessage(
          `User wants to reply to the email. Use this feedback to respond: ${outcome.feedback}`,
        ),
      ],
    };
  }

  // -------------------------------------------------------------------
  // Response loop nodes
  // -------------------------------------------------------------------

  const llmCall = createLlmCallNode({
    model: models.agent,
    hitl: config.hitl,
    maxIterations: config.max_iterations,
    loadPreferences: loadAgentPreferences,
    now: options.now,
  });

  const toolHandler = createToolHandlerNode({
    registry,
    hitl: config.hitl,
    onFeedback: config.memory ? recordFeedback : undefined,
  });

  // -------------------------------------------------------------------
  // Build the StateGraph
  // -------------------------------------------------------------------

  const builder = new StateGraph(EmailAssistantAnnotation)
    .addNode("triage_router", triageRouter)
    .addNode("triage_review", triageReview)
    .addNode("llm_call", llmCall)
    .addNode("tool_handler", toolHandler)
    .addConditionalEdges(
      START,
      (state: EmailAssistantState) =>
        state.emailInput !== null ? "triage_router" : "llm_call",
      { triage_router: "triage_router", llm_call: "llm_call" },
    )
    .addConditionalEdges(
      "triage_router",
      (state: EmailAssistantState) => state.triageNext,
      TRIAGE_ROUTES,
    )
    .addConditionalEdges(
      "triage_review",
      (state: EmailAssistantState) => state.triageNext,
      TRIAGE_ROUTES,
    )
    .addConditionalEdges(
      "llm_call",
      (state: EmailAssistantState) => state.loopPhase,
      LOOP_ROUTES,
    )
    .addConditionalEdges(
      "tool_handler",
      (state: EmailAssistantState) => state.loopPhase,
      LOOP_ROUTES,
    );

  const compiled = builder.compile({ checkpointer, store });

  console.info(
    `[email-assistant] graph compiled: tools=${registry.names().join(",")} hitl=${config.hitl} memory=${config.memory} checkpointer=${checkpointer ? "yes" : "none"}`,
  );

  return compiled;
}

export type EmailAssistantGraph = ReturnType<typeof buildEmailAssistantGraph>;

// ---------------------------------------------------------------------------
// Graph factory
// ---------------------------------------------------------------------------

/**
 * Build the graph from an assistant's configurable dict.
 *
 * @example
 *   const assistant = await graph(
 *     { model_name: "openai:gpt-4o", hitl: true },
 *     { checkpointer: new MemorySaver(), store: new InMemoryStore() },
 *   );
 */
export async function graph(
  configurable: Record<string, unknown>,
  options: GraphFactoryOptions = {},
): Promise<EmailAssistantGraph> {
  const config = parseEmailAssistantConfig(configurable);
  const registry = toolRegistryFor(config);
  const model = await createChatModel(config, configurable);

  return buildEmailAssistantGraph(
    bindEmailAssistantModels(model, registry, { memory: config.memory }),
    {
      config,
      registry,
      checkpointer: options.checkpointer,
      store: options.store,
    },
  );
}
