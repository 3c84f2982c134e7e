/**
 * In-process stand-ins for the chat models and a graph/runner builder
 * wired to MemorySaver and InMemoryStore.
 */

import { AIMessage, type BaseMessage } from "@langchain/core/messages";
import { InMemoryStore, MemorySaver } from "@langchain/langgraph";

import { buildEmailAssistantGraph } from "../../src/graphs/email-assistant/agent";
import { parseEmailAssistantConfig } from "../../src/graphs/email-assistant/configuration";
import type { ToolCallingModel } from "../../src/graphs/email-assistant/response-loop";
import type { EmailInput } from "../../src/graphs/email-assistant/schemas";
import type { StructuredModel } from "../../src/graphs/email-assistant/triage";
import { EmailAssistantRunner } from "../../src/runs/runner";

// ---------------------------------------------------------------------------
// Data
// ---------------------------------------------------------------------------

export const SAMPLE_EMAIL: EmailInput = {
  author: "Alice Smith <alice@example.com>",
  to: "Robin <robin@example.com>",
  subject: "Quarterly planning",
  email_thread: "Can we meet on Tuesday to go over the roadmap?",
};

/** Fixed clock for the agent system prompt. */
export const FIXED_NOW = new Date("2025-04-21T09:00:00Z");

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export type ScriptedCall = [name: string, args: Record<string, unknown>];

/**
 * AI turn with ids `<id>-call-<n>` on its tool calls.
 */
export function toolTurn(id: string, calls: ScriptedCall[]): AIMessage {
  return new AIMessage({
    id,
    content: "",
    tool_calls: calls.map(([name, args], index) => ({
      id: `${id}-call-${index}`,
      name,
      args,
      type: "tool_call" as const,
    })),
  });
}

/**
 * Tool-calling model that replays a fixed list of turns and records the
 * prompts it was given.
 */
export class ScriptedToolModel implements ToolCallingModel {
  readonly prompts: BaseMessage[][] = [];
  private position = 0;

  constructor(private readonly script: BaseMessage[]) {}

  async invoke(messages: BaseMessage[]): Promise<BaseMessage> {
    this.prompts.push(messages);
    const next = this.script[this.position];
    if (next === undefined) {
      throw new Error(`ScriptedToolModel: no turn scripted at position ${this.position}`);
    }
    this.position += 1;
    return next;
  }

  get turnsTaken(): number {
    return this.position;
  }
}

/** Structured-output model that always answers with the same value. */
export class StaticStructuredModel implements StructuredModel {
  readonly prompts: BaseMessage[][] = [];

  constructor(private readonly answer: unknown) {}

  async invoke(messages: BaseMessage[]): Promise<unknown> {
    this.prompts.push(messages);
    return this.answer;
  }
}

export function routerAnswer(
  classification: string,
  reasoning = "test reasoning",
): StaticStructuredModel {
  return new StaticStructuredModel({ reasoning, classification });
}

// ---------------------------------------------------------------------------
// Graph + runner
// ---------------------------------------------------------------------------

export interface TestAssistantOptions {
  router: StructuredModel;
  agent: ToolCallingModel;
  memory?: StructuredModel | null;
  configurable?: Record<string, unknown>;
  store?: InMemoryStore;
}

export function createTestAssistant(options: TestAssistantOptions) {
  const config = parseEmailAssistantConfig(options.configurable ?? {});
  const store = options.store ?? new InMemoryStore();
  const graph = buildEmailAssistantGraph(
    {
      router: options.router,
      agent: options.agent,
      memory: options.memory ?? null,
    },
    {
      config,
      checkpointer: new MemorySaver(),
      store,
      now: () => FIXED_NOW,
    },
  );
  const runner = new EmailAssistantRunner(graph, {
    maxIterations: config.max_iterations,
  });
  return { graph, runner, store, config };
}
