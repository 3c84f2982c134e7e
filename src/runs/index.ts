/**
 * Runner cache: one compiled graph and runner per graph id.
 *
 * The compiled graph is shared by every thread; LangGraph isolates thread
 * state by the `thread_id` passed at invoke time, not at compile time.
 * The cache holds the build promise, so concurrent first requests share one
 * runner and with it one per-thread busy lock.
 */

import { config } from "../config";
import { resolveGraphFactory, resolveGraphId } from "../graphs";
import { parseEmailAssistantConfig } from "../graphs/email-assistant/configuration";
import { getCheckpointer, getStore } from "../storage";
import { EmailAssistantRunner } from "./runner";

const runners = new Map<string, Promise<EmailAssistantRunner>>();

/** Assistant-level configurable derived from the environment. */
export function defaultConfigurable(): Record<string, unknown> {
  return {
    model_name: config.modelName,
    max_iterations: config.maxIterations,
  };
}

async function buildRunner(graphId: string): Promise<EmailAssistantRunner> {
  const configurable = defaultConfigurable();
  const compiled = await resolveGraphFactory(graphId)(configurable, {
    checkpointer: getCheckpointer(),
    store: getStore(),
  });
  const { max_iterations } = parseEmailAssistantConfig(configurable);
  console.log(`[runs] Built runner for graph_id=${graphId}`);
  return new EmailAssistantRunner(compiled, { maxIterations: max_iterations });
}

/**
 * Runner for a graph id; unknown or missing ids resolve to the default graph.
 * A failed build is evicted so the next request retries it.
 */
export function getRunner(graphId?: string | null): Promise<EmailAssistantRunner> {
  const effectiveId = resolveGraphId(graphId);
  const cached = runners.get(effectiveId);
  if (cached !== undefined) {
    return cached;
  }
  const pending = buildRunner(effectiveId).catch((error: unknown) => {
    if (runners.get(effectiveId) === pending) {
      runners.delete(effectiveId);
    }
    throw error;
  });
  runners.set(effectiveId, pending);
  return pending;
}

/**
 * Install a prebuilt runner for a graph id.
 *
 * **For testing only.**
 */
export function setRunner(graphId: string, runner: EmailAssistantRunner): void {
  runners.set(graphId, Promise.resolve(runner));
}

/** **For testing only.** */
export function resetRunners(): void {
  runners.clear();
}

export {
  EmailAssistantRunner,
  serializeMessage,
  type PendingInterrupt,
  type RunInput,
  type RunOutcome,
  type SerializedMessage,
  type ThreadSnapshot,
} from "./runner";
