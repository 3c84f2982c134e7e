/**
 * Shared graph types.
 *
 * These types define the contract between the graph registry, graph
 * factories and the run orchestration layer.
 */

import type { BaseCheckpointSaver, BaseStore } from "@langchain/langgraph";

import type { EmailAssistantGraph } from "./email-assistant/agent";

/**
 * Persistence handed to a graph factory alongside the config. Both are
 * optional; without them the graph runs without thread state or memory.
 */
export interface GraphFactoryOptions {
  /** Thread state persistence (`MemorySaver` or `PostgresSaver`). */
  checkpointer?: BaseCheckpointSaver;

  /** Cross-thread store backing preference memory. */
  store?: BaseStore;
}

/**
 * Async function that builds a compiled graph from an assistant's flat
 * configurable dict.
 */
export type GraphFactory = (
  config: Record<string, unknown>,
  options?: GraphFactoryOptions,
) => Promise<EmailAssistantGraph>;

/**
 * Graph used when a request names no graph or an unknown one.
 */
export const DEFAULT_GRAPH_ID = "email_assistant";
