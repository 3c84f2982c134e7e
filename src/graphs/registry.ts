/**
 * Graph registry: dispatches `graph_id` to a graph factory.
 *
 * Built-in graph IDs:
 *
 * - `"email_assistant"`             — triage + response loop (default)
 * - `"email_assistant_hitl"`        — adds reviewer interrupts
 * - `"email_assistant_hitl_memory"` — adds preference memory on top
 *
 * Unknown `graph_id` values fall back to the default.
 *
 * Usage:
 *
 *   const buildGraph = resolveGraphFactory(body.graph_id);
 *   const compiled = await buildGraph(config, { checkpointer, store });
 */

import { graph as emailAssistantGraph } from "./email-assistant";
import { DEFAULT_GRAPH_ID, type GraphFactory } from "./types";

// ---------------------------------------------------------------------------
// Registry storage
// ---------------------------------------------------------------------------

const _GRAPH_REGISTRY = new Map<string, GraphFactory>();

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Register a graph factory under a given `graph_id`, replacing any
 * existing entry. Use `resetRegistry()` in tests to restore the built-ins.
 *
 * @throws Error if `graphId` is empty.
 */
export function registerGraph(graphId: string, factory: GraphFactory): void {
  if (!graphId) {
    throw new Error("registerGraph: graphId must be a non-empty string");
  }
  _GRAPH_REGISTRY.set(graphId, factory);
}

/**
 * Resolve a graph factory from a `graph_id`.
 *
 * Null, undefined and unrecognised values resolve to the default graph;
 * unrecognised ones log a warning.
 *
 * @throws Error if the registry has no default entry.
 */
export function resolveGraphFactory(graphId?: string | null): GraphFactory {
  const effectiveId = graphId || DEFAULT_GRAPH_ID;

  const factory = _GRAPH_REGISTRY.get(effectiveId);
  if (factory !== undefined) {
    return factory;
  }

  if (effectiveId !== DEFAULT_GRAPH_ID) {
    console.warn(
      `[graph-registry] Unknown graph_id="${effectiveId}", falling back to "${DEFAULT_GRAPH_ID}"`,
    );
    const defaultFactory = _GRAPH_REGISTRY.get(DEFAULT_GRAPH_ID);
    if (defaultFactory !== undefined) {
      return defaultFactory;
    }
  }

  throw new Error(
    `[graph-registry] No factory registered for "${DEFAULT_GRAPH_ID}". ` +
      "Ensure the built-in graphs are registered at startup.",
  );
}

/**
 * Effective graph id for a requested one, after default fallback.
 */
export function resolveGraphId(graphId?: string | null): string {
  if (graphId && _GRAPH_REGISTRY.has(graphId)) {
    return graphId;
  }
  return DEFAULT_GRAPH_ID;
}

/** Sorted list of registered graph IDs. */
export function getAvailableGraphIds(): string[] {
  return Array.from(_GRAPH_REGISTRY.keys()).sort();
}

export function isGraphRegistered(graphId: string): boolean {
  return _GRAPH_REGISTRY.has(graphId);
}

/**
 * Clear the registry and re-register built-in graphs.
 *
 * **For testing only.**
 */
export function resetRegistry(): void {
  _GRAPH_REGISTRY.clear();
  _registerBuiltins();
}

// ---------------------------------------------------------------------------
// Built-in graph registration
// ---------------------------------------------------------------------------

/**
 * A built-in variant: the shared factory with some flags forced on.
 */
function variant(flags: Record<string, boolean>): GraphFactory {
  return (config, options) => emailAssistantGraph({ ...config, ...flags }, options);
}

function _registerBuiltins(): void {
  registerGraph(DEFAULT_GRAPH_ID, emailAssistantGraph);
  registerGraph("email_assistant_hitl", variant({ hitl: true }));
  registerGraph("email_assistant_hitl_memory", variant({ hitl: true, memory: true }));
}

_registerBuiltins();
