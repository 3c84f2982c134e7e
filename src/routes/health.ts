/**
 * System routes.
 *
 *   GET /        → { service, runtime, version }
 *   GET /health  → { status: "ok" }
 *   GET /info    → build metadata, registered graphs, configuration flags
 */

import type { Router } from "../router";
import {
  RUNTIME,
  SERVICE_NAME,
  VERSION,
  config,
  isDatabaseConfigured,
  isLlmConfigured,
} from "../config";
import { getAvailableGraphIds, DEFAULT_GRAPH_ID } from "../graphs";
import { jsonResponse } from "./helpers";

export function registerHealthRoutes(router: Router): void {
  router.get("/", handleRoot);
  router.get("/health", handleHealth);
  router.get("/info", handleInfo);
}

function handleRoot(): Response {
  return jsonResponse({
    service: SERVICE_NAME,
    runtime: RUNTIME,
    version: VERSION,
  });
}

function handleHealth(): Response {
  return jsonResponse({ status: "ok" });
}

/**
 * GET /info. Reports whether secrets are set, never their values.
 */
function handleInfo(): Response {
  return jsonResponse({
    service: SERVICE_NAME,
    runtime: RUNTIME,
    version: VERSION,
    build: {
      commit: config.buildCommit,
      date: config.buildDate,
      node: process.version,
    },
    graphs: getAvailableGraphIds(),
    default_graph: DEFAULT_GRAPH_ID,
    config: {
      llm_configured: isLlmConfigured(),
      database_configured: isDatabaseConfigured(),
      model_name: config.modelName,
      max_iterations: config.maxIterations,
    },
  });
}
