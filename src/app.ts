/**
 * Router assembly. Kept apart from the entrypoint so tests can drive
 * `createApp().handle(request)` without starting a server.
 */

import { config, isLlmConfigured, SERVICE_NAME, VERSION, type AppConfig } from "./config";
import { getAvailableGraphIds } from "./graphs";
import { Router } from "./router";
import { registerHealthRoutes } from "./routes/health";
import { registerThreadRoutes } from "./routes/threads";

export function createApp(): Router {
  const router = new Router();

  // System routes: GET /, /health, /info
  registerHealthRoutes(router);

  // Thread routes: POST /threads/:id/runs, /threads/:id/resume, GET /threads/:id/state
  registerThreadRoutes(router);

  return router;
}

export interface StartupInfo {
  port: number;
  routeCount: number;
  /** What `initializeStorage()` reported, after any fallback. */
  persistentThreads: boolean;
}

export function startupBanner(info: StartupInfo, current: AppConfig = config): string[] {
  return [
    `🚀 ${SERVICE_NAME} v${VERSION}`,
    `   Listening on:      http://localhost:${info.port}`,
    `   Routes:            ${info.routeCount}`,
    `   Graphs:            ${getAvailableGraphIds().join(", ")}`,
    `   Default model:     ${current.modelName}`,
    `   LLM configured:    ${isLlmConfigured(current) ? "yes" : "no"}`,
    `   Checkpointer:      ${info.persistentThreads ? "postgres" : "memory"}`,
  ];
}
