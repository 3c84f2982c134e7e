/**
 * Email Assistant Runtime: Node.js HTTP server.
 *
 * This file:
 *   1. Initializes checkpoint storage (Postgres when configured).
 *   2. Builds the router.
 *   3. Starts the HTTP server through `@hono/node-server`.
 *   4. Installs signal handlers for graceful shutdown.
 */

import { serve } from "@hono/node-server";

import { createApp, startupBanner } from "./app";
import { config } from "./config";
import { initializeStorage, shutdownStorage } from "./storage";

const persistentThreads = await initializeStorage();

const router = createApp();

const server = serve({ fetch: (request) => router.handle(request), port: config.port }, (info) => {
  const lines = startupBanner({
    port: info.port,
    routeCount: router.routeCount,
    persistentThreads,
  });
  for (const line of lines) {
    console.log(line);
  }
});

// ---------------------------------------------------------------------------
// Graceful shutdown
// ---------------------------------------------------------------------------

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`\n${signal} received, shutting down…`);

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
  await shutdownStorage();

  console.log("👋 Server stopped.");
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    console.error("[shutdown] Failed to stop cleanly:", error);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
