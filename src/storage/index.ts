/**
 * Persistence singletons for the email assistant runtime.
 *
 * ## Checkpointer Selection
 *
 * - When `DATABASE_URL` is configured → `PostgresSaver` from
 *   `@langchain/langgraph-checkpoint-postgres` (threads survive restarts)
 * - Otherwise → `MemorySaver` from `@langchain/langgraph`
 *
 * The preference store is always an `InMemoryStore`.
 *
 * ## Lifecycle
 *
 * Call `initializeStorage()` at server startup, before the HTTP server
 * starts listening, and `shutdownStorage()` during graceful shutdown.
 */

import {
  InMemoryStore,
  MemorySaver,
  type BaseCheckpointSaver,
  type BaseStore,
} from "@langchain/langgraph";
import { PostgresSaver } from "@langchain/langgraph-checkpoint-postgres";

import { config } from "../config";

// ---------------------------------------------------------------------------
// Module-level singletons
// ---------------------------------------------------------------------------

let checkpointer: BaseCheckpointSaver | null = null;
let postgresSaver: PostgresSaver | null = null;
let store: BaseStore | null = null;

/**
 * Get the shared LangGraph checkpointer.
 *
 * Falls back to `MemorySaver` when the Postgres saver cannot be created.
 */
export function getCheckpointer(): BaseCheckpointSaver {
  if (checkpointer === null) {
    if (config.databaseUrl) {
      try {
        postgresSaver = PostgresSaver.fromConnString(config.databaseUrl);
        checkpointer = postgresSaver;
        console.log("[storage] Using PostgresSaver checkpointer");
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(
          `[storage] Failed to create PostgresSaver, falling back to MemorySaver: ${message}`,
        );
        checkpointer = new MemorySaver();
      }
    } else {
      checkpointer = new MemorySaver();
    }
  }
  return checkpointer;
}

/** Get the shared preference store. */
export function getStore(): BaseStore {
  if (store === null) {
    store = new InMemoryStore();
  }
  return store;
}

/**
 * Reset both singletons.
 *
 * **For testing only.** Data held by previously returned instances is not
 * cleared.
 */
export function resetStorage(): void {
  checkpointer = null;
  postgresSaver = null;
  store = null;
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

/**
 * Create the checkpointer and, for Postgres, its tables.
 *
 * @returns `true` when threads are persisted in Postgres.
 */
export async function initializeStorage(): Promise<boolean> {
  getCheckpointer();
  getStore();

  if (postgresSaver === null) {
    console.log("[storage] Checkpointer: in-memory (threads reset on restart)");
    return false;
  }

  try {
    await postgresSaver.setup();
    console.log("[storage] LangGraph checkpoint tables ready");
    return true;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(
      `[storage] Postgres checkpoint setup failed, falling back to MemorySaver: ${message}`,
    );
    await postgresSaver.end().catch((endError: unknown) => {
      console.warn(`[storage] Closing Postgres pool failed: ${String(endError)}`);
    });
    postgresSaver = null;
    checkpointer = new MemorySaver();
    return false;
  }
}

/**
 * Close database connections and drop the singletons. Safe to call when
 * Postgres was never used.
 */
export async function shutdownStorage(): Promise<void> {
  if (postgresSaver !== null) {
    await postgresSaver.end();
  }
  resetStorage();
  console.log("[storage] Storage subsystem shut down");
}
