/**
 * Typed environment configuration for the email assistant runtime.
 *
 * All configuration is read from environment variables with sensible
 * defaults. Secrets (like API keys) are never logged or exposed in error
 * messages.
 *
 * ## Version Management
 *
 * The runtime version is read from `package.json`, the single source of
 * truth. Always import `VERSION` from this module.
 */

import packageJson from "../package.json";

/** Current runtime version. Derived from `package.json`. */
export const VERSION: string = packageJson.version;

/** Service identifier used in root/info responses and logging. */
export const SERVICE_NAME = "email-assistant-runtime";

export const RUNTIME = "node";

export interface AppConfig {
  /** HTTP server port. */
  port: number;

  openaiApiKey: string | undefined;
  anthropicApiKey: string | undefined;
  googleApiKey: string | undefined;

  /** Key for `base_url` endpoints (vLLM, Ollama, LiteLLM). */
  customApiKey: string | undefined;

  /** Default model in `provider:model` format. */
  modelName: string;

  /** PostgreSQL connection string. Enables the Postgres checkpointer when set. */
  databaseUrl: string | undefined;

  /** Model turns allowed per response loop. */
  maxIterations: number;

  /** Git commit SHA for build metadata (set at build/deploy time). */
  buildCommit: string;

  /** Build date ISO string (set at build/deploy time). */
  buildDate: string;
}

function parseBoundedInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    console.warn(`[config] Invalid ${name} "${raw}", falling back to ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Load configuration from environment variables.
 *
 * A function (not a top-level const) so tests can call it after
 * modifying `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseBoundedInteger("PORT", env.PORT, 3000, 0, 65535),
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    googleApiKey: env.GOOGLE_API_KEY || undefined,
    customApiKey: env.CUSTOM_API_KEY || undefined,
    modelName: env.MODEL_NAME || "openai:gpt-4o",
    databaseUrl: env.DATABASE_URL || undefined,
    maxIterations: parseBoundedInteger("MAX_ITERATIONS", env.MAX_ITERATIONS, 12, 1, 1000),
    buildCommit: env.BUILD_COMMIT || "dev",
    buildDate: env.BUILD_DATE || new Date().toISOString(),
  };
}

/** Singleton config instance, loaded once at module init. */
export const config: AppConfig = loadConfig();

/**
 * Whether any model provider key is configured. Reported by `/info`.
 */
export function isLlmConfigured(current: AppConfig = config): boolean {
  return Boolean(
    current.openaiApiKey ||
      current.anthropicApiKey ||
      current.googleApiKey ||
      current.customApiKey,
  );
}

export function isDatabaseConfigured(current: AppConfig = config): boolean {
  return Boolean(current.databaseUrl);
}
