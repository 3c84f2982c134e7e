/**
 * Configuration for the email assistant graph.
 *
 * Parsed from an assistant's flat `configurable` dict. Every field has a
 * default, and malformed values fall back to the default rather than
 * failing the run.
 */

import {
  DEFAULT_BACKGROUND,
  DEFAULT_CAL_PREFERENCES,
  DEFAULT_RESPONSE_PREFERENCES,
  DEFAULT_TRIAGE_INSTRUCTIONS,
} from "./prompts";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_MODEL_NAME = "openai:gpt-4o";

/** Triage should answer the same email the same way. */
export const DEFAULT_TEMPERATURE = 0;

export const DEFAULT_MAX_TOKENS = 4000;

/** Model turns allowed in one response loop before the run is aborted. */
export const DEFAULT_MAX_ITERATIONS = 12;

export const DEFAULT_USER_ID = "default";

// ---------------------------------------------------------------------------
// Config type
// ---------------------------------------------------------------------------

export interface EmailAssistantConfigValues {
  /** Model identifier in `provider:model` format. */
  model_name: string;
  temperature: number;
  max_tokens: number;

  /** OpenAI-compatible endpoint; switches model creation to ChatOpenAI. */
  base_url: string | null;
  custom_model_name: string | null;

  max_iterations: number;

  /** Pause reviewed tool calls and notifications for a human. */
  hitl: boolean;
  /** Read preferences from the store and learn from review feedback. */
  memory: boolean;
  /** Owner of the preference profiles. */
  user_id: string;

  background: string;
  triage_instructions: string;
  response_preferences: string;
  cal_preferences: string;
}

/**
 * @example
 *   parseEmailAssistantConfig({ hitl: "true", max_iterations: "5" })
 *   // → { ..., hitl: true, max_iterations: 5 }
 */
export function parseEmailAssistantConfig(
  configurable?: Record<string, unknown> | null,
): EmailAssistantConfigValues {
  const raw = configurable ?? {};

  return {
    model_name: parseString(raw.model_name, DEFAULT_MODEL_NAME),
    temperature: parseNumber(raw.temperature, DEFAULT_TEMPERATURE),
    max_tokens: parseInteger(raw.max_tokens, DEFAULT_MAX_TOKENS),
    base_url: parseOptionalString(raw.base_url),
    custom_model_name: parseOptionalString(raw.custom_model_name),
    max_iterations: Math.max(
      1,
      parseInteger(raw.max_iterations, DEFAULT_MAX_ITERATIONS),
    ),
    hitl: parseBoolean(raw.hitl, false),
    memory: parseBoolean(raw.memory, false),
    user_id: parseString(raw.user_id, DEFAULT_USER_ID),
    background: parseString(raw.background, DEFAULT_BACKGROUND),
    triage_instructions: parseString(
      raw.triage_instructions,
      DEFAULT_TRIAGE_INSTRUCTIONS,
    ),
    response_preferences: parseString(
      raw.response_preferences,
      DEFAULT_RESPONSE_PREFERENCES,
    ),
    cal_preferences: parseString(raw.cal_preferences, DEFAULT_CAL_PREFERENCES),
  };
}

// ---------------------------------------------------------------------------
// Internal parsing helpers
// ---------------------------------------------------------------------------

function parseString(value: unknown, defaultValue: string): string {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  return defaultValue;
}

function parseOptionalString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

/**
 * Accepts numbers and numeric strings (`"0.5"` from JSON or env).
 */
function parseNumber(value: unknown, defaultValue: number): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return defaultValue;
}

/**
 * Like `parseNumber`, rounded to the nearest integer.
 */
function parseInteger(value: unknown, defaultValue: number): number {
  const parsed = parseNumber(value, Number.NaN);
  return Number.isNaN(parsed) ? defaultValue : Math.round(parsed);
}

function parseBoolean(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1") {
      return true;
    }
    if (normalized === "false" || normalized === "0") {
      return false;
    }
  }
  return defaultValue;
}
