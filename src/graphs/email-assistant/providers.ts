/**
 * Chat model factory for the email assistant graph.
 *
 * Model names use the `provider:model` convention:
 *   - `openai:*`    → `ChatOpenAI`
 *   - `anthropic:*` → `ChatAnthropic`
 *   - `google:*`    → `ChatGoogleGenAI`
 *   - no prefix     → OpenAI
 *
 * Setting `base_url` bypasses provider resolution and talks to any
 * OpenAI-compatible endpoint (vLLM, Ollama, LiteLLM) through `ChatOpenAI`.
 * Everything else goes through `initChatModel` from `langchain`.
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatOpenAI } from "@langchain/openai";
import { initChatModel } from "langchain";

import type { EmailAssistantConfigValues } from "./configuration";

// ---------------------------------------------------------------------------
// Provider prefix parsing
// ---------------------------------------------------------------------------

/**
 * @example
 *   extractProvider("anthropic:claude-sonnet-4-0") // → "anthropic"
 *   extractProvider("gpt-4o")                      // → "openai"
 */
export function extractProvider(modelName: string): string {
  const colonIndex = modelName.indexOf(":");
  if (colonIndex === -1) {
    return "openai";
  }
  return modelName.slice(0, colonIndex).toLowerCase();
}

/**
 * @example
 *   extractModelName("openai:gpt-4o") // → "gpt-4o"
 *   extractModelName("gpt-4o-mini")   // → "gpt-4o-mini"
 */
export function extractModelName(modelName: string): string {
  const colonIndex = modelName.indexOf(":");
  if (colonIndex === -1) {
    return modelName;
  }
  return modelName.slice(colonIndex + 1);
}

// ---------------------------------------------------------------------------
// API key resolution
// ---------------------------------------------------------------------------

const PROVIDER_TO_ENV_VAR: Record<string, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_API_KEY",
};

/**
 * Resolve the API key for a provider.
 *
 * Custom endpoints: `custom_api_key` in the configurable dict, then
 * `CUSTOM_API_KEY`, then `"EMPTY"` for local servers without auth.
 * Standard providers: `apiKeys[<ENV_VAR>]` in the configurable dict, then
 * the environment variable itself.
 */
export function getApiKeyForProvider(
  provider: string,
  rawConfigurable: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (provider === "custom") {
    const customKey = rawConfigurable.custom_api_key;
    if (typeof customKey === "string" && customKey.length > 0) {
      return customKey;
    }
    return env.CUSTOM_API_KEY || "EMPTY";
  }

  const envVarName = PROVIDER_TO_ENV_VAR[provider];
  if (envVarName === undefined) {
    return undefined;
  }

  const apiKeys = rawConfigurable.apiKeys;
  if (typeof apiKeys === "object" && apiKeys !== null && envVarName in apiKeys) {
    const keyFromConfig: unknown = Reflect.get(apiKeys, envVarName);
    if (typeof keyFromConfig === "string" && keyFromConfig.length > 0) {
      return keyFromConfig;
    }
  }

  return env[envVarName] || undefined;
}

// ---------------------------------------------------------------------------
// Chat model factory
// ---------------------------------------------------------------------------

/**
 * Create the chat model shared by triage, the response loop and memory
 * updates.
 */
export async function createChatModel(
  config: EmailAssistantConfigValues,
  rawConfigurable: Record<string, unknown>,
): Promise<BaseChatModel> {
  if (config.base_url) {
    const apiKey = getApiKeyForProvider("custom", rawConfigurable);
    const modelName = extractModelName(config.custom_model_name ?? config.model_name);

    console.log(
      `[providers] Custom endpoint: base_url=${maskUrl(config.base_url)} model=${modelName}`,
    );

    return new ChatOpenAI({
      configuration: { baseURL: config.base_url },
      apiKey,
      model: modelName,
      temperature: config.temperature,
      maxTokens: config.max_tokens,
    });
  }

  const provider = extractProvider(config.model_name);
  const apiKey = getApiKeyForProvider(provider, rawConfigurable);

  console.log(
    `[providers] Standard provider: provider=${provider} model=${config.model_name} api_key_present=${Boolean(apiKey)}`,
  );

  return initChatModel(config.model_name, {
    temperature: config.temperature,
    maxTokens: config.max_tokens,
    ...(apiKey ? { apiKey } : {}),
  });
}

/**
 * Scheme and host only; paths can carry tokens.
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/***`;
  } catch {
    return "***";
  }
}
