/**
 * Prompt registry with `{{variable}}` substitution and per-run overrides.
 *
 * Graphs register their prompt texts at module load via
 * `registerDefaultPrompt()` and read them back with `getPrompt()`. A run can
 * swap any registered prompt for another one through
 * `configurable.prompt_overrides`:
 *
 *   {
 *     "configurable": {
 *       "prompt_overrides": {
 *         "email-assistant-triage-system": { "name": "triage-system-strict" }
 *       }
 *     }
 *   }
 *
 * Unknown override targets fall back to the requested prompt with a warning.
 */

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

const registeredPrompts = new Map<string, string>();

/**
 * Register a prompt under `name`. First registration wins so that module
 * re-evaluation (test isolation, hot reload) does not clobber overrides
 * registered by the host application.
 */
export function registerDefaultPrompt(name: string, content: string): void {
  if (!name) {
    throw new Error("registerDefaultPrompt: name must be a non-empty string");
  }
  if (registeredPrompts.has(name)) {
    return;
  }
  registeredPrompts.set(name, content);
}

/** Sorted names of all registered prompts. */
export function listRegisteredPrompts(): string[] {
  return Array.from(registeredPrompts.keys()).sort();
}

export function isPromptRegistered(name: string): boolean {
  return registeredPrompts.has(name);
}

// ---------------------------------------------------------------------------
// Substitution
// ---------------------------------------------------------------------------

const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g;

/**
 * Replace `{{key}}` placeholders. Placeholders without a value are left
 * untouched so missing variables are visible in the rendered prompt.
 */
export function substituteVariables(
  template: string,
  variables: Record<string, string>,
): string {
  return template.replace(VARIABLE_PATTERN, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match,
  );
}

/**
 * Read the override entry for `name` from a configurable dict.
 */
export function extractOverride(
  name: string,
  configurable: Record<string, unknown> | null | undefined,
): { name?: string } {
  const overrides = configurable?.prompt_overrides;
  if (typeof overrides !== "object" || overrides === null) {
    return {};
  }
  const entry: unknown = Reflect.get(overrides, name);
  if (typeof entry !== "object" || entry === null) {
    return {};
  }
  const overrideName: unknown = Reflect.get(entry, "name");
  return typeof overrideName === "string" && overrideName.length > 0
    ? { name: overrideName }
    : {};
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export interface GetPromptOptions {
  /** Registered prompt name. */
  name: string;
  /** Used when `name` is not registered. */
  fallback?: string;
  /** Flat configurable dict that may carry `prompt_overrides`. */
  configurable?: Record<string, unknown> | null;
  variables?: Record<string, string> | null;
}

/**
 * Resolve a prompt: apply overrides, look it up, substitute variables.
 *
 * @throws Error when neither the prompt nor a fallback is available.
 */
export function getPrompt(options: GetPromptOptions): string {
  const { name, fallback, configurable = null, variables = null } = options;

  const override = extractOverride(name, configurable);
  let template: string | undefined;

  if (override.name !== undefined) {
    template = registeredPrompts.get(override.name);
    if (template === undefined) {
      console.warn(
        `[prompts] Override for '${name}' points at unknown prompt '${override.name}', using default`,
      );
    }
  }

  template ??= registeredPrompts.get(name) ?? fallback;
  if (template === undefined) {
    throw new Error(`[prompts] No prompt registered under '${name}'`);
  }

  return variables ? substituteVariables(template, variables) : template;
}
