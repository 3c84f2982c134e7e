/**
 * Email assistant: triage classifier plus tool-calling response loop,
 * with optional human review and preference memory.
 *
 *   import { graph } from "../graphs/email-assistant";
 *
 *   const assistant = await graph({ hitl: true }, { checkpointer, store });
 */

export {
  graph,
  buildEmailAssistantGraph,
  bindEmailAssistantModels,
  toolRegistryFor,
  type EmailAssistantGraph,
  type EmailAssistantModels,
} from "./agent";
export {
  parseEmailAssistantConfig,
  type EmailAssistantConfigValues,
} from "./configuration";
export * from "./errors";
export {
  EmailInputSchema,
  type EmailInput,
  type ClassificationDecision,
  type EmailAssistantState,
} from "./schemas";
