/**
 * Triage classifier: decides whether an email needs a reply.
 *
 * `classifyEmail()` is stateless: it renders the two triage prompts, calls
 * the structured-output router model and validates the answer against the
 * closed label set. Anything outside `respond | ignore | notify` is a
 * contract violation and is raised, never coerced.
 */

import { HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import { OutputParserException } from "@langchain/core/output_parsers";

import { getPrompt } from "../../infra/prompts";
import { formatEmailMarkdown } from "./email";
import { ClassificationContractError } from "./errors";
import { PROMPT_NAMES } from "./prompts";
import {
  RouterSchema,
  type ClassificationDecision,
  type EmailInput,
  type TriageStage,
} from "./schemas";

// ---------------------------------------------------------------------------
// Model boundary
// ---------------------------------------------------------------------------

/**
 * A model wrapped with `withStructuredOutput()`. The parsed object is
 * validated again here because providers do not all enforce enums.
 */
export interface StructuredModel {
  invoke(messages: BaseMessage[]): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export interface TriagePromptInputs {
  background: string;
  triageInstructions: string;
  /** Flat configurable dict; may carry `prompt_overrides`. */
  configurable?: Record<string, unknown> | null;
}

export interface TriageResult {
  decision: ClassificationDecision;
  reasoning: string;
  /** Seed message for the response loop; only set for `respond`. */
  instruction: HumanMessage | null;
}

/**
 * Render the system and user prompts for one email.
 */
export function buildTriageMessages(
  email: EmailInput,
  inputs: TriagePromptInputs,
): BaseMessage[] {
  const systemPrompt = getPrompt({
    name: PROMPT_NAMES.triageSystem,
    configurable: inputs.configurable,
    variables: {
      background: inputs.background,
      triage_instructions: inputs.triageInstructions,
    },
  });
  const userPrompt = getPrompt({
    name: PROMPT_NAMES.triageUser,
    configurable: inputs.configurable,
    variables: {
      author: email.author,
      to: email.to,
      subject: email.subject,
      email_thread: email.email_thread,
    },
  });
  return [new SystemMessage(systemPrompt), new HumanMessage(userPrompt)];
}

/**
 * The instruction that hands a `respond` email to the response loop.
 */
export function buildResponseInstruction(email: EmailInput): HumanMessage {
  return new HumanMessage(`Respond to the email: ${formatEmailMarkdown(email)}`);
}

/**
 * Classify one email.
 *
 * @throws ClassificationContractError when the model output is not one of
 *   the three labels (or could not be parsed at all).
 */
export async function classifyEmail(
  router: StructuredModel,
  email: EmailInput,
  inputs: TriagePromptInputs,
): Promise<TriageResult> {
  let raw: unknown;
  try {
    raw = await router.invoke(buildTriageMessages(email, inputs));
  } catch (error: unknown) {
    if (error instanceof OutputParserException) {
      throw new ClassificationContractError(
        `Triage model output could not be parsed: ${error.message}`,
        null,
        { cause: error },
      );
    }
    throw error;
  }

  const parsed = RouterSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ClassificationContractError(
      `Triage model returned an invalid classification: ${JSON.stringify(raw)}`,
      raw,
    );
  }

  const { classification, reasoning } = parsed.data;
  console.info(
    `[triage] ${classification}: subject="${email.subject.slice(0, 80)}"`,
  );

  return {
    decision: classification,
    reasoning,
    instruction:
      classification === "respond" ? buildResponseInstruction(email) : null,
  };
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

/**
 * Next stage for a triage decision. `notify` ends the run unless a
 * reviewer is available to decide what to do with the notification.
 */
export function nextStageAfterTriage(
  decision: ClassificationDecision,
  options: { reviewNotifications: boolean },
): TriageStage {
  switch (decision) {
    case "respond":
      return "response_agent";
    case "notify":
      return options.reviewNotifications ? "notify_review" : "end";
    case "ignore":
      return "end";
  }
}
