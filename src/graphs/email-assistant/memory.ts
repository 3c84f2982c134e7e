/**
 * Preference memory for the email assistant.
 *
 * Three free-text profiles live in a LangGraph `BaseStore`, one per
 * category, under `["email_assistant", <user>, <category>]`. They are
 * seeded from the configured defaults on first read and rewritten by a
 * structured-output model call whenever a reviewer's feedback says
 * something about them.
 */

import { HumanMessage, SystemMessage, type BaseMessage } from "@langchain/core/messages";
import type { BaseStore } from "@langchain/langgraph";
import { z } from "zod";

import { getPrompt } from "../../infra/prompts";
import { MEMORY_UPDATE_REINFORCEMENT, PROMPT_NAMES } from "./prompts";
import type { ReviewDecision, ReviewedToolName } from "./review";
import type { StructuredModel } from "./triage";

export const PREFERENCE_CATEGORIES = [
  "triage_preferences",
  "response_preferences",
  "cal_preferences",
] as const;

export type PreferenceCategory = (typeof PREFERENCE_CATEGORIES)[number];

const NAMESPACE_ROOT = "email_assistant";
const PREFERENCES_KEY = "user_preferences";

export function preferenceNamespace(
  userId: string,
  category: PreferenceCategory,
): string[] {
  return [NAMESPACE_ROOT, userId, category];
}

function readContent(value: Record<string, unknown> | undefined): string | null {
  const content = value?.content;
  return typeof content === "string" ? content : null;
}

/**
 * Read a profile, writing `defaultContent` first if the namespace is empty.
 */
export async function getPreferences(
  store: BaseStore,
  namespace: string[],
  defaultContent: string,
): Promise<string> {
  const item = await store.get(namespace, PREFERENCES_KEY);
  const existing = readContent(item?.value);
  if (existing !== null) {
    return existing;
  }
  await store.put(namespace, PREFERENCES_KEY, { content: defaultContent });
  return defaultContent;
}

// ---------------------------------------------------------------------------
// Updates
// ---------------------------------------------------------------------------

export const UserPreferencesSchema = z.object({
  preferences: z.string().describe("Updated user preferences"),
  justification: z.string().describe("Why the preferences changed"),
});

/**
 * Ask the memory model to fold `messages` into the stored profile and
 * write the result back.
 *
 * @returns The stored profile after the update.
 */
export async function updatePreferences(
  store: BaseStore,
  namespace: string[],
  model: StructuredModel,
  messages: BaseMessage[],
): Promise<string> {
  const item = await store.get(namespace, PREFERENCES_KEY);
  const currentProfile = readContent(item?.value) ?? "";

  const instructions = getPrompt({
    name: PROMPT_NAMES.memoryUpdate,
    variables: {
      namespace: namespace.join("/"),
      current_profile: currentProfile,
    },
  });

  const raw = await model.invoke([
    new SystemMessage(`${instructions}\n\n${MEMORY_UPDATE_REINFORCEMENT}`),
    ...messages,
  ]);
  const parsed = UserPreferencesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Memory model returned an invalid profile for ${namespace.join("/")}`,
    );
  }

  await store.put(namespace, PREFERENCES_KEY, {
    content: parsed.data.preferences,
  });
  console.info(
    `[memory] Updated ${namespace.join("/")}: ${parsed.data.justification.slice(0, 120)}`,
  );
  return parsed.data.preferences;
}

// ---------------------------------------------------------------------------
// Feedback events
// ---------------------------------------------------------------------------

/** Reviewer feedback destined for one profile. */
export interface PreferenceFeedback {
  category: PreferenceCategory;
  messages: BaseMessage[];
}

const TOOL_LABELS: Record<ReviewedToolName, string> = {
  write_email: "email draft",
  schedule_meeting: "calendar invitation",
  Question: "question",
};

function categoryForTool(toolName: ReviewedToolName): PreferenceCategory | null {
  switch (toolName) {
    case "write_email":
      return "response_preferences";
    case "schedule_meeting":
      return "cal_preferences";
    case "Question":
      return null;
  }
}

/**
 * Feedback implied by a reviewer's decision on a tool call, or null when
 * the decision teaches nothing (plain accepts, answered questions).
 */
export function feedbackForToolDecision(
  toolName: ReviewedToolName,
  decision: ReviewDecision,
  originalArgs: Record<string, unknown>,
  conversation: BaseMessage[],
): PreferenceFeedback | null {
  const label = TOOL_LABELS[toolName];

  if (decision.type === "ignore") {
    return {
      category: "triage_preferences",
      messages: [
        ...conversation,
        new HumanMessage(
          `The user ignored the ${label}. That means they did not want to respond to the email. ` +
            "Update the triage preferences to ensure emails of this type are not classified as respond.",
        ),
      ],
    };
  }

  const category = categoryForTool(toolName);
  if (category === null) {
    return null;
  }

  if (decision.type === "edit") {
    return {
      category,
      messages: [
        ...conversation,
        new HumanMessage(
          `The user edited the ${label}. ` +
            `Initial ${label} from the assistant: ${JSON.stringify(originalArgs)}. ` +
            `Edited ${label}: ${JSON.stringify(decision.args.args)}. ` +
            "Update the preferences to reflect the edit.",
        ),
      ],
    };
  }

  if (decision.type === "response") {
    return {
      category,
      messages: [
        ...conversation,
        new HumanMessage(
          `The user gave feedback on the ${label}: ${decision.args}. ` +
            "Update the preferences to reflect the feedback.",
        ),
      ],
    };
  }

  return null;
}

/**
 * Feedback implied by a reviewer's decision on a `notify` email.
 */
export function feedbackForNotifyDecision(
  decision: ReviewDecision,
  conversation: BaseMessage[],
): PreferenceFeedback | null {
  if (decision.type === "response") {
    return {
      category: "triage_preferences",
      messages: [
        ...conversation,
        new HumanMessage(
          "The user decided to respond to an email classified as notify. " +
            "Update the triage preferences to capture this.",
        ),
      ],
    };
  }
  if (decision.type === "ignore") {
    return {
      category: "triage_preferences",
      messages: [
        ...conversation,
        new HumanMessage(
          "The user ignored an email classified as notify. " +
            "Update the triage preferences so emails like it are ignored.",
        ),
      ],
    };
  }
  return null;
}

/**
 * Apply collected feedback in order. Failures are logged and skipped so a
 * memory problem never fails the run that produced the feedback.
 */
export async function applyPreferenceFeedback(
  store: BaseStore,
  model: StructuredModel,
  userId: string,
  feedback: readonly PreferenceFeedback[],
): Promise<void> {
  for (const entry of feedback) {
    const namespace = preferenceNamespace(userId, entry.category);
    try {
      await updatePreferences(store, namespace, model, entry.messages);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[memory] Preference update failed for ${namespace.join("/")}: ${message}`);
    }
  }
}
