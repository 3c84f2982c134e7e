/**
 * Reviewer interrupts: tool call review, notification review, resume
 * validation and preference learning.
 */

import { describe, expect, test, vi } from "vitest";

import { ReviewDecisionError } from "../src/graphs/email-assistant/errors";
import { preferenceNamespace } from "../src/graphs/email-assistant/memory";
import {
  DEFAULT_CAL_PREFERENCES,
  DEFAULT_TRIAGE_INSTRUCTIONS,
} from "../src/graphs/email-assistant/prompts";
import {
  SKIPPED_AFTER_STOP_MESSAGE,
  buildNotifyReviewRequest,
  buildToolReviewRequest,
} from "../src/graphs/email-assistant/review";
import type { RunOutcome } from "../src/runs/runner";
import {
  SAMPLE_EMAIL,
  ScriptedToolModel,
  StaticStructuredModel,
  createTestAssistant,
  routerAnswer,
  toolTurn,
} from "./support/fixtures";

const DRAFT = {
  to: "alice@example.com",
  subject: "Re: Quarterly planning",
  content: "Tuesday works.",
};

const MEETING = {
  attendees: ["alice@example.com", "robin@example.com"],
  subject: "Roadmap review",
  duration_minutes: 30,
  preferred_day: "2025-04-22",
  start_time: 1400,
};

const HITL = { hitl: true };

function pendingActions(outcome: RunOutcome): unknown[] {
  if (outcome.status !== "interrupted") {
    return [];
  }
  return outcome.interrupts.map((item) => item.value);
}

function toolContents(outcome: RunOutcome): string[] {
  return outcome.messages
    .filter((message) => message.role === "tool")
    .map((message) => message.content);
}

// ---------------------------------------------------------------------------
// Tool call review
// ---------------------------------------------------------------------------

describe("tool call review", () => {
  function draftThenDone() {
    return new ScriptedToolModel([
      toolTurn("turn-1", [
        ["check_calendar_availability", { day: "2025-04-22" }],
        ["write_email", DRAFT],
      ]),
      toolTurn("turn-2", [["Done", { done: true }]]),
    ]);
  }

  test("write_email pauses for review", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent: draftThenDone(),
      configurable: HITL,
    });

    const outcome = await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    expect(outcome.status).toBe("interrupted");
    expect(pendingActions(outcome)).toEqual([
      buildToolReviewRequest("write_email", DRAFT, SAMPLE_EMAIL),
    ]);
    expect(outcome.messages.map((message) => message.role)).toEqual(["user", "assistant"]);

    const state = await runner.getThreadState("thread-1");
    expect(state.next).toEqual(["tool_handler"]);
  });

  test("accept runs the draft and keeps result order", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent: draftThenDone(),
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const outcome = await runner.resume("thread-1", { type: "accept" });

    expect(outcome.status).toBe("completed");
    expect(
      outcome.messages
        .filter((message) => message.role === "tool")
        .map((message) => message.tool_call_id),
    ).toEqual(["turn-1-call-0", "turn-1-call-1", "turn-2-call-0"]);
    expect(toolContents(outcome)).toEqual([
      "Available times on 2025-04-22: 9:00 AM, 2:00 PM, 4:00 PM",
      "Email sent to alice@example.com with subject 'Re: Quarterly planning' and content: Tuesday works.",
      "Done",
    ]);
  });

  test("edit rewrites the stored call before running it", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent: draftThenDone(),
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const edited = { ...DRAFT, content: "Tuesday at 2pm works." };
    const outcome = await runner.resume("thread-1", { type: "edit", args: { args: edited } });

    expect(outcome.messages[1].id).toBe("turn-1");
    expect(outcome.messages[1].tool_calls).toEqual([
      { id: "turn-1-call-0", name: "check_calendar_availability", args: { day: "2025-04-22" } },
      { id: "turn-1-call-1", name: "write_email", args: edited },
    ]);
    expect(outcome.messages[3].content).toBe(
      "Email sent to alice@example.com with subject 'Re: Quarterly planning' and content: Tuesday at 2pm works.",
    );
  });

  test("response becomes the tool result and the loop continues", async () => {
    const agent = draftThenDone();
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent,
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const outcome = await runner.resume("thread-1", { type: "response", args: "Mention the agenda" });

    expect(outcome.status).toBe("completed");
    expect(outcome.messages[3].content).toBe(
      "User gave feedback, which we can incorporate into the email. Feedback: Mention the agenda",
    );
    expect(agent.turnsTaken).toBe(2);
  });

  test("ignore ends the loop and skips later calls", async () => {
    const agent = new ScriptedToolModel([
      toolTurn("turn-1", [
        ["write_email", DRAFT],
        ["schedule_meeting", MEETING],
      ]),
    ]);
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent,
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const outcome = await runner.resume("thread-1", [{ type: "ignore" }]);

    expect(outcome.status).toBe("completed");
    expect(toolContents(outcome)).toEqual([
      "User ignored this email draft. Ignore this email and end the workflow.",
      SKIPPED_AFTER_STOP_MESSAGE,
    ]);
    expect(agent.turnsTaken).toBe(1);
  });

  test("each reviewed call in a batch gets its own interrupt", async () => {
    const agent = new ScriptedToolModel([
      toolTurn("turn-1", [
        ["schedule_meeting", MEETING],
        ["write_email", DRAFT],
      ]),
      toolTurn("turn-2", [["Done", { done: true }]]),
    ]);
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent,
      configurable: HITL,
    });

    const first = await runner.submit("thread-1", { email: SAMPLE_EMAIL });
    expect(pendingActions(first)).toEqual([
      buildToolReviewRequest("schedule_meeting", MEETING, SAMPLE_EMAIL),
    ]);

    const second = await runner.resume("thread-1", { type: "accept" });
    expect(pendingActions(second)).toEqual([
      buildToolReviewRequest("write_email", DRAFT, SAMPLE_EMAIL),
    ]);

    const done = await runner.resume("thread-1", { type: "accept" });
    expect(done.status).toBe("completed");
    expect(toolContents(done)).toEqual([
      "Meeting 'Roadmap review' scheduled on Tuesday, April 22, 2025 at 1400 for 30 minutes with 2 attendees",
      "Email sent to alice@example.com with subject 'Re: Quarterly planning' and content: Tuesday works.",
      "Done",
    ]);
  });

  test("a Question is answered by the reviewer", async () => {
    const agent = new ScriptedToolModel([
      toolTurn("turn-1", [["Question", { content: "Which day works?" }]]),
      toolTurn("turn-2", [["Done", { done: true }]]),
    ]);
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent,
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const outcome = await runner.resume("thread-1", { type: "response", args: "Tuesday" });

    expect(toolContents(outcome)).toEqual([
      "User answered the question, which we can use for any follow up actions. Feedback: Tuesday",
      "Done",
    ]);
  });

  test("check_calendar_availability and Done never pause", async () => {
    const agent = new ScriptedToolModel([
      toolTurn("turn-1", [
        ["check_calendar_availability", { day: "2025-04-22" }],
        ["Done", { done: true }],
      ]),
    ]);
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent,
      configurable: HITL,
    });

    const outcome = await runner.submit("thread-1", { email: SAMPLE_EMAIL });
    expect(outcome.status).toBe("completed");
  });
});

// ---------------------------------------------------------------------------
// Notification review
// ---------------------------------------------------------------------------

describe("notification review", () => {
  test("notify pauses with the email", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("notify"),
      agent: new ScriptedToolModel([]),
      configurable: HITL,
    });

    const outcome = await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    expect(outcome.classification).toBe("notify");
    expect(pendingActions(outcome)).toEqual([buildNotifyReviewRequest(SAMPLE_EMAIL)]);
  });

  test("ignore dismisses the notification", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("notify"),
      agent: new ScriptedToolModel([]),
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const outcome = await runner.resume("thread-1", { type: "ignore" });

    expect(outcome).toEqual({
      thread_id: "thread-1",
      status: "completed",
      classification: "notify",
      messages: [],
    });
  });

  test("response hands the email to the response loop", async () => {
    const agent = new ScriptedToolModel([toolTurn("turn-1", [["Done", { done: true }]])]);
    const { runner } = createTestAssistant({
      router: routerAnswer("notify"),
      agent,
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    const outcome = await runner.resume("thread-1", { type: "response", args: "Say I'll attend" });

    expect(outcome.status).toBe("completed");
    expect(outcome.messages[1]).toEqual({
      id: expect.any(String),
      role: "user",
      content: "User wants to reply to the email. Use this feedback to respond: Say I'll attend",
    });
    expect(agent.turnsTaken).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Runner guards
// ---------------------------------------------------------------------------

describe("resume validation", () => {
  test("a disallowed action is rejected and the thread stays suspended", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("notify"),
      agent: new ScriptedToolModel([]),
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    await expect(runner.resume("thread-1", { type: "accept" })).rejects.toThrow(
      'Review action "accept" is not allowed for "Email Assistant: notify"',
    );
    const state = await runner.getThreadState("thread-1");
    expect(state.interrupts).toHaveLength(1);
  });

  test("an edit with invalid args is rejected and the review stays open", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("respond"),
      agent: new ScriptedToolModel([
        toolTurn("turn-1", [["write_email", DRAFT]]),
        toolTurn("turn-2", [["Done", { done: true }]]),
        toolTurn("turn-3", [["Done", { done: true }]]),
      ]),
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    await expect(
      runner.resume("thread-1", { type: "edit", args: { args: { to: "" } } }),
    ).rejects.toThrow(
      'Edited arguments for "write_email" are invalid: ' +
        "to: String must contain at least 1 character(s); subject: Required; content: Required",
    );
    const state = await runner.getThreadState("thread-1");
    expect(state.interrupts).toHaveLength(1);

    const outcome = await runner.resume("thread-1", { type: "accept" });
    expect(outcome.status).toBe("completed");
    expect(toolContents(outcome)).toEqual([
      "Email sent to alice@example.com with subject 'Re: Quarterly planning' and content: Tuesday works.",
      "Done",
    ]);

    const next = await runner.submit("thread-1", { message: "Anything else?" });
    expect(next.status).toBe("completed");
  });

  test("a malformed value is rejected", async () => {
    const { runner } = createTestAssistant({
      router: routerAnswer("notify"),
      agent: new ScriptedToolModel([]),
      configurable: HITL,
    });
    await runner.submit("thread-1", { email: SAMPLE_EMAIL });

    await expect(runner.resume("thread-1", "yes")).rejects.toBeInstanceOf(ReviewDecisionError);
  });
});

// ---------------------------------------------------------------------------
// Preference memory
// ---------------------------------------------------------------------------

describe("preference memory", () => {
  const LEARNED = "Keep replies under three sentences.";

  async function storedContent(
    store: ReturnType<typeof createTestAssistant>["store"],
    namespace: string[],
  ): Promise<unknown> {
    const item = await store.get(namespace, "user_preferences");
    return item?.value.content;
  }

  test("an edited draft updates response preferences for the run's user", async () => {
    const agent = new ScriptedToolModel([
      toolTurn("turn-1", [["write_email", DRAFT]]),
      toolTurn("turn-2", [["Done", { done: true }]]),
    ]);
    const memory = new StaticStructuredModel({
      preferences: LEARNED,
      justification: "User shortened the draft",
    });
    const { runner, store } = createTestAssistant({
      router: routerAnswer("respond"),
      agent,
      memory,
      configurable: { hitl: true, memory: true },
    });
    const run = { user_id: "user-42" };

    await runner.submit("thread-1", { email: SAMPLE_EMAIL }, run);
    expect(await storedContent(store, preferenceNamespace("user-42", "triage_preferences"))).toBe(
      DEFAULT_TRIAGE_INSTRUCTIONS,
    );

    await runner.resume(
      "thread-1",
      { type: "edit", args: { args: { ...DRAFT, content: "Tuesday." } } },
      run,
    );

    expect(memory.prompts).toHaveLength(1);
    expect(await storedContent(store, preferenceNamespace("user-42", "response_preferences"))).toBe(
      LEARNED,
    );
    expect(await storedContent(store, preferenceNamespace("user-42", "cal_preferences"))).toBe(
      DEFAULT_CAL_PREFERENCES,
    );
    expect(String(agent.prompts[1][0].content)).toContain(LEARNED);
  });

  test("a dismissed notification updates triage preferences", async () => {
    const memory = new StaticStructuredModel({
      preferences: "Ignore planning FYIs.",
      justification: "User dismissed it",
    });
    const { runner, store } = createTestAssistant({
      router: routerAnswer("notify"),
      agent: new ScriptedToolModel([]),
      memory,
      configurable: { hitl: true, memory: true },
    });

    await runner.submit("thread-1", { email: SAMPLE_EMAIL });
    await runner.resume("thread-1", { type: "ignore" });

    expect(await storedContent(store, preferenceNamespace("default", "triage_preferences"))).toBe(
      "Ignore planning FYIs.",
    );
  });

  test("a failing memory model does not fail the run", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { runner } = createTestAssistant({
      router: routerAnswer("notify"),
      agent: new ScriptedToolModel([]),
      memory: new StaticStructuredModel(null),
      configurable: { hitl: true, memory: true },
    });

    await runner.submit("thread-1", { email: SAMPLE_EMAIL });
    const outcome = await runner.resume("thread-1", { type: "ignore" });

    expect(outcome.status).toBe("completed");
    expect(warn).toHaveBeenCalledWith(
      "[memory] Preference update failed for email_assistant/default/triage_preferences: " +
        "Memory model returned an invalid profile for email_assistant/default/triage_preferences",
    );
  });

  test("memory without a memory model is a build error", () => {
    expect(() =>
      createTestAssistant({
        router: routerAnswer("respond"),
        agent: new ScriptedToolModel([]),
        configurable: { memory: true },
      }),
    ).toThrow("[email-assistant] memory requires both a store and a memory model");
  });
});
