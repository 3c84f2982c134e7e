/**
 * Graph registry tests.
 */

import { beforeEach, describe, expect, test, vi } from "vitest";

import {
  DEFAULT_GRAPH_ID,
  getAvailableGraphIds,
  isGraphRegistered,
  registerGraph,
  resetRegistry,
  resolveGraphFactory,
  resolveGraphId,
  type GraphFactory,
} from "../src/graphs";
import { graph as emailAssistantGraph } from "../src/graphs/email-assistant";
import { ScriptedToolModel, createTestAssistant, routerAnswer } from "./support/fixtures";

function stubFactory(): GraphFactory {
  const { graph } = createTestAssistant({
    router: routerAnswer("ignore"),
    agent: new ScriptedToolModel([]),
  });
  return async () => graph;
}

beforeEach(() => {
  resetRegistry();
});

describe("graph registry", () => {
  test("default graph id", () => {
    expect(DEFAULT_GRAPH_ID).toBe("email_assistant");
  });

  test("built-in variants are registered", () => {
    expect(getAvailableGraphIds()).toEqual([
      "email_assistant",
      "email_assistant_hitl",
      "email_assistant_hitl_memory",
    ]);
    expect(isGraphRegistered("email_assistant_hitl_memory")).toBe(true);
  });

  test("missing ids resolve to the default", () => {
    expect(resolveGraphFactory()).toBe(emailAssistantGraph);
    expect(resolveGraphFactory(null)).toBe(emailAssistantGraph);
    expect(resolveGraphId(undefined)).toBe("email_assistant");
  });

  test("unknown ids fall back with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(resolveGraphFactory("research_agent")).toBe(emailAssistantGraph);
    expect(resolveGraphId("research_agent")).toBe("email_assistant");
    expect(warn).toHaveBeenCalledOnce();
  });

  test("variants are distinct factories", () => {
    expect(resolveGraphFactory("email_assistant_hitl")).not.toBe(emailAssistantGraph);
    expect(resolveGraphId("email_assistant_hitl")).toBe("email_assistant_hitl");
  });

  test("registerGraph adds and replaces entries", () => {
    const factory = stubFactory();
    registerGraph("triage_only", factory);
    expect(resolveGraphFactory("triage_only")).toBe(factory);

    registerGraph(DEFAULT_GRAPH_ID, factory);
    expect(resolveGraphFactory()).toBe(factory);
  });

  test("registerGraph rejects empty ids", () => {
    expect(() => registerGraph("", stubFactory())).toThrow(
      "registerGraph: graphId must be a non-empty string",
    );
  });

  test("resetRegistry drops custom entries", () => {
    registerGraph("triage_only", stubFactory());
    resetRegistry();
    expect(isGraphRegistered("triage_only")).toBe(false);
  });
});
