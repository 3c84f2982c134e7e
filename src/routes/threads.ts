/**
 * Thread run routes.
 *
 *   POST /threads/:thread_id/runs    — Submit an email or message
 *   POST /threads/:thread_id/resume  — Answer a pending review interrupt
 *   GET  /threads/:thread_id/state   — Current thread snapshot (query: graph_id)
 *
 * Runs execute synchronously: the response is the run outcome, either
 * `completed` or `interrupted` with the pending review requests. Typed
 * failures propagate to the router's error boundary, which maps their
 * `kind` to a status code.
 */

import type { Router } from "../router";
import { RunCreateSchema, RunResumeSchema } from "../models/run";
import { getRunner } from "../runs";
import { jsonResponse, requireBody } from "./helpers";

export function registerThreadRoutes(router: Router): void {
  router.post("/threads/:thread_id/runs", handleCreateRun);
  router.post("/threads/:thread_id/resume", handleResumeRun);
  router.get("/threads/:thread_id/state", handleGetThreadState);
}

// ---------------------------------------------------------------------------
// POST /threads/:thread_id/runs
// ---------------------------------------------------------------------------

async function handleCreateRun(
  request: Request,
  params: Record<string, string>,
): Promise<Response> {
  const parsed = await requireBody(request, RunCreateSchema);
  if (!parsed.ok) {
    return parsed.response;
  }
  const { graph_id, input, config } = parsed.body;

  const runner = await getRunner(graph_id);
  const outcome = await runner.submit(params.thread_id, input, config?.configurable);
  return jsonResponse(outcome);
}

// ---------------------------------------------------------------------------
// POST /threads/:thread_id/resume
// ---------------------------------------------------------------------------

async function handleResumeRun(
  request: Request,
  params: Record<string, string>,
): Promise<Response> {
  const parsed = await requireBody(request, RunResumeSchema);
  if (!parsed.ok) {
    return parsed.response;
  }
  const { graph_id, resume, config } = parsed.body;

  const runner = await getRunner(graph_id);
  const outcome = await runner.resume(params.thread_id, resume, config?.configurable);
  return jsonResponse(outcome);
}

// ---------------------------------------------------------------------------
// GET /threads/:thread_id/state
// ---------------------------------------------------------------------------

async function handleGetThreadState(
  _request: Request,
  params: Record<string, string>,
  query: URLSearchParams,
): Promise<Response> {
  const runner = await getRunner(query.get("graph_id"));
  const state = await runner.getThreadState(params.thread_id);
  return jsonResponse(state);
}
