/**
 * Request bodies for the run endpoints.
 *
 * Field naming convention: snake_case matching the JSON property names.
 */

import { z } from "zod";

import { EmailInputSchema } from "../graphs/email-assistant/schemas";

/**
 * Run-level configuration. `configurable` is merged into the graph's
 * runnable config (e.g. `user_id`, `prompt_overrides`).
 */
const RunConfigSchema = z.object({
  configurable: z.record(z.unknown()).default({}),
});

/**
 * POST /threads/:thread_id/runs
 *
 * Exactly one of `email` (goes through triage) or `message` (goes straight
 * to the response loop); the parsed body carries it as `input`.
 */
export const RunCreateSchema = z
  .object({
    graph_id: z.string().min(1).optional(),
    email: EmailInputSchema.optional(),
    message: z.string().min(1).optional(),
    config: RunConfigSchema.optional(),
  })
  .transform(({ email, message, ...rest }, ctx) => {
    if (email !== undefined && message === undefined) {
      return { ...rest, input: { email } };
    }
    if (message !== undefined && email === undefined) {
      return { ...rest, input: { message } };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Provide exactly one of email or message",
    });
    return z.NEVER;
  });

export type RunCreate = z.infer<typeof RunCreateSchema>;

/**
 * POST /threads/:thread_id/resume
 */
export const RunResumeSchema = z
  .object({
    graph_id: z.string().min(1).optional(),
    resume: z.unknown(),
    config: RunConfigSchema.optional(),
  })
  .refine((body) => body.resume !== undefined && body.resume !== null, {
    message: "resume is required",
    path: ["resume"],
  });

export type RunResume = z.infer<typeof RunResumeSchema>;
