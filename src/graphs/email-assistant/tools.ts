/**
 * Tool registry for the response loop.
 *
 * Tools are LangChain `DynamicStructuredTool`s, bound to the model as-is.
 * The model's tool calls are untyped JSON; `executeTool()` checks them
 * against the tool's zod schema before the handler sees them and turns
 * failures into typed errors:
 *
 *   - unknown name          → ToolDispatchError   (ToolRegistry.require)
 *   - schema mismatch       → ToolArgumentError
 *   - handler throws        → ToolExecutionError
 *
 * The registry is fixed at construction. `Done` is the terminal marker: the
 * response loop ends after a batch that contains it.
 */

import {
  DynamicStructuredTool,
  ToolInputParsingException,
  type StructuredToolInterface,
} from "@langchain/core/tools";
import { z } from "zod";

import { ToolArgumentError, ToolDispatchError, ToolExecutionError } from "./errors";

// ---------------------------------------------------------------------------
// Names
// ---------------------------------------------------------------------------

export const EMAIL_TOOL_NAMES = [
  "write_email",
  "schedule_meeting",
  "check_calendar_availability",
  "Question",
  "Done",
] as const;

export type EmailToolName = (typeof EMAIL_TOOL_NAMES)[number];

/** Tool name reserved for loop termination. */
export const DONE_TOOL_NAME = "Done" satisfies EmailToolName;

export function isEmailToolName(name: string): name is EmailToolName {
  return (EMAIL_TOOL_NAMES as readonly string[]).includes(name);
}

export function isTerminalTool(name: string): boolean {
  return name === DONE_TOOL_NAME;
}

// ---------------------------------------------------------------------------
// Tool definitions
// ---------------------------------------------------------------------------

export const WriteEmailArgsSchema = z.object({
  to: z.string().min(1).describe("Recipient email address"),
  subject: z.string().describe("Email subject line"),
  content: z.string().describe("Email body"),
});

export type WriteEmailArgs = z.infer<typeof WriteEmailArgsSchema>;

export const writeEmailTool = new DynamicStructuredTool({
  name: "write_email",
  description: "Write and send an email.",
  schema: WriteEmailArgsSchema,
  func: async ({ to, subject, content }: WriteEmailArgs): Promise<string> =>
    `Email sent to ${to} with subject '${subject}' and content: ${content}`,
});

const ISO_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Parse the calendar day of an ISO date or datetime string as a UTC date.
 * Any time component is ignored. Returns null for impossible dates.
 */
export function parseMeetingDay(value: string): Date | null {
  const match = ISO_DAY_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

const MEETING_DAY_FORMAT = new Intl.DateTimeFormat("en-US", {
  weekday: "long",
  year: "numeric",
  month: "long",
  day: "2-digit",
  timeZone: "UTC",
});

/** e.g. `2025-04-22` → `Tuesday, April 22, 2025` */
export function formatMeetingDay(date: Date): string {
  return MEETING_DAY_FORMAT.format(date);
}

export const ScheduleMeetingArgsSchema = z.object({
  attendees: z.array(z.string().min(1)).min(1).describe("Attendee email addresses"),
  subject: z.string().describe("Meeting title"),
  duration_minutes: z.number().int().positive().describe("Length in minutes"),
  preferred_day: z
    .string()
    .refine((value) => parseMeetingDay(value) !== null, {
      message: "preferred_day must be an ISO date (YYYY-MM-DD)",
    })
    .describe("Day of the meeting as an ISO date"),
  start_time: z
    .number()
    .int()
    .min(0)
    .max(2359)
    .describe("Start time as a 24h HHMM integer, e.g. 1400"),
});

export type ScheduleMeetingArgs = z.infer<typeof ScheduleMeetingArgsSchema>;

export const scheduleMeetingTool = new DynamicStructuredTool({
  name: "schedule_meeting",
  description: "Schedule a calendar meeting.",
  schema: ScheduleMeetingArgsSchema,
  func: async ({
    attendees,
    subject,
    duration_minutes,
    preferred_day,
    start_time,
  }: ScheduleMeetingArgs): Promise<string> => {
    const day = parseMeetingDay(preferred_day);
    if (day === null) {
      throw new Error(`Unparseable preferred_day: ${preferred_day}`);
    }
    return (
      `Meeting '${subject}' scheduled on ${formatMeetingDay(day)} at ${start_time} ` +
      `for ${duration_minutes} minutes with ${attendees.length} attendees`
    );
  },
});

export const CheckAvailabilityArgsSchema = z.object({
  day: z.string().min(1).describe("Day to check, e.g. 2025-04-22"),
});

/** Open slots reported for every day. */
export const AVAILABLE_SLOTS = ["9:00 AM", "2:00 PM", "4:00 PM"] as const;

export const checkCalendarAvailabilityTool = new DynamicStructuredTool({
  name: "check_calendar_availability",
  description: "Check calendar availability for a given day.",
  schema: CheckAvailabilityArgsSchema,
  func: async ({ day }: z.infer<typeof CheckAvailabilityArgsSchema>): Promise<string> =>
    `Available times on ${day}: ${AVAILABLE_SLOTS.join(", ")}`,
});

export const QuestionArgsSchema = z.object({
  content: z.string().min(1).describe("The question to ask the user"),
});

// Answered by a reviewer; the handler only runs if the tool is dispatched
// without review.
export const questionTool = new DynamicStructuredTool({
  name: "Question",
  description: "Question to ask the user.",
  schema: QuestionArgsSchema,
  func: async ({ content }: z.infer<typeof QuestionArgsSchema>): Promise<string> =>
    `Question for the user: ${content}`,
});

export const DoneArgsSchema = z.object({
  done: z.boolean().describe("Set to true once the email has been handled"),
});

export const doneTool = new DynamicStructuredTool({
  name: DONE_TOOL_NAME,
  description: "E-mail has been sent.",
  schema: DoneArgsSchema,
  func: async (): Promise<string> => "Done",
});

// ---------------------------------------------------------------------------
// Argument validation
// ---------------------------------------------------------------------------

const TOOL_ARG_SCHEMAS: Record<EmailToolName, z.ZodTypeAny> = {
  write_email: WriteEmailArgsSchema,
  schedule_meeting: ScheduleMeetingArgsSchema,
  check_calendar_availability: CheckAvailabilityArgsSchema,
  Question: QuestionArgsSchema,
  Done: DoneArgsSchema,
};

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Schema problems with `args` for a tool, formatted `path: message`.
 * Empty when the args are valid.
 */
export function toolArgIssues(toolName: EmailToolName, args: unknown): string[] {
  const parsed = TOOL_ARG_SCHEMAS[toolName].safeParse(args);
  return parsed.success ? [] : parsed.error.issues.map(formatIssue);
}

/**
 * Validate `args` and run the tool.
 *
 * @throws ToolArgumentError when validation fails.
 * @throws ToolExecutionError when the handler throws.
 */
export async function executeTool(
  tool: StructuredToolInterface,
  args: Record<string, unknown>,
  callId: string,
): Promise<string> {
  if (isEmailToolName(tool.name)) {
    const issues = toolArgIssues(tool.name, args);
    if (issues.length > 0) {
      throw new ToolArgumentError(tool.name, callId, issues);
    }
  }

  let output: unknown;
  try {
    output = await tool.invoke(args);
  } catch (error: unknown) {
    if (error instanceof ToolInputParsingException) {
      throw new ToolArgumentError(tool.name, callId, [error.message]);
    }
    throw new ToolExecutionError(tool.name, callId, error);
  }
  return typeof output === "string" ? output : JSON.stringify(output);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, StructuredToolInterface>;

  constructor(tools: readonly StructuredToolInterface[]) {
    const byName = new Map<string, StructuredToolInterface>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`ToolRegistry: duplicate tool "${tool.name}"`);
      }
      byName.set(tool.name, tool);
    }
    this.tools = byName;
  }

  get(name: string): StructuredToolInterface | undefined {
    return this.tools.get(name);
  }

  /**
   * @throws ToolDispatchError when `name` is not registered.
   */
  require(name: string, callId: string): StructuredToolInterface {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      throw new ToolDispatchError(name, callId);
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Tool instances for `bindTools()`, in registration order. */
  list(): StructuredToolInterface[] {
    return Array.from(this.tools.values());
  }
}

/**
 * Build the registry for a graph variant. `Question` is only offered when a
 * human reviewer is there to answer it.
 */
export function createToolRegistry(
  options: { includeQuestion?: boolean } = {},
): ToolRegistry {
  const tools: StructuredToolInterface[] = [
    writeEmailTool,
    scheduleMeetingTool,
    checkCalendarAvailabilityTool,
  ];
  if (options.includeQuestion) {
    tools.push(questionTool);
  }
  tools.push(doneTool);
  return new ToolRegistry(tools);
}
