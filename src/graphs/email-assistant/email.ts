/**
 * Rendering helpers for emails and tool calls shown to the model and to
 * human reviewers.
 */

import type { EmailInput } from "./schemas";

/**
 * Render an email as the markdown block used in agent instructions and
 * review descriptions.
 *
 * @example
 *   formatEmailMarkdown({ author: "a@x.io", to: "b@x.io", subject: "Hi", email_thread: "Body" })
 *   // → "\n\n**Subject**: Hi\n**From**: a@x.io\n**To**: b@x.io\n\nBody\n\n---\n"
 */
export function formatEmailMarkdown(email: EmailInput): string {
  return (
    `\n\n**Subject**: ${email.subject}\n` +
    `**From**: ${email.author}\n` +
    `**To**: ${email.to}\n\n` +
    `${email.email_thread}\n\n---\n`
  );
}

/**
 * Render a pending tool call for a reviewer.
 */
export function formatToolCallForDisplay(
  name: string,
  args: Record<string, unknown>,
): string {
  if (name === "write_email") {
    return (
      `# Email Draft\n\n` +
      `**To**: ${String(args.to ?? "")}\n` +
      `**Subject**: ${String(args.subject ?? "")}\n\n` +
      `${String(args.content ?? "")}`
    );
  }

  if (name === "schedule_meeting") {
    const attendees = Array.isArray(args.attendees)
      ? args.attendees.map(String).join(", ")
      : String(args.attendees ?? "");
    return (
      `# Calendar Invite\n\n` +
      `**Meeting**: ${String(args.subject ?? "")}\n` +
      `**Attendees**: ${attendees}\n` +
      `**Duration**: ${String(args.duration_minutes ?? "")} minutes\n` +
      `**Day**: ${String(args.preferred_day ?? "")}`
    );
  }

  if (name === "Question") {
    return `# Question for User\n\n${String(args.content ?? "")}`;
  }

  return `# Tool Call: ${name}\n\nArguments:\n${JSON.stringify(args, null, 2)}`;
}
