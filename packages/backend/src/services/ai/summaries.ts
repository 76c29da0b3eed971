import type { Email } from "@crm/shared";
import { complete_text } from "./openai.js";

type SummarizableEmail = Pick<
  Email,
  "subject" | "content" | "sender_email" | "sender_name" | "recipient_email" | "recipient_name" | "cc"
>;

function format_party(name: string | null, email: string | null): string {
  if (name && email) return `${name} <${email}>`;
  return name ?? email ?? "unknown";
}

export function format_email_for_prompt(email: SummarizableEmail): string {
  const lines = [
    `From: ${format_party(email.sender_name, email.sender_email)}`,
    `To: ${format_party(email.recipient_name, email.recipient_email)}`,
  ];
  if (email.cc.length > 0) {
    lines.push(`Cc: ${email.cc.join(", ")}`);
  }
  lines.push(`Subject: ${email.subject}`, "", email.content);
  return lines.join("\n");
}

export function build_summary_prompt(owner_name: string): string {
  return [
    `The mailbox belongs to ${owner_name}.`,
    `Whenever the email mentions ${owner_name}, refer to them as "you".`,
    "Summarize the email in at most two short sentences.",
    "Reply with the summary only.",
  ].join(" ");
}

export async function summarize_email(owner_name: string, email: SummarizableEmail): Promise<string> {
  return complete_text(build_summary_prompt(owner_name), format_email_for_prompt(email), 0.05);
}
