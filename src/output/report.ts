import type { ProcessedResult } from "../processor/types.js";

export const DIVIDER = "-".repeat(50);

/** One result block: header fields, summary, optional action items, divider. */
export function formatResult(result: ProcessedResult): string {
  const lines = [
    "",
    `Subject: ${result.subject}`,
    `From: ${result.sender}`,
    `Date: ${result.date}`,
    `Category: ${result.category}`,
    `Priority: ${result.priority}`,
    `Reply Needed: ${result.replyNeeded ? "Yes" : "No"}`,
    "",
    `Summary: ${result.summary}`,
  ];

  if (result.actionItems.length > 0) {
    lines.push("", "Action Items:");
    for (const item of result.actionItems) {
      lines.push(`- ${item}`);
    }
  }

  lines.push(DIVIDER);
  return lines.join("\n");
}

export function formatEmptyNotice(days: number): string {
  return days === 0
    ? "No unread messages today."
    : `No unread messages in the last ${days} day(s).`;
}

/** The whole console report, newline-terminated. */
export function formatReport(results: ProcessedResult[], days: number): string {
  if (results.length === 0) return `${formatEmptyNotice(days)}\n`;
  return results.map(formatResult).join("\n") + "\n";
}
