import { truncate } from "../utils/text.js";
import { SUGGESTED_CATEGORIES } from "./types.js";
import type { NormalizedMessage } from "../mail/types.js";

export const SYSTEM_PROMPT =
  "You are an email triage assistant. You read one email at a time and answer " +
  "only in the exact labeled format you are asked for, with no extra commentary.";

/** Render the analysis instruction for one message. */
export function buildAnalysisPrompt(message: NormalizedMessage, bodyChars: number): string {
  const body = message.body.trim()
    ? truncate(message.body.trim(), bodyChars, true)
    : "(empty)";

  return `Analyze the email below and reply using exactly these five labeled sections, in this order:

Category: one of ${SUGGESTED_CATEGORIES.join(", ")}
Priority: High, Medium or Low
Summary: a brief summary in 2-3 sentences
Reply Needed: Yes or No
Action Items:
- one action item per line, each starting with "- "
Write "Action Items: None" if there is nothing to do.

Email:
Subject: ${message.subject || "(no subject)"}
From: ${message.sender || "(unknown sender)"}
Date: ${message.date || "(unknown date)"}
Body:
${body}`;
}
