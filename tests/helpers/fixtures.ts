import type { LLMResponse } from "../../src/llm/provider.js";
import type { NormalizedMessage, RawMessage, RawMessagePart } from "../../src/mail/types.js";
import type { StoredTokens } from "../../src/auth/token-storage.js";

export function createTextResponse(text: string | null): LLMResponse {
  return {
    text,
    stopReason: "end_turn",
    usage: { inputTokens: 100, outputTokens: 50 },
  };
}

export function encodeBase64Url(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64url");
}

export function createTokens(overrides: Partial<StoredTokens> = {}): StoredTokens {
  return {
    accessToken: "test-access-token",
    refreshToken: "test-refresh-token",
    tokenType: "Bearer",
    expiryDate: new Date("2030-01-01T00:00:00Z"),
    scope: "https://www.googleapis.com/auth/gmail.readonly",
    ...overrides,
  };
}

export interface RawMessageOptions {
  id: string;
  subject?: string;
  from?: string;
  date?: string;
  body?: string;
  internalDate?: number;
  payload?: RawMessagePart;
}

/** A single-part text/plain Gmail message in "full" format. */
export function createRawMessage(options: RawMessageOptions): RawMessage {
  const headers = [];
  if (options.subject !== undefined) headers.push({ name: "Subject", value: options.subject });
  if (options.from !== undefined) headers.push({ name: "From", value: options.from });
  if (options.date !== undefined) headers.push({ name: "Date", value: options.date });

  return {
    id: options.id,
    threadId: `thread-${options.id}`,
    labelIds: ["UNREAD", "INBOX"],
    internalDate: options.internalDate !== undefined ? String(options.internalDate) : undefined,
    payload: options.payload ?? {
      mimeType: "text/plain",
      headers,
      body: { data: encodeBase64Url(options.body ?? ""), size: (options.body ?? "").length },
    },
  };
}

export function createMessage(overrides: Partial<NormalizedMessage> = {}): NormalizedMessage {
  return {
    id: "msg-1",
    subject: "Test subject",
    sender: "sender@example.com",
    date: "Mon, 19 Oct 2026 09:00:00 +0000",
    body: "Test body",
    ...overrides,
  };
}

export const SHIPPING_BODY =
  "Good news! Your order #10422 has shipped via USPS. " +
  "Tracking number: 9400 1000 0000 0000 0000 00. Expected delivery: Thursday.";

export const COMPLETE_REPLY = [
  "Category: Work",
  "Priority: Medium",
  "Summary: Your YoYoExpert order #10422 has shipped via USPS and should arrive Thursday.",
  "Reply Needed: No",
  "Action Items:",
  "- Track the package with the USPS tracking number",
  "- Be available for delivery on Thursday",
].join("\n");
