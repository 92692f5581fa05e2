import type { gmail_v1 } from "googleapis";

export type RawMessage = gmail_v1.Schema$Message;
export type RawMessagePart = gmail_v1.Schema$MessagePart;

export interface NormalizedMessage {
  id: string;
  subject: string;
  sender: string;
  /** The Date header as sent, or "" when absent. */
  date: string;
  /** Decoded plain text, truncated to the configured length. */
  body: string;
}

export interface MessageListPage {
  ids: string[];
  nextPageToken?: string;
}

/** The two read-only mail API operations the fetcher needs. */
export interface MailApi {
  listMessages(query: string, maxResults: number, pageToken?: string): Promise<MessageListPage>;
  getMessage(messageId: string): Promise<RawMessage>;
}
