import { google, type gmail_v1 } from "googleapis";
import {
  AuthorizationError,
  MailRequestError,
  extractMessage,
  isAuthFailure,
} from "../utils/errors.js";
import type { CredentialsManager } from "../auth/credentials.js";
import type { MailApi, MessageListPage, RawMessage } from "./types.js";

/** Read-only Gmail REST client. Errors are mapped to the run's fatal error types. */
export class GmailClient implements MailApi {
  private gmail: gmail_v1.Gmail | null = null;

  constructor(private credentials: CredentialsManager) {}

  private async getGmailApi(): Promise<gmail_v1.Gmail> {
    if (!this.gmail) {
      const auth = await this.credentials.getAuthenticatedClient();
      this.gmail = google.gmail({ version: "v1", auth });
    }
    return this.gmail;
  }

  async listMessages(
    query: string,
    maxResults: number,
    pageToken?: string
  ): Promise<MessageListPage> {
    const gmail = await this.getGmailApi();
    try {
      const res = await gmail.users.messages.list({
        userId: "me",
        q: query,
        maxResults,
        pageToken,
      });
      const ids = (res.data.messages ?? [])
        .map((m) => m.id)
        .filter((id): id is string => typeof id === "string" && id.length > 0);
      return { ids, nextPageToken: res.data.nextPageToken ?? undefined };
    } catch (err) {
      throw this.mapError(err, "list messages");
    }
  }

  async getMessage(messageId: string): Promise<RawMessage> {
    const gmail = await this.getGmailApi();
    try {
      const res = await gmail.users.messages.get({
        userId: "me",
        id: messageId,
        format: "full",
      });
      return res.data;
    } catch (err) {
      throw this.mapError(err, `get message ${messageId}`);
    }
  }

  private mapError(err: unknown, operation: string): Error {
    if (isAuthFailure(err)) {
      // The stored token is unusable; make the next call re-resolve it.
      this.gmail = null;
      this.credentials.reset();
      return new AuthorizationError(`Gmail rejected the credentials (${operation}): ${extractMessage(err)}`, {
        cause: err,
      });
    }
    return new MailRequestError(`Failed to ${operation}: ${extractMessage(err)}`, { cause: err });
  }
}
