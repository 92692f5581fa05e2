import { extractBody, getHeader } from "./body.js";
import { buildUnreadQuery, windowStart } from "./query.js";
import { truncate } from "../utils/text.js";
import type { Logger } from "../utils/logger.js";
import type { MailApi, NormalizedMessage, RawMessage } from "./types.js";

export interface MailFetcherConfig {
  pageSize: number;
  maxMessages: number;
  bodyMaxChars: number;
}

export class MailFetcher {
  constructor(
    private api: MailApi,
    private config: MailFetcherConfig,
    private logger: Logger,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Unread messages received within the last `days` days (0 = today), in the
   * order the provider lists them. Auth and request failures propagate; a body
   * that cannot be decoded becomes "".
   */
  async getUnreadMessages(days: number): Promise<NormalizedMessage[]> {
    const start = windowStart(days, this.now());
    const query = buildUnreadQuery(start);
    this.logger.info({ days, query }, "Listing unread messages");

    const ids = await this.listIds(query);
    if (ids.length === 0) {
      this.logger.info("No unread messages in window");
      return [];
    }

    const messages: NormalizedMessage[] = [];
    for (const id of ids) {
      const raw = await this.api.getMessage(id);

      const received = receivedAt(raw);
      if (received !== null && received < start.getTime()) {
        this.logger.debug({ messageId: id }, "Skipping message received before window");
        continue;
      }

      messages.push(this.normalize(id, raw));
    }

    this.logger.info({ count: messages.length }, "Fetched unread messages");
    return messages;
  }

  normalize(id: string, raw: RawMessage): NormalizedMessage {
    const payload = raw.payload;
    const extracted = extractBody(payload);
    if (extracted.decodeFailed) {
      this.logger.warn(
        { messageId: id, mimeType: extracted.mimeType },
        "Could not decode message body, continuing with an empty body"
      );
    }

    return {
      id: raw.id ?? id,
      subject: getHeader(payload, "Subject"),
      sender: getHeader(payload, "From"),
      date: getHeader(payload, "Date"),
      body: truncate(extracted.text.trim(), this.config.bodyMaxChars),
    };
  }

  private async listIds(query: string): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const remaining = this.config.maxMessages - ids.length;
      const page = await this.api.listMessages(
        query,
        Math.min(this.config.pageSize, remaining),
        pageToken
      );
      ids.push(...page.ids.slice(0, remaining));
      pageToken = page.nextPageToken;
    } while (pageToken && ids.length < this.config.maxMessages);

    if (pageToken) {
      this.logger.warn(
        { maxMessages: this.config.maxMessages },
        "More unread messages than the configured cap, the rest are skipped"
      );
    }
    return ids;
  }
}

function receivedAt(raw: RawMessage): number | null {
  if (!raw.internalDate) return null;
  const ms = Number(raw.internalDate);
  return Number.isFinite(ms) ? ms : null;
}
