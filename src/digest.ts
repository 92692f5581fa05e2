import type { NormalizedMessage } from "./mail/types.js";
import type { ProcessedResult } from "./processor/types.js";
import type { Logger } from "./utils/logger.js";

export interface DigestDeps {
  fetcher: { getUnreadMessages(days: number): Promise<NormalizedMessage[]> };
  processor: { process(messages: NormalizedMessage[]): Promise<ProcessedResult[]> };
  logger: Logger;
}

/** Fetch the unread window, then analyze it. No inference call is made for an empty window. */
export async function runDigest(deps: DigestDeps, days: number): Promise<ProcessedResult[]> {
  const messages = await deps.fetcher.getUnreadMessages(days);
  if (messages.length === 0) return [];

  deps.logger.info({ count: messages.length }, "Processing messages");
  const results = await deps.processor.process(messages);

  const failed = results.filter((r) => r.error !== undefined).length;
  deps.logger.info({ processed: results.length, failed }, "Digest complete");
  return results;
}
