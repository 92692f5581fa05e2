#!/usr/bin/env node
import { loadConfig, resolveInferenceBaseUrl } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { describeError } from "./utils/errors.js";
import { generateRunId } from "./utils/id.js";
import { createGmailAuth } from "./auth/index.js";
import { GmailClient } from "./mail/gmail-client.js";
import { MailFetcher } from "./mail/fetcher.js";
import { OpenAICompatProvider } from "./llm/openai-compat.js";
import { MessageProcessor } from "./processor/message-processor.js";
import { runDigest } from "./digest.js";
import { formatReport } from "./output/report.js";

const logger = createLogger().child({ runId: generateRunId() });

async function main() {
  const config = loadConfig();
  logger.info(
    { days: config.days, model: config.inference.model, host: config.inference.host },
    "Configuration loaded"
  );

  const { credentials } = await createGmailAuth(config.gmail, logger.child({ component: "auth" }));

  const fetcher = new MailFetcher(
    new GmailClient(credentials),
    {
      pageSize: config.gmail.page_size,
      maxMessages: config.gmail.max_messages,
      bodyMaxChars: config.gmail.body_max_chars,
    },
    logger.child({ component: "mail-fetcher" })
  );

  const provider = new OpenAICompatProvider({
    name: "ollama",
    baseURL: resolveInferenceBaseUrl(config.inference.host),
    apiKey: config.inference.api_key,
    maxRetries: config.inference.max_retries,
  });

  const processor = new MessageProcessor(
    provider,
    {
      model: config.inference.model,
      maxTokens: config.inference.max_tokens,
      promptBodyChars: config.inference.prompt_body_chars,
    },
    logger.child({ component: "message-processor" })
  );

  const results = await runDigest({ fetcher, processor, logger }, config.days);
  process.stdout.write(formatReport(results, config.days));
}

main().catch((err: unknown) => {
  logger.fatal({ error: err }, describeError(err));
  process.exitCode = 1;
});
