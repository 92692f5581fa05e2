#!/usr/bin/env tsx
/**
 * Interactive CLI for setting up Gmail OAuth2 authentication ahead of a run.
 *
 * Usage: npm run setup:email-oauth
 *
 * Prerequisites:
 *   1. Create a Google Cloud OAuth client (Desktop app type)
 *   2. Download its JSON to ./credentials.json (or set GMAIL_CLIENT_SECRET_PATH)
 *
 * The digest itself also authorizes on first use; this only lets you do it
 * before an unattended run, or replace a revoked token.
 */
import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { describeError } from "../utils/errors.js";
import { createGmailAuth } from "../auth/index.js";

const logger = createLogger("setup-email-oauth");

async function main() {
  const config = loadConfig();
  const { authorizationFlow, tokenStorage } = await createGmailAuth(config.gmail, logger);

  logger.info(
    {
      redirectPort: config.gmail.redirect_port,
      scopes: config.gmail.scopes,
      tokenPath: config.gmail.token_path,
    },
    "Starting Gmail authorization"
  );

  const tokens = await authorizationFlow.authorize();
  await tokenStorage.saveTokens(tokens);

  logger.info({ tokenPath: config.gmail.token_path }, "OAuth tokens saved, setup complete");
}

main().catch((err: unknown) => {
  logger.fatal({ error: err }, describeError(err));
  process.exitCode = 1;
});
