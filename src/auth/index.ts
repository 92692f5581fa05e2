import { loadClientSecrets } from "./client-secrets.js";
import { OAuthManager } from "./oauth-manager.js";
import { FileTokenStorage } from "./token-storage.js";
import { BrowserAuthorizationFlow } from "./authorization-flow.js";
import { CredentialsManager } from "./credentials.js";
import type { GmailConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";

export interface GmailAuth {
  oauthManager: OAuthManager;
  tokenStorage: FileTokenStorage;
  authorizationFlow: BrowserAuthorizationFlow;
  credentials: CredentialsManager;
}

/** Wire the file-backed, browser-authorized credential stack from config. */
export async function createGmailAuth(config: GmailConfig, logger: Logger): Promise<GmailAuth> {
  const secrets = await loadClientSecrets(config.client_secret_path);
  const oauthManager = new OAuthManager(secrets, {
    redirectPort: config.redirect_port,
    scopes: [...config.scopes],
  });
  const tokenStorage = new FileTokenStorage(config.token_path, logger);
  const authorizationFlow = new BrowserAuthorizationFlow(oauthManager, logger);
  const credentials = new CredentialsManager(oauthManager, tokenStorage, authorizationFlow, logger);

  return { oauthManager, tokenStorage, authorizationFlow, credentials };
}
