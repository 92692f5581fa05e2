import { startCallbackServer } from "./callback-server.js";
import type { OAuthManager } from "./oauth-manager.js";
import type { StoredTokens } from "./token-storage.js";
import type { Logger } from "../utils/logger.js";

/**
 * The interactive step that turns a user's consent into tokens. Production
 * opens a browser; tests substitute a flow that returns pre-obtained tokens.
 */
export interface AuthorizationFlow {
  authorize(): Promise<StoredTokens>;
}

export type UrlOpener = (url: string) => Promise<unknown>;

export interface BrowserFlowOptions {
  callbackTimeoutMs?: number;
  openUrl?: UrlOpener;
}

async function openInBrowser(url: string): Promise<unknown> {
  const open = (await import("open")).default;
  return open(url);
}

export class BrowserAuthorizationFlow implements AuthorizationFlow {
  private openUrl: UrlOpener;

  constructor(
    private oauthManager: OAuthManager,
    private logger: Logger,
    private options: BrowserFlowOptions = {}
  ) {
    this.openUrl = options.openUrl ?? openInBrowser;
  }

  async authorize(): Promise<StoredTokens> {
    // Bind the redirect port before sending the user anywhere.
    const server = await startCallbackServer(
      this.oauthManager.redirectPort,
      this.options.callbackTimeoutMs
    );

    try {
      const authUrl = this.oauthManager.getAuthorizationUrl();
      this.logger.info({ authUrl, port: server.port }, "Opening browser for Google authorization");

      const opened = this.openUrl(authUrl).catch((err: unknown) => {
        this.logger.warn(
          { error: err, authUrl },
          "Could not open browser automatically, visit the URL manually"
        );
      });

      const [code] = await Promise.all([server.code, opened]);
      return await this.oauthManager.exchangeCode(code);
    } finally {
      server.close();
    }
  }
}
