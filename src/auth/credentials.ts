import { AuthorizationError, TokenRevokedError, extractMessage } from "../utils/errors.js";
import { expiresSoon } from "./oauth-manager.js";
import type { AuthorizationFlow } from "./authorization-flow.js";
import type { OAuth2Client, OAuthManager } from "./oauth-manager.js";
import type { StoredTokens, TokenStorage } from "./token-storage.js";
import type { Logger } from "../utils/logger.js";

/**
 * Resolves an authenticated OAuth2 client for the run:
 * stored token → refreshed token → interactive authorization, in that order.
 * Whatever is obtained is persisted through the injected storage backend.
 * A refresh token Google has revoked is deleted from storage first.
 */
export class CredentialsManager {
  private session: Promise<OAuth2Client> | null = null;

  constructor(
    private oauthManager: OAuthManager,
    private tokenStorage: TokenStorage,
    private authorizationFlow: AuthorizationFlow,
    private logger: Logger
  ) {}

  getAuthenticatedClient(): Promise<OAuth2Client> {
    if (!this.session) {
      this.session = this.establishSession().catch((err: unknown) => {
        this.session = null;
        throw err;
      });
    }
    return this.session;
  }

  /** Forget the cached session so the next call re-reads storage. */
  reset(): void {
    this.session = null;
  }

  private async establishSession(): Promise<OAuth2Client> {
    const tokens = await this.resolveTokens();
    return this.oauthManager.createClient(tokens);
  }

  private async resolveTokens(): Promise<StoredTokens> {
    let stored: StoredTokens | null;
    try {
      stored = await this.tokenStorage.getTokens();
    } catch (err) {
      throw new AuthorizationError(`Could not read stored credentials: ${extractMessage(err)}`, {
        cause: err,
      });
    }

    if (stored && !expiresSoon(stored)) {
      this.logger.debug("Using stored access token");
      return stored;
    }

    if (stored) {
      try {
        const refreshed = await this.oauthManager.refresh(stored);
        await this.persist(refreshed);
        this.logger.info("Refreshed Google access token");
        return refreshed;
      } catch (err) {
        if (err instanceof TokenRevokedError) {
          this.logger.warn({ error: err }, "Stored refresh token was revoked, discarding it");
          await this.discard();
        } else if (err instanceof AuthorizationError) {
          throw err;
        } else {
          this.logger.warn({ error: err }, "Token refresh failed, falling back to interactive authorization");
        }
      }
    } else {
      this.logger.info("No stored credentials, starting interactive authorization");
    }

    let authorized: StoredTokens;
    try {
      authorized = await this.authorizationFlow.authorize();
    } catch (err) {
      throw new AuthorizationError(extractMessage(err), { cause: err });
    }
    await this.persist(authorized);
    this.logger.info("Authorization complete, credentials saved");
    return authorized;
  }

  private async discard(): Promise<void> {
    try {
      await this.tokenStorage.deleteTokens();
    } catch (err) {
      throw new AuthorizationError(`Could not delete revoked credentials: ${extractMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async persist(tokens: StoredTokens): Promise<void> {
    try {
      await this.tokenStorage.saveTokens(tokens);
    } catch (err) {
      throw new AuthorizationError(`Could not save credentials: ${extractMessage(err)}`, {
        cause: err,
      });
    }
  }
}
