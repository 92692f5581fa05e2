import { google } from "googleapis";
import { CALLBACK_PATH } from "./callback-server.js";
import { TokenRevokedError, extractMessage, isAuthFailure } from "../utils/errors.js";
import type { ClientSecrets } from "./client-secrets.js";
import type { StoredTokens } from "./token-storage.js";

export type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;
type GoogleCredentials = OAuth2Client["credentials"];

export interface OAuthOptions {
  redirectPort: number;
  scopes: string[];
}

const EXPIRY_BUFFER_MS = 5 * 60 * 1000;
const DEFAULT_TOKEN_LIFETIME_MS = 3600_000;

/** Stored tokens that expire within five minutes need a refresh before use. */
export function expiresSoon(tokens: StoredTokens, now: number = Date.now()): boolean {
  return tokens.expiryDate.getTime() - EXPIRY_BUFFER_MS <= now;
}

/** Google OAuth2 operations for a desktop client redirecting to localhost. */
export class OAuthManager {
  constructor(
    private secrets: ClientSecrets,
    private options: OAuthOptions
  ) {}

  get redirectPort(): number {
    return this.options.redirectPort;
  }

  get redirectUri(): string {
    return `http://localhost:${this.options.redirectPort}${CALLBACK_PATH}`;
  }

  getAuthorizationUrl(): string {
    return this.newClient().generateAuthUrl({
      access_type: "offline",
      scope: this.options.scopes,
      // Without consent Google omits the refresh token on re-authorization.
      prompt: "consent",
    });
  }

  async exchangeCode(code: string): Promise<StoredTokens> {
    const { tokens } = await this.newClient().getToken(code);
    if (!tokens.refresh_token) {
      throw new Error("Google returned no refresh token for the authorization code");
    }
    return this.toStoredTokens(tokens, tokens.refresh_token);
  }

  /**
   * Trade the stored refresh token for a new access token. A refresh token
   * Google has revoked or expired raises TokenRevokedError; other failures
   * propagate unchanged.
   */
  async refresh(stored: StoredTokens): Promise<StoredTokens> {
    const client = this.newClient();
    client.setCredentials({ refresh_token: stored.refreshToken });

    let credentials: GoogleCredentials;
    try {
      ({ credentials } = await client.refreshAccessToken());
    } catch (err) {
      if (isAuthFailure(err)) {
        throw new TokenRevokedError(`Refresh token rejected: ${extractMessage(err)}`, { cause: err });
      }
      throw err;
    }
    return this.toStoredTokens(credentials, stored.refreshToken);
  }

  /** A client carrying the full token set, so googleapis can refresh it mid-run. */
  createClient(tokens: StoredTokens): OAuth2Client {
    const client = this.newClient();
    client.setCredentials({
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      token_type: tokens.tokenType,
      expiry_date: tokens.expiryDate.getTime(),
    });
    return client;
  }

  private newClient(): OAuth2Client {
    return new google.auth.OAuth2(this.secrets.clientId, this.secrets.clientSecret, this.redirectUri);
  }

  private toStoredTokens(credentials: GoogleCredentials, refreshToken: string): StoredTokens {
    if (!credentials.access_token) {
      throw new Error("Google returned no access token");
    }
    return {
      accessToken: credentials.access_token,
      refreshToken: credentials.refresh_token ?? refreshToken,
      tokenType: credentials.token_type ?? "Bearer",
      expiryDate: new Date(credentials.expiry_date ?? Date.now() + DEFAULT_TOKEN_LIFETIME_MS),
      scope: credentials.scope ?? this.options.scopes.join(" "),
    };
  }
}
