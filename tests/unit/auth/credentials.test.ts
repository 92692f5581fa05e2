import { describe, it, expect, vi, beforeEach } from "vitest";
import { CredentialsManager } from "../../../src/auth/credentials.js";
import { MemoryTokenStorage } from "../../../src/auth/token-storage.js";
import { AuthorizationError, TokenRevokedError } from "../../../src/utils/errors.js";
import { createMockLogger, createPresetAuthorizationFlow } from "../../helpers/mocks.js";
import { createTokens } from "../../helpers/fixtures.js";
import type { OAuthManager } from "../../../src/auth/oauth-manager.js";
import type { StoredTokens } from "../../../src/auth/token-storage.js";
import type { Logger } from "../../../src/utils/logger.js";

const VALID = createTokens({ accessToken: "stored-token", expiryDate: new Date("2099-01-01T00:00:00Z") });
const EXPIRED = createTokens({ accessToken: "expired-token", expiryDate: new Date("2000-01-01T00:00:00Z") });
const REFRESHED = createTokens({ accessToken: "refreshed-token", expiryDate: new Date("2099-06-01T00:00:00Z") });
const AUTHORIZED = createTokens({ accessToken: "authorized-token", refreshToken: "new-refresh-token" });

function createOAuthManager() {
  const manager = {
    refresh: vi.fn().mockResolvedValue(REFRESHED),
    createClient: vi.fn((tokens: StoredTokens) => ({ accessToken: tokens.accessToken })),
  };
  return { manager, asManager: manager as unknown as OAuthManager };
}

describe("CredentialsManager", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it("reuses a valid stored token without refreshing or authorizing", async () => {
    const { manager, asManager } = createOAuthManager();
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    const credentials = new CredentialsManager(asManager, new MemoryTokenStorage(VALID), flow, logger);

    const client = await credentials.getAuthenticatedClient();

    expect(client).toEqual({ accessToken: "stored-token" });
    expect(manager.refresh).not.toHaveBeenCalled();
    expect(flow.authorizeMock).not.toHaveBeenCalled();
  });

  it("refreshes an expired token and persists the result", async () => {
    const { manager, asManager } = createOAuthManager();
    const storage = new MemoryTokenStorage(EXPIRED);
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    const credentials = new CredentialsManager(asManager, storage, flow, logger);

    const client = await credentials.getAuthenticatedClient();

    expect(manager.refresh).toHaveBeenCalledWith(EXPIRED);
    expect(client).toEqual({ accessToken: "refreshed-token" });
    expect(await storage.getTokens()).toEqual(REFRESHED);
    expect(flow.authorizeMock).not.toHaveBeenCalled();
  });

  it("falls back to interactive authorization when refresh fails", async () => {
    const { manager, asManager } = createOAuthManager();
    manager.refresh.mockRejectedValue(new Error("socket hang up"));
    const storage = new MemoryTokenStorage(EXPIRED);
    const deleteTokens = vi.spyOn(storage, "deleteTokens");
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    const credentials = new CredentialsManager(asManager, storage, flow, logger);

    const client = await credentials.getAuthenticatedClient();

    expect(flow.authorizeMock).toHaveBeenCalledTimes(1);
    expect(client).toEqual({ accessToken: "authorized-token" });
    expect(await storage.getTokens()).toEqual(AUTHORIZED);
    expect(deleteTokens).not.toHaveBeenCalled();
  });

  it("discards a revoked refresh token before re-authorizing", async () => {
    const { manager, asManager } = createOAuthManager();
    manager.refresh.mockRejectedValue(new TokenRevokedError("Refresh token rejected: invalid_grant"));
    const storage = new MemoryTokenStorage(EXPIRED);
    const deleteTokens = vi.spyOn(storage, "deleteTokens");
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    flow.authorizeMock.mockImplementationOnce(async () => {
      expect(await storage.getTokens()).toBeNull();
      return { ...AUTHORIZED };
    });
    const credentials = new CredentialsManager(asManager, storage, flow, logger);

    await credentials.getAuthenticatedClient();

    expect(deleteTokens).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ error: expect.any(TokenRevokedError) }),
      "Stored refresh token was revoked, discarding it"
    );
    expect(await storage.getTokens()).toEqual(AUTHORIZED);
  });

  it("raises AuthorizationError when a revoked token cannot be deleted", async () => {
    const { manager, asManager } = createOAuthManager();
    manager.refresh.mockRejectedValue(new TokenRevokedError("Refresh token rejected: invalid_grant"));
    const storage = new MemoryTokenStorage(EXPIRED);
    vi.spyOn(storage, "deleteTokens").mockRejectedValue(new Error("EROFS: read-only file system"));
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    const credentials = new CredentialsManager(asManager, storage, flow, logger);

    await expect(credentials.getAuthenticatedClient()).rejects.toThrow(
      "Could not delete revoked credentials: EROFS: read-only file system"
    );
    expect(flow.authorizeMock).not.toHaveBeenCalled();
  });

  it("authorizes interactively on first use and saves the tokens", async () => {
    const { asManager } = createOAuthManager();
    const storage = new MemoryTokenStorage();
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    const credentials = new CredentialsManager(asManager, storage, flow, logger);

    await credentials.getAuthenticatedClient();

    expect(flow.authorizeMock).toHaveBeenCalledTimes(1);
    expect(await storage.getTokens()).toEqual(AUTHORIZED);
  });

  it("raises AuthorizationError when the interactive flow fails", async () => {
    const { asManager } = createOAuthManager();
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    flow.authorizeMock.mockRejectedValue(new Error("OAuth authorization denied: access_denied"));
    const credentials = new CredentialsManager(asManager, new MemoryTokenStorage(), flow, logger);

    const error = await credentials.getAuthenticatedClient().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthorizationError);
    expect((error as AuthorizationError).message).toBe("OAuth authorization denied: access_denied");
  });

  it("raises AuthorizationError when the tokens cannot be saved", async () => {
    const { asManager } = createOAuthManager();
    const storage = new MemoryTokenStorage();
    vi.spyOn(storage, "saveTokens").mockRejectedValue(new Error("EACCES: permission denied"));
    const credentials = new CredentialsManager(
      asManager,
      storage,
      createPresetAuthorizationFlow(AUTHORIZED),
      logger
    );

    await expect(credentials.getAuthenticatedClient()).rejects.toThrow(
      "Could not save credentials: EACCES: permission denied"
    );
  });

  it("establishes the session once per run", async () => {
    const { asManager } = createOAuthManager();
    const storage = new MemoryTokenStorage(VALID);
    const getTokens = vi.spyOn(storage, "getTokens");
    const credentials = new CredentialsManager(
      asManager,
      storage,
      createPresetAuthorizationFlow(AUTHORIZED),
      logger
    );

    await credentials.getAuthenticatedClient();
    await credentials.getAuthenticatedClient();
    expect(getTokens).toHaveBeenCalledTimes(1);

    credentials.reset();
    await credentials.getAuthenticatedClient();
    expect(getTokens).toHaveBeenCalledTimes(2);
  });

  it("retries from storage after a failed attempt", async () => {
    const { asManager } = createOAuthManager();
    const storage = new MemoryTokenStorage();
    const flow = createPresetAuthorizationFlow(AUTHORIZED);
    flow.authorizeMock.mockRejectedValueOnce(new Error("timed out"));
    const credentials = new CredentialsManager(asManager, storage, flow, logger);

    await expect(credentials.getAuthenticatedClient()).rejects.toBeInstanceOf(AuthorizationError);
    await expect(credentials.getAuthenticatedClient()).resolves.toEqual({
      accessToken: "authorized-token",
    });
  });
});
