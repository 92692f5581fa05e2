import { readFile, writeFile, rm, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";

export interface StoredTokens {
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiryDate: Date;
  scope: string;
}

/** Where the OAuth credentials live between runs. */
export interface TokenStorage {
  getTokens(): Promise<StoredTokens | null>;
  saveTokens(tokens: StoredTokens): Promise<void>;
  deleteTokens(): Promise<void>;
}

const TokenFileSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  token_type: z.string().default("Bearer"),
  expiry_date: z.string().datetime(),
  scope: z.string().default(""),
});

/**
 * JSON token file. A missing file means "not yet authorized"; an unreadable or
 * corrupt one is logged and treated the same way so the run can re-authorize.
 */
export class FileTokenStorage implements TokenStorage {
  constructor(
    private path: string,
    private logger: Logger
  ) {}

  async getTokens(): Promise<StoredTokens | null> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      this.logger.warn({ path: this.path }, "Token file is not valid JSON, ignoring it");
      return null;
    }

    const parsed = TokenFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ path: this.path }, "Token file has an unexpected shape, ignoring it");
      return null;
    }

    return {
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      tokenType: parsed.data.token_type,
      expiryDate: new Date(parsed.data.expiry_date),
      scope: parsed.data.scope,
    };
  }

  async saveTokens(tokens: StoredTokens): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const file: z.input<typeof TokenFileSchema> = {
      access_token: tokens.accessToken,
      refresh_token: tokens.refreshToken,
      token_type: tokens.tokenType,
      expiry_date: tokens.expiryDate.toISOString(),
      scope: tokens.scope,
    };
    await writeFile(this.path, JSON.stringify(file, null, 2) + "\n", {
      encoding: "utf-8",
      mode: 0o600,
    });
  }

  async deleteTokens(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

export class MemoryTokenStorage implements TokenStorage {
  private tokens: StoredTokens | null;

  constructor(initial: StoredTokens | null = null) {
    this.tokens = initial;
  }

  async getTokens(): Promise<StoredTokens | null> {
    return this.tokens ? { ...this.tokens } : null;
  }

  async saveTokens(tokens: StoredTokens): Promise<void> {
    this.tokens = { ...tokens };
  }

  async deleteTokens(): Promise<void> {
    this.tokens = null;
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
