/**
 * Error taxonomy for a digest run.
 *
 * Fatal: ConfigError, AuthorizationError, MailRequestError. These abort the run.
 * Per message: InferenceError, MalformedReplyError. These are converted into a
 * placeholder result by the processor and never escape it.
 */

export type ErrorCode =
  | "CONFIG_INVALID"
  | "AUTHORIZATION_FAILED"
  | "MAIL_REQUEST_FAILED"
  | "INFERENCE_FAILED"
  | "MALFORMED_REPLY";

export class MailTriageError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MailTriageError";
    this.code = code;
  }
}

export class ConfigError extends MailTriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_INVALID", options);
    this.name = "ConfigError";
  }
}

/** Session could not be established, or the provider rejected the credentials. */
export class AuthorizationError extends MailTriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "AUTHORIZATION_FAILED", options);
    this.name = "AuthorizationError";
  }
}

/** Google no longer accepts the stored refresh token. */
export class TokenRevokedError extends AuthorizationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TokenRevokedError";
  }
}

/** A mail API request failed for a reason other than authorization. */
export class MailRequestError extends MailTriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "MAIL_REQUEST_FAILED", options);
    this.name = "MailRequestError";
  }
}

export class InferenceError extends MailTriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INFERENCE_FAILED", options);
    this.name = "InferenceError";
  }
}

export class MalformedReplyError extends MailTriageError {
  readonly reply: string;

  constructor(message: string, reply: string) {
    super(message, "MALFORMED_REPLY");
    this.name = "MalformedReplyError";
    this.reply = reply;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** HTTP status carried by a googleapis/gaxios or openai error, if any. */
export function extractStatusCode(err: unknown): number | null {
  if (!isRecord(err)) return null;

  if (typeof err.status === "number") return err.status;
  if (typeof err.statusCode === "number") return err.statusCode;
  if (typeof err.code === "number") return err.code;
  if (isRecord(err.response) && typeof err.response.status === "number") {
    return err.response.status;
  }
  if (isRecord(err.error) && typeof err.error.code === "number") {
    return err.error.code;
  }
  return null;
}

export function extractMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (isRecord(err)) {
    if (typeof err.message === "string") return err.message;
    if (isRecord(err.error) && typeof err.error.message === "string") {
      return err.error.message;
    }
  }
  return String(err ?? "");
}

/** True when a provider error means the credentials were rejected or revoked. */
export function isAuthFailure(err: unknown): boolean {
  const status = extractStatusCode(err);
  if (status === 401) return true;

  const msg = extractMessage(err).toLowerCase();
  if (
    msg.includes("invalid_grant") ||
    msg.includes("invalid credentials") ||
    msg.includes("token has been expired or revoked") ||
    msg.includes("insufficient authentication scopes") ||
    msg.includes("insufficient permission")
  ) {
    return true;
  }

  return status === 403 && msg.includes("auth");
}

/** One-line, secret-free description for the operator. */
export function describeError(err: unknown): string {
  if (err instanceof AuthorizationError) {
    return `Authorization failed: ${err.message}. Delete the token file and run setup:email-oauth to re-authorize.`;
  }
  if (err instanceof MailRequestError) {
    return `Mail request failed: ${err.message}`;
  }
  if (err instanceof ConfigError) {
    return `Invalid configuration: ${err.message}`;
  }

  const msg = extractMessage(err).toLowerCase();
  if (
    msg.includes("econnrefused") ||
    msg.includes("enotfound") ||
    msg.includes("econnreset") ||
    msg.includes("connection error")
  ) {
    return "Could not reach the inference endpoint. Is Ollama running?";
  }

  return extractMessage(err) || "Unknown error";
}
