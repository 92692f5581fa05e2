/**
 * Structured logging with redaction.
 *
 * Logs are written to stderr so that stdout carries only the digest report.
 * Email bodies, prompts, tokens and client secrets are never logged; any of
 * the paths below is replaced with "[REDACTED]".
 */
import pino from "pino";

export function createLogger(name?: string) {
  const level = process.env.LOG_LEVEL ?? "info";
  const options: pino.LoggerOptions = {
    name: name ?? "mail-triage",
    level,
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "body",
        "prompt",
        "reply",
        "accessToken",
        "refreshToken",
        "clientSecret",
        "token",
        "*.body",
        "*.prompt",
        "*.reply",
        "*.accessToken",
        "*.refreshToken",
        "*.clientSecret",
      ],
      censor: "[REDACTED]",
    },
  };

  if (process.env.NODE_ENV !== "production") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino(options, pino.destination(2));
}

export type Logger = pino.Logger;
