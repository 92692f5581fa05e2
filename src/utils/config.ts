import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const GmailConfigSchema = z.object({
  client_secret_path: z.string().default("./credentials.json"),
  token_path: z.string().default("./token.json"),
  redirect_port: z.number().int().positive().default(3000),
  scopes: z
    .array(z.string())
    .nonempty()
    .default(["https://www.googleapis.com/auth/gmail.readonly"]),
  page_size: z.number().int().min(1).max(500).default(100),
  max_messages: z.number().int().positive().default(100),
  body_max_chars: z.number().int().positive().default(5000),
});

const InferenceConfigSchema = z.object({
  host: z.string().default("localhost:11434"),
  model: z.string().min(1).default("qwen3:1.7b"),
  // Ollama ignores the key, but the OpenAI SDK refuses to start without one.
  api_key: z.string().default("ollama"),
  max_tokens: z.number().int().positive().default(1024),
  max_retries: z.number().int().min(0).default(2),
  prompt_body_chars: z.number().int().positive().default(2000),
});

const AppConfigSchema = z.object({
  days: z.number().int().min(0).default(1),
  gmail: GmailConfigSchema.default({}),
  inference: InferenceConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type GmailConfig = z.infer<typeof GmailConfigSchema>;
export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values. A missing file means all defaults.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const path = configPath ?? env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const fileContent = readFileSync(path, "utf-8");
    let parsed: unknown;
    try {
      parsed = yaml.load(fileContent);
    } catch (err) {
      throw new ConfigError(`Could not parse ${path}`, { cause: err });
    }
    if (parsed !== undefined && parsed !== null) {
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`${path} must contain a mapping at the top level`);
      }
      rawConfig = parsed;
    }
  }

  applyEnvOverrides(rawConfig, env);

  const result = AppConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(issues, { cause: result.error });
  }
  return result.data;
}

/**
 * OpenAI-compatible base URL for an Ollama host. Accepts the same forms as
 * OLLAMA_HOST: "host:port", "http://host:port" or a URL that already ends in /v1.
 */
export function resolveInferenceBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, "");
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `http://${trimmed}`;
  return withScheme.endsWith("/v1") ? withScheme : `${withScheme}/v1`;
}

function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): void {
  const gmail = ensureObject(config, "gmail");
  const inference = ensureObject(config, "inference");

  if (env.DAYS_TO_FETCH) config.days = parseNumber(env.DAYS_TO_FETCH, "DAYS_TO_FETCH");

  if (env.GMAIL_CLIENT_SECRET_PATH) gmail.client_secret_path = env.GMAIL_CLIENT_SECRET_PATH;
  if (env.GMAIL_TOKEN_PATH) gmail.token_path = env.GMAIL_TOKEN_PATH;
  if (env.GMAIL_OAUTH_REDIRECT_PORT) {
    gmail.redirect_port = parseNumber(env.GMAIL_OAUTH_REDIRECT_PORT, "GMAIL_OAUTH_REDIRECT_PORT");
  }

  if (env.OLLAMA_HOST) inference.host = env.OLLAMA_HOST;
  if (env.OLLAMA_MODEL) inference.model = env.OLLAMA_MODEL;
}

function parseNumber(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return n;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isPlainObject(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}
