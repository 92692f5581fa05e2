import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const ClientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

// Google Cloud Console downloads either an "installed" (desktop) or "web" client.
const ClientSecretFileSchema = z.union([
  z.object({ installed: ClientEntrySchema }),
  z.object({ web: ClientEntrySchema }),
]);

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

export function parseClientSecrets(json: unknown): ClientSecrets {
  const parsed = ClientSecretFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      'OAuth client secret file must contain an "installed" or "web" entry with client_id and client_secret'
    );
  }
  const entry = "installed" in parsed.data ? parsed.data.installed : parsed.data.web;
  return { clientId: entry.client_id, clientSecret: entry.client_secret };
}

export async function loadClientSecrets(path: string): Promise<ClientSecrets> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Could not read OAuth client secret file at ${path}. Download it from the Google Cloud Console (Desktop app client).`,
      { cause: err }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`OAuth client secret file at ${path} is not valid JSON`, { cause: err });
  }
  return parseClientSecrets(json);
}
