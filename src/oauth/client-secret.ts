import { promises as fs } from "node:fs";
import { z } from "zod";
import { AuthError } from "../errors.js";

export type ClientSecret = {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
};

const clientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).default([]),
});

// Google hands out either an "installed" (desktop) or a "web" client file.
const clientSecretFileSchema = z.union([
  z.object({ installed: clientEntrySchema }),
  z.object({ web: clientEntrySchema }),
]);

export function parseClientSecret(raw: string, source = "client secret"): ClientSecret {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new AuthError(`${source} is not valid JSON.`, { cause: err });
  }
  const parsed = clientSecretFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new AuthError(
      `${source} is not a Google OAuth client file (expected an "installed" or "web" entry with client_id and client_secret).`
    );
  }
  const entry =
    "installed" in parsed.data ? parsed.data.installed : parsed.data.web;
  return {
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    redirectUris: entry.redirect_uris,
  };
}

export async function readClientSecret(filePath: string): Promise<ClientSecret> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new AuthError(
        `Client secret file not found: ${filePath}. Download an OAuth client (Desktop app) from the Google Cloud console or pass --client-secret.`,
        { cause: err }
      );
    }
    throw new AuthError(`Failed to read client secret file ${filePath}.`, {
      cause: err,
    });
  }
  return parseClientSecret(raw, filePath);
}
