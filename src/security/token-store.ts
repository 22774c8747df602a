import crypto from "node:crypto";
import { existsSync, promises as fs, readFileSync } from "node:fs";
import path from "node:path";
import { password as promptPassword } from "@inquirer/prompts";
import PQueue from "p-queue";
import { z } from "zod";
import { plainTokenFilePath, tokenFilePath } from "../config/paths.js";
import type { AuthStatus, TokenSet, TokenStoreKind } from "../types.js";
import { atomicWrite, ensureDir } from "../utils/fs.js";

export type TokenStore = {
  get(alias: string): Promise<TokenSet | null>;
  set(alias: string, tokens: TokenSet): Promise<void>;
  remove(alias: string): Promise<void>;
};

const TOKEN_ENV = "DRIVE_S3_SYNC_TOKEN_PASSWORD";
// Token files hold refresh tokens; keep them owner-only.
const TOKEN_FILE_MODE = 0o600;

let cachedPassword: string | null = null;
const fileStoreQueue = new PQueue({ concurrency: 1 });

async function getMasterPassword(intent: "read" | "write") {
  if (cachedPassword !== null) {
    return cachedPassword;
  }
  const fromEnv = process.env[TOKEN_ENV];
  if (fromEnv !== undefined) {
    cachedPassword = fromEnv;
    return cachedPassword;
  }
  if (!process.stdin.isTTY) {
    throw new Error(
      `Encrypted token store requires a password. Set ${TOKEN_ENV} to run non-interactively.`
    );
  }
  cachedPassword = await promptPassword({
    message:
      intent === "read"
        ? "Enter master password to unlock Google Drive tokens"
        : "Create a master password to encrypt Google Drive tokens",
    mask: "*",
  });
  return cachedPassword;
}

const tokenSetSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string().optional(),
  refreshInvalid: z.boolean().optional(),
  expiresAt: z.number(),
  scopes: z.array(z.string()),
  tokenType: z.string().optional(),
});

const tokenFileSchema = z.record(tokenSetSchema);

const encryptedPayloadSchema = z.object({
  version: z.number(),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  ciphertext: z.string(),
});

type EncryptedPayload = z.infer<typeof encryptedPayloadSchema>;

function parseTokens(raw: string, filePath: string): Record<string, TokenSet> {
  const parsed = tokenFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Token file ${filePath} is malformed.`);
  }
  return parsed.data;
}

async function readTokenFile(filePath: string) {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

async function writeTokenFile(filePath: string, contents: string) {
  await ensureDir(path.dirname(filePath));
  await atomicWrite(filePath, contents, { mode: TOKEN_FILE_MODE });
  await fs.chmod(filePath, TOKEN_FILE_MODE);
}

async function loadEncryptedFile(
  filePath: string,
  password: string
): Promise<Record<string, TokenSet>> {
  const raw = await readTokenFile(filePath);
  if (raw === null) {
    return {};
  }
  const parsed = encryptedPayloadSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Token file ${filePath} is malformed.`);
  }
  const payload = parsed.data;
  if (!payload.ciphertext) {
    return {};
  }
  const salt = Buffer.from(payload.salt, "base64");
  const iv = Buffer.from(payload.iv, "base64");
  const tag = Buffer.from(payload.tag, "base64");
  const ciphertext = Buffer.from(payload.ciphertext, "base64");
  const key = crypto.scryptSync(password, salt, 32);
  const decipher = crypto.createDecipheriv("aes-256-gcm", key, iv);
  decipher.setAuthTag(tag);
  const decrypted = Buffer.concat([
    decipher.update(ciphertext),
    decipher.final(),
  ]).toString("utf8");
  return parseTokens(decrypted, filePath);
}

async function saveEncryptedFile(
  filePath: string,
  password: string,
  tokens: Record<string, TokenSet>
) {
  const salt = crypto.randomBytes(16);
  const iv = crypto.randomBytes(12);
  const key = crypto.scryptSync(password, salt, 32);
  const cipher = crypto.createCipheriv("aes-256-gcm", key, iv);
  const ciphertext = Buffer.concat([
    cipher.update(JSON.stringify(tokens), "utf8"),
    cipher.final(),
  ]);
  const payload: EncryptedPayload = {
    version: 1,
    salt: salt.toString("base64"),
    iv: iv.toString("base64"),
    tag: cipher.getAuthTag().toString("base64"),
    ciphertext: ciphertext.toString("base64"),
  };
  await writeTokenFile(filePath, JSON.stringify(payload, null, 2));
}

async function loadPlainFile(
  filePath: string
): Promise<Record<string, TokenSet>> {
  const raw = await readTokenFile(filePath);
  if (raw === null) {
    return {};
  }
  return parseTokens(raw, filePath);
}

class EncryptedFileTokenStore implements TokenStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async get(alias: string) {
    const password = await getMasterPassword("read");
    const tokens = await loadEncryptedFile(this.filePath, password);
    return tokens[alias] ?? null;
  }

  async set(alias: string, tokens: TokenSet) {
    await fileStoreQueue.add(async () => {
      const password = await getMasterPassword("write");
      const existing = await loadEncryptedFile(this.filePath, password);
      existing[alias] = tokens;
      await saveEncryptedFile(this.filePath, password, existing);
    });
  }

  async remove(alias: string) {
    await fileStoreQueue.add(async () => {
      const password = await getMasterPassword("read");
      const existing = await loadEncryptedFile(this.filePath, password);
      if (existing[alias]) {
        delete existing[alias];
        await saveEncryptedFile(this.filePath, password, existing);
      }
    });
  }
}

class PlaintextTokenStore implements TokenStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async get(alias: string) {
    const tokens = await loadPlainFile(this.filePath);
    return tokens[alias] ?? null;
  }

  async set(alias: string, tokens: TokenSet) {
    await fileStoreQueue.add(async () => {
      const existing = await loadPlainFile(this.filePath);
      existing[alias] = tokens;
      await writeTokenFile(this.filePath, JSON.stringify(existing, null, 2));
    });
  }

  async remove(alias: string) {
    await fileStoreQueue.add(async () => {
      const existing = await loadPlainFile(this.filePath);
      if (existing[alias]) {
        delete existing[alias];
        await writeTokenFile(this.filePath, JSON.stringify(existing, null, 2));
      }
    });
  }
}

export function isTokenStoreKind(value: string): value is TokenStoreKind {
  return value === "encrypted" || value === "plain";
}

export function normalizeTokenStoreKind(value?: string): TokenStoreKind | null {
  if (!value) {
    return null;
  }
  const normalized = value.toLowerCase();
  return isTokenStoreKind(normalized) ? normalized : null;
}

/** Format an existing token file was written in; null when there is none. */
export function detectTokenFileKind(filePath: string): TokenStoreKind | null {
  if (!existsSync(filePath)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new Error(`Token file ${filePath} is malformed.`, { cause: err });
  }
  return encryptedPayloadSchema.safeParse(parsed).success ? "encrypted" : "plain";
}

/**
 * A token file given on the command line is read in the format it already
 * has. Otherwise the environment, then config.json, then whichever default
 * file exists decides.
 */
export function resolveTokenStoreKind(options: {
  configured?: TokenStoreKind;
  tokenFile?: string;
  env?: Record<string, string | undefined>;
}): TokenStoreKind {
  const env = options.env ?? process.env;
  if (options.tokenFile) {
    const detected = detectTokenFileKind(options.tokenFile);
    if (detected) {
      return detected;
    }
  }
  const fromEnv = normalizeTokenStoreKind(env.DRIVE_S3_SYNC_TOKEN_STORE);
  if (fromEnv) {
    return fromEnv;
  }
  if (options.configured) {
    return options.configured;
  }
  if (options.tokenFile) {
    return "plain";
  }
  const plainExists = existsSync(plainTokenFilePath());
  const encryptedExists = existsSync(tokenFilePath());
  if (encryptedExists && !plainExists) {
    return "encrypted";
  }
  return "plain";
}

/**
 * Switching kinds moves tokens between the two default files. A custom
 * token file is a single file in a single format, so it cannot take part.
 */
export function assertTokenStoreSwitchable(tokenFile?: string) {
  if (tokenFile) {
    throw new Error(
      `Cannot switch token stores while --token-file is set; ${tokenFile} keeps the format it was written in. Run token-store without --token-file to change the default store.`
    );
  }
}

/** Moves one alias's tokens from the default file of one kind to the other. */
export async function migrateTokens(options: {
  from: TokenStoreKind;
  to: TokenStoreKind;
  alias: string;
}) {
  const fromStore = createTokenStore({ store: options.from });
  const toStore = createTokenStore({ store: options.to });
  const tokens = await fromStore.get(options.alias);
  if (!tokens) {
    return false;
  }
  await toStore.set(options.alias, tokens);
  await fromStore.remove(options.alias);
  return true;
}

export async function getAuthStatusForAlias(options: {
  alias: string;
  tokenStore: TokenStore;
  storeKind: TokenStoreKind;
  allowPrompt?: boolean;
}): Promise<AuthStatus> {
  const allowPrompt = options.allowPrompt ?? false;
  if (
    options.storeKind === "encrypted" &&
    !allowPrompt &&
    cachedPassword === null &&
    process.env[TOKEN_ENV] === undefined
  ) {
    return {
      status: "locked",
      reason: `Encrypted token store is locked. Set ${TOKEN_ENV} or run interactively.`,
    };
  }
  const tokens = await options.tokenStore.get(options.alias);
  if (!tokens) {
    return {
      status: "missing",
      reason: "No tokens found. Run `drive-s3-sync login` to authenticate.",
    };
  }
  if (tokens.refreshInvalid) {
    return {
      status: "invalid",
      reason: `Stored refresh token is invalid. Run \`drive-s3-sync login --account ${options.alias}\` to reauthenticate.`,
    };
  }
  if (tokens.expiresAt < Date.now() && !tokens.refreshToken) {
    return {
      status: "expired",
      reason: "Token expired and no refresh token available. Run login again.",
    };
  }
  return { status: "ok" };
}

export function createTokenStore(options?: {
  store?: TokenStoreKind;
  filePath?: string;
}): TokenStore {
  const store = options?.store ?? "plain";
  if (store === "encrypted") {
    return new EncryptedFileTokenStore(options?.filePath ?? tokenFilePath());
  }
  return new PlaintextTokenStore(options?.filePath ?? plainTokenFilePath());
}
