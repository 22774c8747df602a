import { promises as fs } from "node:fs";
import { z } from "zod";
import type { ConfigFile, SyncDefaults, TokenStoreKind } from "../types.js";
import { atomicWrite, ensureDir } from "../utils/fs.js";
import { configDir, configFilePath } from "./paths.js";

const defaultsSchema = z
  .object({
    rootFolder: z.string().min(1).optional(),
    bucket: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    clientSecretPath: z.string().min(1).optional(),
    serviceAccountPath: z.string().min(1).optional(),
    concurrency: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

const configSchema = z.object({
  tokenStore: z.enum(["encrypted", "plain"]).optional(),
  defaults: defaultsSchema.default({}),
});

export async function loadConfig(): Promise<ConfigFile> {
  const filePath = configFilePath();
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { defaults: {} };
    }
    throw err;
  }
  const parsed = configSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(
      `Invalid config file ${filePath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

export async function saveConfig(config: ConfigFile) {
  await ensureDir(configDir());
  await atomicWrite(configFilePath(), JSON.stringify(config, null, 2));
}

export async function setTokenStore(tokenStore: TokenStoreKind) {
  const config = await loadConfig();
  config.tokenStore = tokenStore;
  await saveConfig(config);
}

export async function setDefaults(defaults: SyncDefaults) {
  const config = await loadConfig();
  config.defaults = defaultsSchema.parse({ ...config.defaults, ...defaults });
  await saveConfig(config);
}
