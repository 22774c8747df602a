import { z } from "zod";
import type { SyncDefaults } from "../types.js";

export const DEFAULT_ROOT_FOLDER = "Dataset";
export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_CLIENT_SECRET_PATH = "credentials.json";
export const DEFAULT_TIMEOUT_MS = 60_000;

export type SyncSettings = {
  rootFolder: string;
  rootFolderId?: string;
  bucket: string;
  region: string;
  endpoint?: string;
  clientSecretPath: string;
  serviceAccountPath?: string;
  concurrency: number;
  timeoutMs: number;
  tempDir?: string;
};

export type SyncFlags = {
  root?: string;
  rootId?: string;
  bucket?: string;
  region?: string;
  endpoint?: string;
  clientSecret?: string;
  serviceAccount?: string;
  concurrency?: string;
  timeout?: string;
  tempDir?: string;
};

type Env = Record<string, string | undefined>;

export type ConnectionSettings = Pick<
  SyncSettings,
  "clientSecretPath" | "serviceAccountPath" | "timeoutMs"
>;

const concurrencyField = z.coerce
  .number({ invalid_type_error: "concurrency must be a number" })
  .int("concurrency must be a whole number")
  .positive("concurrency must be at least 1");

const timeoutField = z.coerce
  .number({ invalid_type_error: "timeout must be a number of milliseconds" })
  .int("timeout must be a whole number of milliseconds")
  .positive("timeout must be positive");

const endpointField = z.string().url("endpoint must be a URL");

const settingsSchema = z.object({
  rootFolder: z.string().min(1, "root folder name must not be empty"),
  rootFolderId: z.string().min(1).optional(),
  bucket: z
    .string({
      required_error:
        "No bucket configured. Pass --bucket or set DRIVE_S3_SYNC_BUCKET.",
    })
    .min(1),
  region: z.string().min(1),
  endpoint: endpointField.optional(),
  clientSecretPath: z.string().min(1),
  serviceAccountPath: z.string().min(1).optional(),
  concurrency: concurrencyField,
  timeoutMs: timeoutField,
  tempDir: z.string().min(1).optional(),
});

const connectionSchema = settingsSchema.pick({
  clientSecretPath: true,
  serviceAccountPath: true,
  timeoutMs: true,
});

const defaultsUpdateSchema = z
  .object({
    rootFolder: z.string().min(1, "root folder name must not be empty"),
    bucket: z.string().min(1, "bucket must not be empty"),
    region: z.string().min(1, "region must not be empty"),
    endpoint: endpointField,
    clientSecretPath: z.string().min(1, "path must not be empty"),
    serviceAccountPath: z.string().min(1, "path must not be empty"),
    concurrency: concurrencyField,
    timeoutMs: timeoutField,
  })
  .partial();

function describeIssues(error: z.ZodError) {
  return error.issues.map((issue) => issue.message).join("; ");
}

function firstDefined<T>(...values: (T | undefined)[]) {
  for (const value of values) {
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return;
}

function connectionCandidate(flags: SyncFlags, defaults: SyncDefaults, env: Env) {
  return {
    clientSecretPath:
      firstDefined(
        flags.clientSecret,
        env.GOOGLE_CLIENT_SECRET_FILE,
        defaults.clientSecretPath
      ) ?? DEFAULT_CLIENT_SECRET_PATH,
    serviceAccountPath: firstDefined(
      flags.serviceAccount,
      env.SERVICE_ACCOUNT_FILE,
      defaults.serviceAccountPath
    ),
    timeoutMs:
      firstDefined<string | number>(
        flags.timeout,
        env.DRIVE_S3_SYNC_TIMEOUT_MS,
        defaults.timeoutMs
      ) ?? DEFAULT_TIMEOUT_MS,
  };
}

/**
 * Merges flags, environment and the config file, in that order of
 * precedence, and validates the result.
 */
export function resolveSettings(
  flags: SyncFlags,
  defaults: SyncDefaults,
  env: Env = process.env
): SyncSettings {
  const candidate = {
    ...connectionCandidate(flags, defaults, env),
    rootFolder:
      firstDefined(flags.root, env.DRIVE_S3_SYNC_ROOT, defaults.rootFolder) ??
      DEFAULT_ROOT_FOLDER,
    rootFolderId: firstDefined(flags.rootId),
    bucket: firstDefined(
      flags.bucket,
      env.DRIVE_S3_SYNC_BUCKET,
      env.BUCKET_NAME,
      defaults.bucket
    ),
    region:
      firstDefined(flags.region, env.AWS_REGION, defaults.region) ??
      DEFAULT_REGION,
    endpoint: firstDefined(flags.endpoint, env.S3_ENDPOINT_URL, defaults.endpoint),
    concurrency:
      firstDefined<string | number>(
        flags.concurrency,
        env.DRIVE_S3_SYNC_CONCURRENCY,
        defaults.concurrency
      ) ?? 1,
    tempDir: firstDefined(flags.tempDir),
  };
  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new Error(`Invalid settings: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** The subset of settings the browsing commands need; no bucket required. */
export function resolveConnectionSettings(
  flags: Pick<SyncFlags, "clientSecret" | "serviceAccount" | "timeout">,
  defaults: SyncDefaults,
  env: Env = process.env
): ConnectionSettings {
  const parsed = connectionSchema.safeParse(
    connectionCandidate(flags, defaults, env)
  );
  if (!parsed.success) {
    throw new Error(`Invalid settings: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Parses one `config <key> <value>` assignment into a defaults update. */
export function parseDefaultsUpdate(
  field: keyof SyncDefaults,
  value: string
): SyncDefaults {
  const parsed = defaultsUpdateSchema.safeParse({ [field]: value });
  if (!parsed.success) {
    throw new Error(`Invalid value "${value}": ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
