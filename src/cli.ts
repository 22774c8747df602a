#!/usr/bin/env node
import "dotenv/config";
import { confirm } from "@inquirer/prompts";
import { Command } from "commander";
import {
  type SyncFlags,
  parseDefaultsUpdate,
  resolveConnectionSettings,
  resolveSettings,
} from "./config/settings.js";
import { loadConfig, setDefaults, setTokenStore } from "./config/store.js";
import { GoogleDriveApi, createServiceAccountAuth } from "./drive/google-drive.js";
import { DriveWalker } from "./drive/walker.js";
import { AuthError } from "./errors.js";
import { readClientSecret } from "./oauth/client-secret.js";
import {
  DRIVE_SCOPES,
  createAuthorizedClient,
  loginWithGoogle,
  obtainCredentialFromFiles,
} from "./oauth/google.js";
import {
  type TokenStore,
  assertTokenStoreSwitchable,
  createTokenStore,
  getAuthStatusForAlias,
  migrateTokens,
  normalizeTokenStoreKind,
  resolveTokenStoreKind,
} from "./security/token-store.js";
import { S3ObjectStore, createS3Client } from "./storage/s3.js";
import { runSync } from "./transfer/pipeline.js";
import type {
  AuthStatus,
  ConfigFile,
  DriveItem,
  SyncDefaults,
  TokenStoreKind,
} from "./types.js";
import { info, warn } from "./utils/log.js";
import { PACKAGE_NAME, PACKAGE_VERSION } from "./version.js";

const DEFAULT_ALIAS = "default";

type GlobalOptions = {
  account?: string;
  clientSecret?: string;
  tokenFile?: string;
  serviceAccount?: string;
  timeout?: string;
};

function describeTokenStore(store: TokenStoreKind) {
  return store === "encrypted" ? "encrypted file" : "plaintext file";
}

function formatAuthStatus(status: AuthStatus): string {
  switch (status.status) {
    case "ok":
      return "ok";
    case "missing":
      return "needs login";
    case "expired":
      return "expired";
    case "invalid":
      return "needs relogin";
    case "locked":
      return "locked";
    default:
      return "unknown";
  }
}

function resolveAlias(options: GlobalOptions) {
  return options.account || process.env.DRIVE_S3_SYNC_ACCOUNT || DEFAULT_ALIAS;
}

function openTokenStore(options: GlobalOptions, config: ConfigFile) {
  const kind = resolveTokenStoreKind({
    configured: config.tokenStore,
    tokenFile: options.tokenFile,
  });
  return {
    kind,
    store: createTokenStore({ store: kind, filePath: options.tokenFile }),
  };
}

async function createDriveApi(options: {
  global: GlobalOptions;
  config: ConfigFile;
  clientSecretPath: string;
  serviceAccountPath?: string;
  timeoutMs?: number;
  allowConsent: boolean;
}) {
  if (options.serviceAccountPath) {
    info(`Authenticating with service account ${options.serviceAccountPath}`);
    return new GoogleDriveApi(
      createServiceAccountAuth(options.serviceAccountPath, DRIVE_SCOPES),
      { timeoutMs: options.timeoutMs }
    );
  }
  const alias = resolveAlias(options.global);
  const { store } = openTokenStore(options.global, options.config);
  const { secret, tokens } = await obtainCredentialFromFiles({
    alias,
    clientSecretPath: options.clientSecretPath,
    tokenStore: store,
    scopes: DRIVE_SCOPES,
    allowConsent: options.allowConsent,
  });
  const client = createAuthorizedClient({
    secret,
    tokens,
    alias,
    tokenStore: store,
    scopes: DRIVE_SCOPES,
  });
  return new GoogleDriveApi(client, { timeoutMs: options.timeoutMs });
}

async function browseDriveApi(global: GlobalOptions) {
  const config = await loadConfig();
  const settings = resolveConnectionSettings(global, config.defaults);
  return createDriveApi({
    global,
    config,
    clientSecretPath: settings.clientSecretPath,
    serviceAccountPath: settings.serviceAccountPath,
    timeoutMs: settings.timeoutMs,
    allowConsent: process.stdin.isTTY === true,
  });
}

function formatItems(items: DriveItem[]) {
  if (items.length === 0) {
    return "No items found.";
  }
  const headers = ["Type", "Name", "ID", "Modified", "Size"];
  const rows = items.map((item) => [
    item.kind,
    item.name,
    item.id,
    item.modifiedTime ?? "",
    item.size === undefined ? "" : String(item.size),
  ]);
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index].length))
  );
  const formatRow = (row: string[]) =>
    row
      .map((cell, index) => cell.padEnd(widths[index]))
      .join("  ")
      .trimEnd();
  return [
    formatRow(headers),
    formatRow(widths.map((w) => "-".repeat(w))),
    ...rows.map(formatRow),
  ].join("\n");
}

async function handleSync(global: GlobalOptions, flags: SyncFlags) {
  const config = await loadConfig();
  const settings = resolveSettings(
    {
      ...flags,
      clientSecret: global.clientSecret,
      serviceAccount: global.serviceAccount,
      timeout: global.timeout,
    },
    config.defaults
  );
  const drive = await createDriveApi({
    global,
    config,
    clientSecretPath: settings.clientSecretPath,
    serviceAccountPath: settings.serviceAccountPath,
    timeoutMs: settings.timeoutMs,
    allowConsent: process.stdin.isTTY === true,
  });
  const store = new S3ObjectStore(
    createS3Client({
      region: settings.region,
      endpoint: settings.endpoint,
      timeoutMs: settings.timeoutMs,
    }),
    settings.bucket
  );
  info(
    `Syncing "${settings.rootFolder}" to s3://${settings.bucket} (concurrency ${settings.concurrency})`
  );
  const report = await runSync({
    drive,
    store,
    rootFolder: settings.rootFolder,
    rootFolderId: settings.rootFolderId,
    tempDir: settings.tempDir,
    concurrency: settings.concurrency,
  });
  if (!report.ok) {
    process.exitCode = 1;
  }
}

async function confirmOverwrite(tokenStore: TokenStore, alias: string) {
  if (!(await tokenStore.get(alias))) {
    return true;
  }
  return confirm({
    message: `Account "${alias}" already has stored tokens. Re-authenticate and overwrite?`,
    default: false,
  });
}

async function handleLogin(global: GlobalOptions) {
  const config = await loadConfig();
  const alias = resolveAlias(global);
  const { store } = openTokenStore(global, config);
  if (!(await confirmOverwrite(store, alias))) {
    info("Login cancelled.");
    return;
  }
  const { clientSecretPath } = resolveConnectionSettings(global, config.defaults);
  const secret = await readClientSecret(clientSecretPath);
  const tokens = await loginWithGoogle({ secret, scopes: DRIVE_SCOPES });
  await store.set(alias, tokens);
  info(`Account "${alias}" connected.`);
}

async function handleLogout(global: GlobalOptions) {
  const config = await loadConfig();
  const alias = resolveAlias(global);
  const { store } = openTokenStore(global, config);
  if (!(await store.get(alias))) {
    warn(`No stored tokens for "${alias}".`);
    return;
  }
  const confirmed = await confirm({
    message: `Delete stored tokens for "${alias}"?`,
    default: false,
  });
  if (!confirmed) {
    info("Logout cancelled.");
    return;
  }
  await store.remove(alias);
  info(`Removed tokens for "${alias}".`);
}

async function handleStatus(global: GlobalOptions) {
  const config = await loadConfig();
  const alias = resolveAlias(global);
  const { kind, store } = openTokenStore(global, config);
  const status = await getAuthStatusForAlias({
    alias,
    tokenStore: store,
    storeKind: kind,
    allowPrompt: process.stdin.isTTY === true,
  });
  info(`Account: ${alias}`);
  info(`Token store: ${describeTokenStore(kind)}`);
  info(`Auth: ${formatAuthStatus(status)}`);
  if (status.reason) {
    info(status.reason);
  }
}

async function handleTokenStore(global: GlobalOptions, storeValue?: string) {
  const config = await loadConfig();
  const effective = resolveTokenStoreKind({
    configured: config.tokenStore,
    tokenFile: global.tokenFile,
  });
  if (!storeValue) {
    info(`Current token store: ${effective}.`);
    info("Available token stores: encrypted, plain.");
    return;
  }
  const target = normalizeTokenStoreKind(storeValue);
  if (!target) {
    throw new Error("Invalid token store. Use one of: encrypted, plain.");
  }
  if (target === effective) {
    info(`Token store already set to ${target}.`);
    return;
  }
  assertTokenStoreSwitchable(global.tokenFile);
  const alias = resolveAlias(global);
  const shouldMigrate =
    process.stdin.isTTY === true &&
    (await confirm({
      message: `Move tokens for "${alias}" from ${describeTokenStore(
        effective
      )} to ${describeTokenStore(target)}?`,
      default: true,
    }));
  if (shouldMigrate) {
    const migrated = await migrateTokens({ from: effective, to: target, alias });
    info(migrated ? `Migrated tokens for "${alias}".` : `No tokens stored for "${alias}".`);
  }
  await setTokenStore(target);
  info(`Default token store set to ${target}.`);
}

const CONFIG_KEYS = {
  root: "rootFolder",
  bucket: "bucket",
  region: "region",
  endpoint: "endpoint",
  "client-secret": "clientSecretPath",
  "service-account": "serviceAccountPath",
  concurrency: "concurrency",
  timeout: "timeoutMs",
} as const satisfies Record<string, keyof SyncDefaults>;

type ConfigKey = keyof typeof CONFIG_KEYS;

function isConfigKey(value: string): value is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, value);
}

async function handleConfig(key?: string, value?: string) {
  const config = await loadConfig();
  if (!key) {
    info(JSON.stringify(config.defaults, null, 2));
    return;
  }
  if (!isConfigKey(key)) {
    throw new Error(
      `Unknown config key "${key}". Use one of: ${Object.keys(CONFIG_KEYS).join(", ")}.`
    );
  }
  const field = CONFIG_KEYS[key];
  if (value === undefined) {
    info(String(config.defaults[field] ?? ""));
    return;
  }
  await setDefaults(parseDefaultsUpdate(field, value));
  info(`Set ${key} = ${value}`);
}

async function main() {
  const program = new Command();
  program
    .name(PACKAGE_NAME)
    .description("Copy a Google Drive dataset folder into an S3 bucket")
    .version(PACKAGE_VERSION)
    .option("--account <alias>", `Stored credential alias (default "${DEFAULT_ALIAS}")`)
    .option("--client-secret <path>", "Google OAuth client secret JSON file")
    .option("--token-file <path>", "Where the OAuth tokens are cached")
    .option(
      "--service-account <path>",
      "Authenticate with a service account key file instead of OAuth"
    )
    .option("--timeout <ms>", "Request timeout for Drive and S3 calls");

  const globals = () => program.opts<GlobalOptions>();

  program
    .command("sync")
    .description("Transfer every class folder of the root folder to S3")
    .option("--root <name>", "Name of the root folder in Drive")
    .option("--root-id <id>", "Drive id of the root folder (skips name lookup)")
    .option("--bucket <name>", "Destination bucket")
    .option("--region <region>", "AWS region")
    .option("--endpoint <url>", "Custom S3 endpoint (e.g. LocalStack)")
    .option("--concurrency <n>", "Files transferred in parallel")
    .option("--temp-dir <path>", "Directory that hosts the run's scratch folder (default: system temp)")
    .action(async (flags: SyncFlags) => {
      await handleSync(globals(), flags);
    });

  program
    .command("login")
    .description("Authorize access to Google Drive and cache the tokens")
    .action(async () => {
      await handleLogin(globals());
    });

  program
    .command("logout")
    .description("Delete cached tokens")
    .action(async () => {
      await handleLogout(globals());
    });

  program
    .command("status")
    .description("Show whether cached credentials are usable")
    .action(async () => {
      await handleStatus(globals());
    });

  program
    .command("folders")
    .argument("[query]", "Only folders whose name contains this text")
    .option("--parent <folderId>", "Only folders directly inside this folder")
    .description("List Drive folders")
    .action(async (query: string | undefined, options: { parent?: string }) => {
      const walker = new DriveWalker(await browseDriveApi(globals()));
      info(
        formatItems(
          await walker.searchFolders({ nameContains: query, parentId: options.parent })
        )
      );
    });

  program
    .command("ls")
    .argument("<folderId>", "Drive folder id")
    .option("--type <mimeType...>", "Only items of these MIME types")
    .description("List the contents of a Drive folder")
    .action(async (folderId: string, options: { type?: string[] }) => {
      const walker = new DriveWalker(await browseDriveApi(globals()));
      info(formatItems(await walker.listContents(folderId, options.type)));
    });

  program
    .command("path")
    .argument("<folderId>", "Drive folder id")
    .description("Print the path of a Drive folder")
    .action(async (folderId: string) => {
      const walker = new DriveWalker(await browseDriveApi(globals()));
      const path = await walker.folderPath(folderId);
      if (path.length === 0) {
        warn(`Folder ${folderId} not found.`);
        process.exitCode = 1;
        return;
      }
      info(path.map((folder) => folder.name).join(" / "));
    });

  program
    .command("token-store")
    .argument("[store]", "Token store backend (encrypted|plain)")
    .description("Show or set the token storage backend")
    .action(async (store?: string) => {
      await handleTokenStore(globals(), store);
    });

  program
    .command("config")
    .argument("[key]", `Setting (${Object.keys(CONFIG_KEYS).join(", ")})`)
    .argument("[value]", "New value")
    .description("Show or set saved defaults for sync")
    .action(async (key?: string, value?: string) => {
      await handleConfig(key, value);
    });

  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof AuthError) {
    console.error(`Authentication failed: ${err.message}`);
  } else {
    console.error(err instanceof Error ? err.message : err);
  }
  process.exitCode = 1;
});
