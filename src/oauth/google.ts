import crypto from "node:crypto";
import http from "node:http";
import type { Socket } from "node:net";
import { URL } from "node:url";
import getPort from "get-port";
import {
  CodeChallengeMethod,
  type Credentials,
  OAuth2Client,
} from "google-auth-library";
import open from "open";
import { AuthError, describeError } from "../errors.js";
import type { TokenStore } from "../security/token-store.js";
import type { TokenSet } from "../types.js";
import { debug, info, warn } from "../utils/log.js";
import { type ClientSecret, readClientSecret } from "./client-secret.js";

export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive.readonly"];

export const DEFAULT_CALLBACK_PORT = 3334;
const CALLBACK_PATH = "/oauth/callback";
const REFRESH_MARGIN_MS = 5 * 60 * 1000;

export function isInvalidGrantError(err: unknown) {
  if (!err || typeof err !== "object") {
    return false;
  }
  const message = String(err).toLowerCase();
  if (message.includes("invalid_grant")) {
    return true;
  }
  const data = (err as { response?: { data?: { error?: unknown } } }).response
    ?.data;
  return data?.error === "invalid_grant";
}

export function toTokenSet(
  tokens: Credentials,
  fallbackScopes: string[],
  previous?: TokenSet | null
): TokenSet {
  if (!tokens.access_token) {
    throw new AuthError("Google did not return an access token.");
  }
  const scopes = tokens.scope
    ? tokens.scope.split(" ").filter(Boolean)
    : fallbackScopes;
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? previous?.refreshToken,
    expiresAt: tokens.expiry_date ?? Date.now() + 3600 * 1000,
    scopes,
    tokenType: tokens.token_type ?? undefined,
  };
}

export function toCredentials(set: TokenSet): Credentials {
  return {
    access_token: set.accessToken,
    refresh_token: set.refreshToken,
    expiry_date: set.expiresAt,
    token_type: set.tokenType ?? "Bearer",
    scope: set.scopes.join(" "),
  };
}

export function isTokenFresh(tokens: TokenSet, now = Date.now()) {
  return tokens.expiresAt > now + REFRESH_MARGIN_MS;
}

export async function startCallbackServer(
  expectedState: string,
  options?: { redirectUri?: string }
) {
  let redirectUri = options?.redirectUri;
  if (!redirectUri) {
    const port = await getPort({ port: DEFAULT_CALLBACK_PORT });
    redirectUri = `http://127.0.0.1:${port}${CALLBACK_PATH}`;
  }
  const redirectUrl = new URL(redirectUri);
  if (redirectUrl.protocol !== "http:") {
    throw new Error(`Invalid redirect URI protocol: ${redirectUri}`);
  }
  if (redirectUrl.pathname !== CALLBACK_PATH) {
    throw new Error(`Invalid redirect URI path: ${redirectUri}`);
  }
  const port = Number(redirectUrl.port);
  if (!port || Number.isNaN(port)) {
    throw new Error(
      `Redirect URI must include an explicit port (e.g. http://127.0.0.1:${DEFAULT_CALLBACK_PORT}${CALLBACK_PATH}), got: ${redirectUri}`
    );
  }
  const hostname = redirectUrl.hostname;
  const callbackUri = redirectUri;
  const server = http.createServer();
  let closed = false;
  const sockets = new Set<Socket>();
  server.on("connection", (socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });
  const close = () =>
    new Promise<void>((resolve) => {
      if (closed) {
        resolve();
        return;
      }
      closed = true;
      for (const socket of sockets) {
        socket.destroy();
      }
      server.close(() => resolve());
    });
  const codePromise = new Promise<string>((resolve, reject) => {
    server.on("request", (req, res) => {
      const url = new URL(req.url ?? "", callbackUri);
      if (url.pathname !== CALLBACK_PATH) {
        res.writeHead(404);
        res.end("Not found");
        return;
      }
      try {
        const denied = url.searchParams.get("error");
        if (denied) {
          res.writeHead(400);
          res.end("Authorization was not granted.");
          reject(new AuthError(`Authorization was not granted: ${denied}`));
          return;
        }
        const code = url.searchParams.get("code");
        const state = url.searchParams.get("state");
        if (!code || state !== expectedState) {
          res.writeHead(400);
          res.end("Invalid OAuth response.");
          reject(new AuthError("Invalid OAuth response"));
          return;
        }
        res.writeHead(200, {
          "content-type": "text/plain",
          connection: "close",
        });
        res.end("Authentication complete. You can return to the CLI.");
        resolve(code);
      } catch (err) {
        reject(err);
      } finally {
        setTimeout(() => {
          close().catch((err: unknown) =>
            debug(`Callback server close failed: ${describeError(err)}`)
          );
        }, 100);
      }
    });
  });
  // Avoid an unhandled rejection when the caller closes before awaiting.
  codePromise.catch(() => undefined);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: unknown) => {
      reject(err);
    };
    server.once("error", onError);
    server.listen(port, hostname, () => {
      server.off("error", onError);
      resolve();
    });
  }).catch((err: unknown) => {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "EADDRINUSE") {
      throw new Error(
        `OAuth callback port ${port} is already in use (redirect URI: ${redirectUri}). Close the other process using it and retry.`
      );
    }
    throw err;
  });

  return { redirectUri, codePromise, close };
}

async function openAuthorizationUrl(authorizationUrl: string) {
  info("Open the following URL in your browser to authorize:");
  info(authorizationUrl);
  try {
    await open(authorizationUrl);
  } catch (err) {
    warn(`Failed to open browser automatically: ${describeError(err)}`);
  }
}

/**
 * Runs the installed-app consent flow: a loopback listener receives the
 * authorization code, which is exchanged (with PKCE) for tokens.
 */
export async function loginWithGoogle(options: {
  secret: ClientSecret;
  scopes: string[];
  redirectUri?: string;
}): Promise<TokenSet> {
  const state = crypto.randomUUID();
  const { redirectUri, codePromise, close } = await startCallbackServer(state, {
    redirectUri: options.redirectUri ?? process.env.DRIVE_S3_SYNC_REDIRECT_URI,
  });
  try {
    const client = new OAuth2Client({
      clientId: options.secret.clientId,
      clientSecret: options.secret.clientSecret,
      redirectUri,
    });
    const { codeVerifier, codeChallenge } =
      await client.generateCodeVerifierAsync();
    if (!codeChallenge) {
      throw new AuthError("Failed to derive a PKCE code challenge.");
    }
    const authorizationUrl = client.generateAuthUrl({
      access_type: "offline",
      prompt: "consent",
      scope: options.scopes,
      state,
      code_challenge_method: CodeChallengeMethod.S256,
      code_challenge: codeChallenge,
    });
    await openAuthorizationUrl(authorizationUrl);
    const code = await codePromise;
    const { tokens } = await client.getToken({
      code,
      codeVerifier,
      redirect_uri: redirectUri,
    });
    return toTokenSet(tokens, options.scopes);
  } finally {
    await close();
  }
}

export async function refreshWithGoogle(options: {
  secret: ClientSecret;
  tokens: TokenSet;
  scopes: string[];
}): Promise<TokenSet> {
  if (!options.tokens.refreshToken) {
    throw new AuthError("No refresh token available. Please login again.");
  }
  const client = new OAuth2Client({
    clientId: options.secret.clientId,
    clientSecret: options.secret.clientSecret,
  });
  // Without an access token the client is forced to hit the token endpoint.
  client.setCredentials({ refresh_token: options.tokens.refreshToken });
  await client.getAccessToken();
  return toTokenSet(client.credentials, options.scopes, options.tokens);
}

export type CredentialGrants = {
  consent(): Promise<TokenSet>;
  refresh(tokens: TokenSet): Promise<TokenSet>;
};

export function googleGrants(
  secret: ClientSecret,
  scopes: string[]
): CredentialGrants {
  return {
    consent: () => loginWithGoogle({ secret, scopes }),
    refresh: (tokens) => refreshWithGoogle({ secret, tokens, scopes }),
  };
}

/**
 * Returns a usable credential for `alias`: the cached one while fresh, a
 * refreshed one when it has expired, or a newly granted one when neither
 * works. Whatever is returned has already been persisted.
 */
export async function obtainCredential(options: {
  alias: string;
  tokenStore: TokenStore;
  allowConsent: boolean;
  grants: CredentialGrants;
  now?: () => number;
}): Promise<TokenSet> {
  const { alias, tokenStore, grants } = options;
  const now = options.now ?? Date.now;
  const cached = await tokenStore.get(alias);

  if (cached && isTokenFresh(cached, now())) {
    debug(`Using cached credential for ${alias}.`);
    return cached;
  }

  if (cached?.refreshToken && !cached.refreshInvalid) {
    try {
      const refreshed = await grants.refresh(cached);
      await tokenStore.set(alias, refreshed);
      debug(`Refreshed credential for ${alias}.`);
      return refreshed;
    } catch (err) {
      if (isInvalidGrantError(err)) {
        await tokenStore.set(alias, { ...cached, refreshInvalid: true });
        warn(`Stored refresh token for ${alias} was rejected.`);
      } else {
        warn(`Failed to refresh credential for ${alias}: ${describeError(err)}`);
      }
    }
  }

  if (!options.allowConsent) {
    throw new AuthError(
      `No usable credential for ${alias}. Run \`drive-s3-sync login --account ${alias}\` first.`
    );
  }

  let granted: TokenSet;
  try {
    granted = await grants.consent();
  } catch (err) {
    if (err instanceof AuthError) {
      throw err;
    }
    throw new AuthError(`Authorization failed: ${describeError(err)}`, {
      cause: err,
    });
  }
  await tokenStore.set(alias, granted);
  return granted;
}

/** Loads the client secret and resolves a credential in one step. */
export async function obtainCredentialFromFiles(options: {
  alias: string;
  clientSecretPath: string;
  tokenStore: TokenStore;
  scopes?: string[];
  allowConsent: boolean;
}) {
  const scopes = options.scopes ?? DRIVE_SCOPES;
  const secret = await readClientSecret(options.clientSecretPath);
  const tokens = await obtainCredential({
    alias: options.alias,
    tokenStore: options.tokenStore,
    allowConsent: options.allowConsent,
    grants: googleGrants(secret, scopes),
  });
  return { secret, tokens };
}

/**
 * Builds an OAuth2 client for API calls. Tokens the client refreshes on its
 * own during a long run are written back to the store.
 */
export function createAuthorizedClient(options: {
  secret: ClientSecret;
  tokens: TokenSet;
  alias: string;
  tokenStore: TokenStore;
  scopes: string[];
}) {
  const client = new OAuth2Client({
    clientId: options.secret.clientId,
    clientSecret: options.secret.clientSecret,
  });
  client.setCredentials(toCredentials(options.tokens));
  let latest = options.tokens;
  client.on("tokens", (credentials: Credentials) => {
    let updated: TokenSet;
    try {
      updated = toTokenSet(credentials, options.scopes, latest);
    } catch (err) {
      warn(`Ignoring refreshed credential: ${describeError(err)}`);
      return;
    }
    latest = updated;
    options.tokenStore.set(options.alias, updated).catch((err: unknown) => {
      warn(`Failed to persist refreshed credential: ${describeError(err)}`);
    });
  });
  return client;
}
