/**
 * Google credentials
 *
 * A service account key file takes precedence. Otherwise the installed-app
 * OAuth flow runs once through a loopback redirect and the resulting refresh
 * token is stored at `credentialsPath`.
 */

import { access, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { createServer, type Server } from "node:http";
import path from "node:path";
import { DocEditError, getErrorMessage, isDocEditError, type RuntimeLogger } from "@gdoc-editor/core";
import { type Credentials, GoogleAuth, OAuth2Client } from "google-auth-library";
import { z } from "zod";
import type { CliConfig } from "../utils/configStore.js";
import { ENV, resolveRuntimeConfigString } from "../utils/runtimeOptions.js";
import { expandHome, resolveCliPath } from "../utils/statePaths.js";
import { writeStderr } from "../utils/terminal.js";
import type { AccessTokenProvider } from "./docsClient.js";

export const DOCS_SCOPES = ["https://www.googleapis.com/auth/documents"];

export const CREDENTIALS_FILE_NAME = "credentials.json";

const LOOPBACK_HOST = "127.0.0.1";

const SIGN_IN_AGAIN_HINT = "Run `gdoc-cli logout` and sign in again.";

export type CredentialSettings = {
  credentialsPath: string;
  clientId?: string;
  clientSecret?: string;
  serviceAccountKeyFile?: string;
};

export const StoredCredentialsSchema = z.object({
  type: z.literal("authorized_user"),
  client_id: z.string(),
  client_secret: z.string(),
  refresh_token: z.string(),
  access_token: z.string().optional(),
  expiry_date: z.number().optional(),
});

export type StoredCredentials = z.infer<typeof StoredCredentialsSchema>;

/** Receives the consent URL and resolves with the tokens the redirect produced. */
export type Authorizer = (client: OAuth2Client) => Promise<Credentials>;

export interface TokenProviderOptions {
  logger: RuntimeLogger;
  authorize?: Authorizer;
}

export function resolveCredentialSettings(config: CliConfig): CredentialSettings {
  const credentialsPath =
    resolveRuntimeConfigString(undefined, config.credentialsPath, ENV.credentialsPath) ??
    resolveCliPath(CREDENTIALS_FILE_NAME);
  return {
    credentialsPath: expandHome(credentialsPath),
    clientId: resolveRuntimeConfigString(undefined, config.clientId, ENV.clientId),
    clientSecret: resolveRuntimeConfigString(undefined, config.clientSecret, ENV.clientSecret),
    serviceAccountKeyFile: resolveRuntimeConfigString(
      undefined,
      config.serviceAccountKeyFile,
      ENV.serviceAccountKeyFile
    ),
  };
}

export async function resolveAccessTokenProvider(
  settings: CredentialSettings,
  options: TokenProviderOptions
): Promise<AccessTokenProvider> {
  const logger = options.logger.child({ module: "auth" });
  if (settings.serviceAccountKeyFile) {
    return serviceAccountProvider(expandHome(settings.serviceAccountKeyFile), logger);
  }

  const stored = await loadStoredCredentials(settings.credentialsPath, logger);
  if (stored) {
    logger.debug("Using stored credentials", { credentialsPath: settings.credentialsPath });
    return oauthProvider(createStoredClient(stored, settings.credentialsPath, logger));
  }

  if (!settings.clientId || !settings.clientSecret) {
    throw new DocEditError(
      "AUTHENTICATION_FAILED",
      `Missing credentials. Set ${ENV.clientId} and ${ENV.clientSecret}, or ${ENV.serviceAccountKeyFile} for a service account.`,
      { hint: "Or store them with `gdoc-cli config set clientId <id>` and `clientSecret <secret>`." }
    );
  }

  const client = new OAuth2Client({ clientId: settings.clientId, clientSecret: settings.clientSecret });
  const authorize = options.authorize ?? authorizeWithLoopback;
  let tokens: Credentials;
  try {
    tokens = await authorize(client);
  } catch (error) {
    throw authenticationFailed("OAuth flow failed", error);
  }
  if (!tokens.refresh_token) {
    throw new DocEditError("AUTHENTICATION_FAILED", "OAuth flow returned no refresh token", {
      hint: "Revoke gdoc-cli's access in your Google account settings and sign in again.",
    });
  }

  client.setCredentials(tokens);
  const credentials: StoredCredentials = {
    type: "authorized_user",
    client_id: settings.clientId,
    client_secret: settings.clientSecret,
    refresh_token: tokens.refresh_token,
    ...(tokens.access_token ? { access_token: tokens.access_token } : {}),
    ...(typeof tokens.expiry_date === "number" ? { expiry_date: tokens.expiry_date } : {}),
  };
  await saveStoredCredentials(settings.credentialsPath, credentials);
  writeStderr(`Credentials saved to ${settings.credentialsPath}`);
  persistRefreshedTokens(client, credentials, settings.credentialsPath, logger);
  return oauthProvider(client);
}

// ============================================================================
// Credentials file
// ============================================================================

/** A missing file yields null; an unreadable one is reported and ignored. */
export async function loadStoredCredentials(
  credentialsPath: string,
  logger: RuntimeLogger
): Promise<StoredCredentials | null> {
  let data: string;
  try {
    data = await readFile(credentialsPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw authenticationFailed(`Could not read credentials from ${credentialsPath}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (error) {
    logger.warn("Ignoring unreadable credentials file", {
      credentialsPath,
      reason: getErrorMessage(error),
    });
    return null;
  }
  const parsed = StoredCredentialsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Ignoring credentials file of unexpected shape", { credentialsPath });
    return null;
  }
  return parsed.data;
}

export async function saveStoredCredentials(
  credentialsPath: string,
  credentials: StoredCredentials
): Promise<void> {
  await mkdir(path.dirname(credentialsPath), { recursive: true });
  await writeFile(credentialsPath, `${JSON.stringify(credentials, null, 2)}\n`, {
    encoding: "utf8",
    mode: 0o600,
  });
}

/** Deletes the stored OAuth credentials; service account keys are untouched. */
export async function revokeStoredCredentials(credentialsPath: string): Promise<boolean> {
  try {
    await access(credentialsPath);
  } catch (error) {
    if (isMissingFile(error)) {
      return false;
    }
    throw error;
  }
  await rm(credentialsPath);
  return true;
}

// ============================================================================
// Providers
// ============================================================================

async function serviceAccountProvider(
  keyFile: string,
  logger: RuntimeLogger
): Promise<AccessTokenProvider> {
  try {
    await access(keyFile);
  } catch (error) {
    throw new DocEditError("AUTHENTICATION_FAILED", `Service account key file not found: ${keyFile}`, {
      cause: error,
      hint: `Check ${ENV.serviceAccountKeyFile} or the serviceAccountKeyFile config value.`,
    });
  }

  logger.debug("Using service account", { keyFile });
  const auth = new GoogleAuth({ keyFile, scopes: DOCS_SCOPES });
  return {
    async getAccessToken() {
      let token: string | null | undefined;
      try {
        token = await auth.getAccessToken();
      } catch (error) {
        throw authenticationFailed("Failed to load service account credentials", error);
      }
      if (!token) {
        throw new DocEditError("AUTHENTICATION_FAILED", "Service account returned no access token");
      }
      return token;
    },
  };
}

function createStoredClient(
  stored: StoredCredentials,
  credentialsPath: string,
  logger: RuntimeLogger
): OAuth2Client {
  const client = new OAuth2Client({ clientId: stored.client_id, clientSecret: stored.client_secret });
  client.setCredentials({
    refresh_token: stored.refresh_token,
    access_token: stored.access_token,
    expiry_date: stored.expiry_date,
  });
  persistRefreshedTokens(client, stored, credentialsPath, logger);
  return client;
}

function oauthProvider(client: OAuth2Client): AccessTokenProvider {
  return {
    async getAccessToken() {
      let token: string | null | undefined;
      try {
        ({ token } = await client.getAccessToken());
      } catch (error) {
        throw authenticationFailed("Could not refresh credentials", error);
      }
      if (!token) {
        throw new DocEditError("AUTHENTICATION_FAILED", "No access token available", {
          hint: SIGN_IN_AGAIN_HINT,
        });
      }
      return token;
    },
  };
}

/** Keeps the stored access token current when the client refreshes it. */
function persistRefreshedTokens(
  client: OAuth2Client,
  stored: StoredCredentials,
  credentialsPath: string,
  logger: RuntimeLogger
): void {
  client.on("tokens", (tokens: Credentials) => {
    const next: StoredCredentials = {
      ...stored,
      ...(tokens.refresh_token ? { refresh_token: tokens.refresh_token } : {}),
      ...(tokens.access_token ? { access_token: tokens.access_token } : {}),
      ...(typeof tokens.expiry_date === "number" ? { expiry_date: tokens.expiry_date } : {}),
    };
    saveStoredCredentials(credentialsPath, next).catch((error: unknown) => {
      logger.warn("Could not save refreshed credentials", {
        credentialsPath,
        reason: getErrorMessage(error),
      });
    });
  });
}

// ============================================================================
// Loopback flow
// ============================================================================

export const authorizeWithLoopback: Authorizer = async (client) => {
  const server = createServer();
  try {
    const port = await listen(server);
    const redirectUri = `http://${LOOPBACK_HOST}:${port}`;
    const authUrl = client.generateAuthUrl({
      access_type: "offline",
      prompt: "consent",
      scope: DOCS_SCOPES,
      redirect_uri: redirectUri,
    });
    writeStderr("Open this URL in a browser to authorize gdoc-cli:");
    writeStderr(authUrl);

    const code = await waitForAuthorizationCode(server);
    const { tokens } = await client.getToken({ code, redirect_uri: redirectUri });
    return tokens;
  } finally {
    server.close();
  }
};

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, LOOPBACK_HOST, () => {
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Loopback server has no port"));
        return;
      }
      resolve(address.port);
    });
  });
}

function waitForAuthorizationCode(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.on("request", (request, response) => {
      const url = new URL(request.url ?? "/", `http://${LOOPBACK_HOST}`);
      const code = url.searchParams.get("code");
      const denied = url.searchParams.get("error");
      if (!code && !denied) {
        response.writeHead(404).end();
        return;
      }
      response
        .writeHead(200, { "Content-Type": "text/plain; charset=utf-8" })
        .end(code ? "Authorization complete. You can close this window." : "Authorization failed.");
      if (code) {
        resolve(code);
      } else {
        reject(new Error(`Authorization was denied: ${denied}`));
      }
    });
  });
}

// ============================================================================
// Helpers
// ============================================================================

function authenticationFailed(message: string, error: unknown): DocEditError {
  if (isDocEditError(error)) {
    return error;
  }
  return new DocEditError("AUTHENTICATION_FAILED", `${message}: ${getErrorMessage(error)}`, {
    cause: error,
    hint: SIGN_IN_AGAIN_HINT,
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
