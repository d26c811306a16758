import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createSilentLogger } from "@gdoc-editor/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  type CredentialSettings,
  resolveAccessTokenProvider,
  resolveCredentialSettings,
  revokeStoredCredentials,
} from "../google/auth.js";

let tempDir: string;
const logger = createSilentLogger();

beforeEach(async () => {
  tempDir = await mkdtemp(path.join(os.tmpdir(), "gdoc-cli-auth-"));
  vi.stubEnv("GDOC_EDITOR_CREDENTIALS_PATH", "");
  vi.stubEnv("GOOGLE_CLIENT_ID", "");
  vi.stubEnv("GOOGLE_CLIENT_SECRET", "");
  vi.stubEnv("GOOGLE_SERVICE_ACCOUNT_KEY_FILE", "");
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(async () => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

function settings(overrides: Partial<CredentialSettings> = {}): CredentialSettings {
  return { credentialsPath: path.join(tempDir, "credentials.json"), ...overrides };
}

describe("resolveCredentialSettings", () => {
  it("defaults the credentials path into the state dir", () => {
    vi.stubEnv("GDOC_EDITOR_STATE_DIR", tempDir);

    expect(resolveCredentialSettings({}).credentialsPath).toBe(
      path.join(path.resolve(tempDir), "credentials.json")
    );
  });

  it("prefers environment variables over config values", () => {
    vi.stubEnv("GOOGLE_CLIENT_ID", "env-client");

    const resolved = resolveCredentialSettings({
      clientId: "config-client",
      clientSecret: "test-secret",
      credentialsPath: "~/gdoc/creds.json",
    });

    expect(resolved.clientId).toBe("env-client");
    expect(resolved.clientSecret).toBe("test-secret");
    expect(resolved.credentialsPath).toBe(path.join(os.homedir(), "gdoc/creds.json"));
  });
});

describe("resolveAccessTokenProvider", () => {
  it("uses stored credentials while the access token is fresh", async () => {
    const credentialsPath = path.join(tempDir, "credentials.json");
    await writeFile(
      credentialsPath,
      JSON.stringify({
        type: "authorized_user",
        client_id: "test-client",
        client_secret: "test-secret",
        refresh_token: "test-refresh",
        access_token: "test-access",
        expiry_date: Date.now() + 60 * 60 * 1000,
      }),
      "utf8"
    );

    const provider = await resolveAccessTokenProvider(settings(), { logger });

    await expect(provider.getAccessToken()).resolves.toBe("test-access");
  });

  it("fails when no credentials are configured", async () => {
    await expect(resolveAccessTokenProvider(settings(), { logger })).rejects.toMatchObject({
      code: "AUTHENTICATION_FAILED",
      message:
        "Missing credentials. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET, or GOOGLE_SERVICE_ACCOUNT_KEY_FILE for a service account.",
    });
  });

  it("ignores an unreadable credentials file", async () => {
    await writeFile(path.join(tempDir, "credentials.json"), "not json", "utf8");

    await expect(resolveAccessTokenProvider(settings(), { logger })).rejects.toMatchObject({
      code: "AUTHENTICATION_FAILED",
    });
  });

  it("runs the authorizer once and stores the refresh token", async () => {
    const authorize = vi.fn(async () => ({
      refresh_token: "test-refresh",
      access_token: "test-access",
      expiry_date: Date.now() + 60 * 60 * 1000,
    }));

    const provider = await resolveAccessTokenProvider(
      settings({ clientId: "test-client", clientSecret: "test-secret" }),
      { logger, authorize }
    );

    await expect(provider.getAccessToken()).resolves.toBe("test-access");
    expect(authorize).toHaveBeenCalledTimes(1);
    const stored: unknown = JSON.parse(await readFile(path.join(tempDir, "credentials.json"), "utf8"));
    expect(stored).toMatchObject({
      type: "authorized_user",
      client_id: "test-client",
      client_secret: "test-secret",
      refresh_token: "test-refresh",
    });
  });

  it("wraps authorizer failures", async () => {
    const authorize = vi.fn(async () => {
      throw new Error("access_denied");
    });

    await expect(
      resolveAccessTokenProvider(settings({ clientId: "test-client", clientSecret: "test-secret" }), {
        logger,
        authorize,
      })
    ).rejects.toMatchObject({
      code: "AUTHENTICATION_FAILED",
      message: "OAuth flow failed: access_denied",
    });
  });

  it("requires a refresh token from the flow", async () => {
    const authorize = vi.fn(async () => ({ access_token: "test-access" }));

    await expect(
      resolveAccessTokenProvider(settings({ clientId: "test-client", clientSecret: "test-secret" }), {
        logger,
        authorize,
      })
    ).rejects.toThrow("OAuth flow returned no refresh token");
  });

  it("reports a missing service account key file", async () => {
    const keyFile = path.join(tempDir, "missing-key.json");

    await expect(
      resolveAccessTokenProvider(settings({ serviceAccountKeyFile: keyFile }), { logger })
    ).rejects.toThrow(`Service account key file not found: ${keyFile}`);
  });
});

describe("revokeStoredCredentials", () => {
  it("deletes an existing file", async () => {
    const credentialsPath = path.join(tempDir, "credentials.json");
    await writeFile(credentialsPath, "{}", "utf8");

    await expect(revokeStoredCredentials(credentialsPath)).resolves.toBe(true);
    await expect(access(credentialsPath)).rejects.toThrow();
  });

  it("reports when there is nothing to delete", async () => {
    await expect(revokeStoredCredentials(path.join(tempDir, "credentials.json"))).resolves.toBe(false);
  });
});
