import { isLogLevel, type LogLevel } from "@gdoc-editor/core";

export const ENV = {
  logLevel: "LOG_LEVEL",
  logPretty: "GDOC_EDITOR_LOG_PRETTY",
  apiBaseUrl: "GDOC_EDITOR_API_BASE_URL",
  credentialsPath: "GDOC_EDITOR_CREDENTIALS_PATH",
  clientId: "GOOGLE_CLIENT_ID",
  clientSecret: "GOOGLE_CLIENT_SECRET",
  serviceAccountKeyFile: "GOOGLE_SERVICE_ACCOUNT_KEY_FILE",
} as const;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/** Flag, then environment variable, then config file value. */
export function resolveRuntimeConfigString(
  primary: string | undefined,
  fallback: unknown,
  envVar?: string
): string | undefined {
  const normalizedPrimary = normalizeValue(primary);
  if (normalizedPrimary) {
    return normalizedPrimary;
  }
  const envValue = envVar ? normalizeValue(process.env[envVar]) : undefined;
  if (envValue) {
    return envValue;
  }
  if (typeof fallback === "string") {
    return normalizeValue(fallback);
  }
  return undefined;
}

export function resolveRuntimeConfigBoolean(
  primary: boolean | undefined,
  fallback: unknown,
  envVar?: string
): boolean {
  if (primary !== undefined) {
    return primary;
  }
  const envValue = envVar ? normalizeValue(process.env[envVar])?.toLowerCase() : undefined;
  if (envValue && TRUE_VALUES.has(envValue)) {
    return true;
  }
  if (envValue && FALSE_VALUES.has(envValue)) {
    return false;
  }
  return fallback === true;
}

export function resolveLogLevel(primary: string | undefined, fallback: unknown): LogLevel {
  const resolved = resolveRuntimeConfigString(primary, fallback, ENV.logLevel)?.toLowerCase();
  if (resolved && isLogLevel(resolved)) {
    return resolved;
  }
  return "warn";
}

function normalizeValue(value: string | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed || undefined;
}
