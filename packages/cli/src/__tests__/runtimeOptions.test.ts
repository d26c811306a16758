import { afterEach, describe, expect, it, vi } from "vitest";
import {
  resolveLogLevel,
  resolveRuntimeConfigBoolean,
  resolveRuntimeConfigString,
} from "../utils/runtimeOptions.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("runtime options", () => {
  it("resolves flag, then environment, then config", () => {
    const envVar = "GDOC_EDITOR_API_BASE_URL";
    const fromConfig = "https://config.test/v1";
    vi.stubEnv(envVar, "https://env.test/v1");

    expect(resolveRuntimeConfigString("https://flag.test/v1", fromConfig, envVar)).toBe(
      "https://flag.test/v1"
    );
    expect(resolveRuntimeConfigString(undefined, fromConfig, envVar)).toBe("https://env.test/v1");

    vi.stubEnv(envVar, "  ");
    expect(resolveRuntimeConfigString(undefined, fromConfig, envVar)).toBe(fromConfig);
  });

  it("ignores non-string config values", () => {
    expect(resolveRuntimeConfigString(undefined, 42)).toBeUndefined();
  });

  it("reads booleans from the environment", () => {
    vi.stubEnv("GDOC_EDITOR_LOG_PRETTY", "yes");
    expect(resolveRuntimeConfigBoolean(undefined, false, "GDOC_EDITOR_LOG_PRETTY")).toBe(true);

    vi.stubEnv("GDOC_EDITOR_LOG_PRETTY", "off");
    expect(resolveRuntimeConfigBoolean(undefined, true, "GDOC_EDITOR_LOG_PRETTY")).toBe(false);

    vi.stubEnv("GDOC_EDITOR_LOG_PRETTY", "");
    expect(resolveRuntimeConfigBoolean(undefined, true, "GDOC_EDITOR_LOG_PRETTY")).toBe(true);
  });

  it("falls back to warn for unknown log levels", () => {
    vi.stubEnv("LOG_LEVEL", "");
    expect(resolveLogLevel(undefined, "DEBUG")).toBe("debug");
    expect(resolveLogLevel(undefined, "chatty")).toBe("warn");
    expect(resolveLogLevel(undefined, undefined)).toBe("warn");
  });
});
