import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { DocEditError, getErrorMessage, LOG_LEVELS } from "@gdoc-editor/core";
import { z } from "zod";
import { ensureCliStateDir, resolveCliPath } from "./statePaths.js";

export const CONFIG_FILE_NAME = "config.json";

export const CliConfigSchema = z
  .object({
    credentialsPath: z.string().optional(),
    clientId: z.string().optional(),
    clientSecret: z.string().optional(),
    serviceAccountKeyFile: z.string().optional(),
    apiBaseUrl: z.string().url().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    pretty: z.boolean().optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

export type CliConfigKey = keyof CliConfig;

export const CONFIG_KEYS: readonly CliConfigKey[] = CliConfigSchema.keyof().options;

export interface ConfigStoreOptions {
  baseDir?: string;
  fileName?: string;
}

export class ConfigStore {
  private readonly filePath: string;

  constructor(options: ConfigStoreOptions = {}) {
    const fileName = options.fileName ?? CONFIG_FILE_NAME;
    this.filePath = options.baseDir ? path.join(options.baseDir, fileName) : fileName;
  }

  get path(): string {
    return this.resolvePath();
  }

  /** A missing file is an empty config; a malformed one is an error. */
  async load(): Promise<CliConfig> {
    let data: string;
    try {
      data = await readFile(this.resolvePath(), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
    return parseConfig(data, this.resolvePath());
  }

  async save(config: CliConfig): Promise<void> {
    const validated = CliConfigSchema.parse(config);
    if (!path.isAbsolute(this.filePath)) {
      await ensureCliStateDir();
    }
    await writeFile(this.resolvePath(), `${JSON.stringify(validated, null, 2)}\n`, "utf8");
  }

  private resolvePath(): string {
    if (path.isAbsolute(this.filePath)) {
      return this.filePath;
    }
    return resolveCliPath(this.filePath);
  }
}

function parseConfig(data: string, filePath: string): CliConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new DocEditError("INVALID_ARGUMENT", `Config file ${filePath} is not valid JSON: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
  const parsed = CliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DocEditError(
      "INVALID_ARGUMENT",
      `Invalid config file ${filePath}: ${issue ? formatIssue(issue) : "unexpected shape"}`,
      { hint: "Fix the file or run `gdoc-cli config unset <key>`." }
    );
  }
  return parsed.data;
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function isConfigKey(key: string): key is CliConfigKey {
  return key in CliConfigSchema.shape;
}

export function parseConfigValue(raw: string): unknown {
  if (raw === "true") {
    return true;
  }
  if (raw === "false") {
    return false;
  }
  return raw;
}

/** Returns the updated config, validated as a whole. */
export function setConfigValue(config: CliConfig, key: string, raw: string): CliConfig {
  if (!isConfigKey(key)) {
    throw unknownKey(key);
  }
  const parsed = CliConfigSchema.safeParse({ ...config, [key]: parseConfigValue(raw) });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DocEditError(
      "INVALID_ARGUMENT",
      `Invalid value for ${key}: ${issue?.message ?? raw}`,
      { context: { key, value: raw } }
    );
  }
  return parsed.data;
}

export function unsetConfigValue(config: CliConfig, key: string): { config: CliConfig; removed: boolean } {
  if (!isConfigKey(key)) {
    throw unknownKey(key);
  }
  if (config[key] === undefined) {
    return { config, removed: false };
  }
  const next: CliConfig = { ...config };
  delete next[key];
  return { config: next, removed: true };
}

function unknownKey(key: string): DocEditError {
  return new DocEditError("INVALID_ARGUMENT", `Unknown config key: ${key}`, {
    hint: `Known keys: ${CONFIG_KEYS.join(", ")}`,
  });
}
