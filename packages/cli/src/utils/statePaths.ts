import { mkdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const DEFAULT_DIR = ".gdoc-editor";

export const STATE_DIR_ENV = "GDOC_EDITOR_STATE_DIR";

export function resolveCliStateDir(): string {
  const override = process.env[STATE_DIR_ENV];
  return override ? path.resolve(override) : path.join(os.homedir(), DEFAULT_DIR);
}

export async function ensureCliStateDir(): Promise<string> {
  const dir = resolveCliStateDir();
  await mkdir(dir, { recursive: true });
  return dir;
}

export function resolveCliPath(fileName: string): string {
  return path.join(resolveCliStateDir(), fileName);
}

/** Expands a leading `~` the way a shell would. */
export function expandHome(filePath: string): string {
  if (filePath === "~") {
    return os.homedir();
  }
  if (filePath.startsWith("~/")) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return path.resolve(filePath);
}
