/**
 * Vitest alias configuration for workspace packages.
 *
 * Tests load workspace packages from their TypeScript sources, so no build
 * is needed before a run.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  {
    find: "@gdoc-editor/core",
    replacement: path.resolve(rootDir, "packages/core/src/index.ts"),
  },
];
