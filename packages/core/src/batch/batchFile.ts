/**
 * Batch file parsing.
 *
 * A batch file is a JSON array of
 * `{ "type": "insert" | "delete" | "replace", "startIndex": int, "endIndex"?: int, "text"?: string }`.
 * Everything is validated before the first network call.
 */

import { z } from "zod";
import { DocEditError, getErrorMessage, invalidOperationKind } from "../errors.js";
import type { LogicalOperation } from "../operations/types.js";

export const BatchFileEntrySchema = z.object({
  type: z.string(),
  startIndex: z.number().int(),
  endIndex: z.number().int().optional(),
  text: z.string().optional(),
});

export const BatchFileSchema = z.array(BatchFileEntrySchema);

export type BatchFileEntry = z.infer<typeof BatchFileEntrySchema>;

export function parseBatchFile(source: string): LogicalOperation[] {
  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (error) {
    throw new DocEditError("INVALID_BATCH_FILE", `Batch file is not valid JSON: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }
  return parseBatchEntries(raw);
}

export function parseBatchEntries(raw: unknown): LogicalOperation[] {
  const parsed = BatchFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new DocEditError(
      "INVALID_BATCH_FILE",
      `Invalid batch file${where}: ${issue?.message ?? "unexpected shape"}`,
      { context: { issues: parsed.error.issues } }
    );
  }
  return parsed.data.map((entry, index) => toLogicalOperation(entry, index));
}

function toLogicalOperation(entry: BatchFileEntry, index: number): LogicalOperation {
  switch (entry.type) {
    case "insert":
      return { kind: "insert", at: entry.startIndex, text: requireText(entry, index) };
    case "delete":
      return { kind: "delete", start: entry.startIndex, end: requireEndIndex(entry, index) };
    case "replace":
      return {
        kind: "replace",
        start: entry.startIndex,
        end: requireEndIndex(entry, index),
        text: requireText(entry, index),
      };
    default:
      throw invalidOperationKind(entry.type, index);
  }
}

function requireText(entry: BatchFileEntry, index: number): string {
  if (entry.text === undefined) {
    throw new DocEditError("INVALID_BATCH_FILE", `Operation ${index} (${entry.type}) requires "text"`, {
      context: { index },
    });
  }
  return entry.text;
}

function requireEndIndex(entry: BatchFileEntry, index: number): number {
  if (entry.endIndex === undefined) {
    throw new DocEditError(
      "INVALID_BATCH_FILE",
      `Operation ${index} (${entry.type}) requires "endIndex"`,
      { context: { index } }
    );
  }
  return entry.endIndex;
}
