/**
 * Batch Sequencer
 *
 * Every primitive is computed against the pre-batch document. Executing them
 * strictly right to left keeps those indices valid: when an operation runs,
 * nothing to its left has been touched and nothing to its right is referenced
 * again. At an equal index an insert runs before a delete, which is what makes
 * `Replace(start, end, text) = Insert(end, text) + Delete(start, end)` land
 * `text` exactly where `[start, end)` used to be.
 */

import { DocEditError } from "../errors.js";
import { toWireRequests, validateOperation } from "../operations/operation.js";
import type {
  InsertOperation,
  LogicalOperation,
  PrimitiveOperation,
  WireRequest,
} from "../operations/types.js";
import type { Batch, RevisionToken } from "./types.js";

/** Expands replaces into insert + delete pairs, validating every operation. */
export function lowerLogicalOperations(ops: readonly LogicalOperation[]): PrimitiveOperation[] {
  const primitives: PrimitiveOperation[] = [];
  for (const op of ops) {
    validateOperation(op);
    switch (op.kind) {
      case "insert":
        if (op.text.length === 0) {
          throw new DocEditError("INVALID_ARGUMENT", `Insert at index ${op.at} has no text`, {
            context: { at: op.at },
          });
        }
        primitives.push(op);
        break;
      case "delete":
        primitives.push(op);
        break;
      case "replace":
        // An empty replacement is a plain delete
        if (op.text.length > 0) {
          primitives.push({ kind: "insert", at: op.end, text: op.text });
        }
        primitives.push({ kind: "delete", start: op.start, end: op.end });
        break;
    }
  }
  return primitives;
}

export function startIndexOf(op: PrimitiveOperation): number {
  return op.kind === "insert" ? op.at : op.start;
}

/**
 * Orders primitives by descending start index, inserts before deletes at the
 * same index. Remaining ties are broken on content so the result does not
 * depend on the order the caller listed the operations in.
 */
export function sequenceOperations(ops: readonly PrimitiveOperation[]): PrimitiveOperation[] {
  return [...ops].sort(compareForExecution);
}

export function compareForExecution(a: PrimitiveOperation, b: PrimitiveOperation): number {
  const byStart = startIndexOf(b) - startIndexOf(a);
  if (byStart !== 0) {
    return byStart;
  }
  if (a.kind !== b.kind) {
    return a.kind === "insert" ? -1 : 1;
  }
  if (a.kind === "delete" && b.kind === "delete") {
    return b.end - a.end;
  }
  if (a.kind === "insert" && b.kind === "insert") {
    return compareInserts(a, b);
  }
  return 0;
}

function compareInserts(a: InsertOperation, b: InsertOperation): number {
  const byText = compareCodeUnits(a.text, b.text);
  if (byText !== 0) {
    return byText;
  }
  return compareCodeUnits(styleKey(a), styleKey(b));
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function styleKey(op: InsertOperation): string {
  const style = op.charStyle ?? {};
  return JSON.stringify([
    op.paragraphStyle ?? "",
    op.bulletPreset ?? "",
    style.bold === true,
    style.italic === true,
    style.underline === true,
    style.strikethrough === true,
    style.monospace === true,
  ]);
}

export function buildBatch(
  ops: readonly LogicalOperation[],
  requiredRevision?: RevisionToken
): Batch {
  const operations = sequenceOperations(lowerLogicalOperations(ops));
  return requiredRevision ? { operations, requiredRevision } : { operations };
}

export function renderBatch(batch: Batch): WireRequest[] {
  return batch.operations.flatMap((op) => toWireRequests(op));
}
