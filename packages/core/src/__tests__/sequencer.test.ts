import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  buildBatch,
  lowerLogicalOperations,
  renderBatch,
  sequenceOperations,
} from "../batch/sequencer.js";
import { DocEditError } from "../errors.js";
import type { LogicalOperation, PrimitiveOperation } from "../operations/types.js";
import { applyRequests } from "../testing/memoryDocumentService.js";

/** Executes a batch against a linear buffer, in batch order. */
function execute(buffer: string, ops: readonly LogicalOperation[]): string {
  return applyRequests(buffer, renderBatch(buildBatch(ops)));
}

/** Applies every operation to the same snapshot and composites by offset. */
function composite(buffer: string, ops: readonly PrimitiveOperation[]): string {
  const inserts = new Map<number, string>();
  const deleted = new Set<number>();
  for (const op of ops) {
    if (op.kind === "insert") {
      inserts.set(op.at, op.text);
    } else {
      for (let i = op.start; i < op.end; i += 1) {
        deleted.add(i);
      }
    }
  }
  let out = "";
  for (let i = 0; i <= buffer.length; i += 1) {
    out += inserts.get(i) ?? "";
    if (i < buffer.length && !deleted.has(i)) {
      out += buffer[i];
    }
  }
  return out;
}

type PlanStep = { kind: "keep" | "insert" | "delete"; len: number; text: string };

/**
 * Walks the buffer left to right producing deletes over disjoint ranges and
 * inserts at distinct points outside every deleted range.
 */
function planOperations(bufferLength: number, steps: readonly PlanStep[]): PrimitiveOperation[] {
  const ops: PrimitiveOperation[] = [];
  let cursor = 0;
  let lastInsertAt = -1;
  for (const step of steps) {
    if (step.kind === "delete") {
      const end = Math.min(cursor + step.len, bufferLength);
      if (end > cursor) {
        ops.push({ kind: "delete", start: cursor, end });
        cursor = end;
      }
      continue;
    }
    if (step.kind === "insert" && cursor !== lastInsertAt) {
      ops.push({ kind: "insert", at: cursor, text: step.text });
      lastInsertAt = cursor;
    }
    cursor = Math.min(cursor + step.len, bufferLength);
  }
  return ops;
}

const planStepArb = fc.record({
  kind: fc.constantFrom<PlanStep["kind"]>("keep", "insert", "delete"),
  len: fc.integer({ min: 1, max: 4 }),
  text: fc.string({ minLength: 1, maxLength: 3 }),
});

const primitiveArb: fc.Arbitrary<PrimitiveOperation> = fc.oneof(
  fc.record({
    kind: fc.constant<"insert">("insert"),
    at: fc.integer({ min: 0, max: 30 }),
    text: fc.string({ minLength: 1, maxLength: 4 }),
  }),
  fc
    .record({ start: fc.integer({ min: 0, max: 30 }), len: fc.integer({ min: 1, max: 5 }) })
    .map(({ start, len }): PrimitiveOperation => ({ kind: "delete", start, end: start + len }))
);

const BUFFER_20 = "abcdefghijklmnopqrst";

describe("Batch Sequencer", () => {
  describe("sequenceOperations", () => {
    it("orders by descending start index with inserts before deletes at a tie", () => {
      const ordered = sequenceOperations([
        { kind: "delete", start: 10, end: 20 },
        { kind: "insert", at: 5, text: "a" },
        { kind: "insert", at: 30, text: "b" },
        { kind: "delete", start: 30, end: 35 },
        { kind: "insert", at: 10, text: "c" },
      ]);

      expect(ordered).toEqual([
        { kind: "insert", at: 30, text: "b" },
        { kind: "delete", start: 30, end: 35 },
        { kind: "insert", at: 10, text: "c" },
        { kind: "delete", start: 10, end: 20 },
        { kind: "insert", at: 5, text: "a" },
      ]);
    });

    it("does not mutate its input", () => {
      const input: PrimitiveOperation[] = [
        { kind: "insert", at: 1, text: "a" },
        { kind: "insert", at: 9, text: "b" },
      ];
      sequenceOperations(input);
      expect(input[0]).toEqual({ kind: "insert", at: 1, text: "a" });
    });

    it("produces the same order for every permutation of the input", () => {
      fc.assert(
        fc.property(
          fc
            .array(primitiveArb, { maxLength: 12 })
            .chain((ops) =>
              fc.tuple(
                fc.constant(ops),
                fc.shuffledSubarray(ops, { minLength: ops.length, maxLength: ops.length })
              )
            ),
          ([ops, shuffled]) => {
            expect(sequenceOperations(shuffled)).toEqual(sequenceOperations(ops));
          }
        )
      );
    });
  });

  describe("lowerLogicalOperations", () => {
    it("lowers replace to an insert at the range end followed by a delete of the range", () => {
      expect(lowerLogicalOperations([{ kind: "replace", start: 20, end: 30, text: "New" }])).toEqual([
        { kind: "insert", at: 30, text: "New" },
        { kind: "delete", start: 20, end: 30 },
      ]);
    });

    it("lowers an empty replacement to a plain delete", () => {
      expect(lowerLogicalOperations([{ kind: "replace", start: 2, end: 4, text: "" }])).toEqual([
        { kind: "delete", start: 2, end: 4 },
      ]);
    });

    it("rejects invalid ranges before producing anything", () => {
      expect(() =>
        lowerLogicalOperations([
          { kind: "insert", at: 1, text: "ok" },
          { kind: "replace", start: 8, end: 8, text: "x" },
        ])
      ).toThrow(DocEditError);
    });

    it("rejects inserts without text", () => {
      expect(() => lowerLogicalOperations([{ kind: "insert", at: 3, text: "" }])).toThrow(
        "Insert at index 3 has no text"
      );
    });
  });

  describe("execution against a linear buffer", () => {
    it("replace(5, 10, X) yields buffer[:5] + X + buffer[10:]", () => {
      expect(execute(BUFFER_20, [{ kind: "replace", start: 5, end: 10, text: "X" }])).toBe(
        "abcdeXklmnopqrst"
      );
    });

    it("replace equals delete-then-insert-at-start for any range", () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 2, maxLength: 30 }).chain((buffer) =>
            fc.tuple(
              fc.constant(buffer),
              fc.integer({ min: 0, max: buffer.length - 1 }),
              fc.integer({ min: 1, max: buffer.length }),
              fc.string({ minLength: 1, maxLength: 5 })
            )
          ),
          ([buffer, a, b, text]) => {
            fc.pre(a < b);
            const expected = buffer.slice(0, a) + text + buffer.slice(b);
            expect(execute(buffer, [{ kind: "replace", start: a, end: b, text }])).toBe(expected);
          }
        )
      );
    });

    it("keeps every index valid for mixed batches in caller order", () => {
      const result = execute(BUFFER_20, [
        { kind: "delete", start: 0, end: 2 },
        { kind: "insert", at: 10, text: "__" },
        { kind: "replace", start: 15, end: 18, text: "XYZW" },
      ]);

      expect(result).toBe("cdefghij__klmnoXYZWst");
    });

    it("matches independent application for non-overlapping operations", () => {
      fc.assert(
        fc.property(
          fc.string({ maxLength: 40 }),
          fc.array(planStepArb, { maxLength: 20 }),
          (buffer, steps) => {
            const ops = planOperations(buffer.length, steps);
            expect(execute(buffer, ops)).toBe(composite(buffer, ops));
          }
        )
      );
    });
  });

  describe("buildBatch", () => {
    it("returns an empty batch for no operations", () => {
      expect(buildBatch([])).toEqual({ operations: [] });
      expect(renderBatch(buildBatch([]))).toEqual([]);
    });

    it("carries the required revision", () => {
      const batch = buildBatch([{ kind: "delete", start: 1, end: 2 }], "rev-7");
      expect(batch.requiredRevision).toBe("rev-7");
    });
  });
});
