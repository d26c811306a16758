import { describe, expect, it } from "vitest";
import { parseBatchEntries, parseBatchFile } from "../batch/batchFile.js";
import { buildBatch } from "../batch/sequencer.js";
import { DocEditError } from "../errors.js";

describe("parseBatchFile", () => {
  it("maps entries to logical operations in file order", () => {
    const ops = parseBatchFile(
      JSON.stringify([
        { type: "insert", startIndex: 100, text: "New text" },
        { type: "delete", startIndex: 50, endIndex: 75 },
        { type: "replace", startIndex: 20, endIndex: 30, text: "Replacement" },
      ])
    );

    expect(ops).toEqual([
      { kind: "insert", at: 100, text: "New text" },
      { kind: "delete", start: 50, end: 75 },
      { kind: "replace", start: 20, end: 30, text: "Replacement" },
    ]);
  });

  it("sequences a parsed file right to left", () => {
    const ops = parseBatchFile(
      JSON.stringify([
        { type: "insert", startIndex: 100, text: "New text" },
        { type: "delete", startIndex: 50, endIndex: 75 },
        { type: "replace", startIndex: 20, endIndex: 30, text: "Replacement" },
      ])
    );

    expect(buildBatch(ops).operations).toEqual([
      { kind: "insert", at: 100, text: "New text" },
      { kind: "delete", start: 50, end: 75 },
      { kind: "insert", at: 30, text: "Replacement" },
      { kind: "delete", start: 20, end: 30 },
    ]);
  });

  it("accepts an empty array", () => {
    expect(parseBatchFile("[]")).toEqual([]);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseBatchFile("[{")).toThrow(/^Batch file is not valid JSON: /);
  });

  it("rejects a document that is not an array", () => {
    expect(() => parseBatchFile('{"type":"insert"}')).toThrow(DocEditError);
    expect(() => parseBatchFile('{"type":"insert"}')).toThrow(/^Invalid batch file: /);
  });

  it("reports the path of a mistyped field", () => {
    try {
      parseBatchEntries([{ type: "delete", startIndex: "5", endIndex: 9 }]);
      expect.unreachable("entry should have been rejected");
    } catch (error) {
      expect(error).toMatchObject({ code: "INVALID_BATCH_FILE" });
      expect(error).toHaveProperty("message", expect.stringMatching(/^Invalid batch file at 0\.startIndex: /));
    }
  });

  it("rejects unknown operation types", () => {
    expect(() => parseBatchEntries([{ type: "move", startIndex: 1 }])).toThrow(
      "Unknown operation type at position 0: move"
    );
  });

  it("requires text for inserts and replaces", () => {
    expect(() => parseBatchEntries([{ type: "insert", startIndex: 1 }])).toThrow(
      'Operation 0 (insert) requires "text"'
    );
    expect(() =>
      parseBatchEntries([
        { type: "delete", startIndex: 1, endIndex: 2 },
        { type: "replace", startIndex: 1, endIndex: 4 },
      ])
    ).toThrow('Operation 1 (replace) requires "text"');
  });

  it("requires endIndex for deletes", () => {
    try {
      parseBatchEntries([{ type: "delete", startIndex: 1 }]);
      expect.unreachable("entry should have been rejected");
    } catch (error) {
      expect(error).toMatchObject({
        code: "INVALID_BATCH_FILE",
        message: 'Operation 0 (delete) requires "endIndex"',
      });
    }
  });

  it("leaves range checks to the sequencer", () => {
    const ops = parseBatchEntries([{ type: "delete", startIndex: 10, endIndex: 5 }]);
    expect(() => buildBatch(ops)).toThrow("endIndex (5) must be greater than startIndex (10)");
  });
});
