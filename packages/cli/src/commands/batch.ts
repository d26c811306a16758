import { readFile } from "node:fs/promises";
import { DocEditError, getErrorMessage, parseBatchFile } from "@gdoc-editor/core";
import { Command } from "commander";
import { extractDocumentId } from "../utils/arguments.js";
import { reportOutcome } from "../utils/output.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { type EditFlags, toEditOptions, withEditOptions } from "./editOptions.js";

export function batchCommand(runtime: CliRuntime): Command {
  const command = new Command("batch")
    .description("Run insert, delete and replace operations from a JSON file as one atomic batch")
    .argument("<documentId>", "Google Doc ID or full URL")
    .argument("<operationsFile>", "JSON array of { type, startIndex, endIndex?, text? }");

  return withEditOptions(command).action(
    async (documentId: string, operationsFile: string, flags: EditFlags) => {
      const id = extractDocumentId(documentId);
      const operations = parseBatchFile(await readOperationsFile(operationsFile));

      const { editor } = await openEditor(runtime);
      const outcome = await editor.submit(id, operations, toEditOptions(flags));
      reportOutcome(outcome, `Executed ${operations.length} operations`);
    }
  );
}

async function readOperationsFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new DocEditError(
      "INVALID_BATCH_FILE",
      `Could not read operations file ${filePath}: ${getErrorMessage(error)}`,
      { cause: error }
    );
  }
}
