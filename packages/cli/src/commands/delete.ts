import { Command } from "commander";
import { extractDocumentId, parseIndexArgument } from "../utils/arguments.js";
import { reportOutcome } from "../utils/output.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { type EditFlags, toEditOptions, withEditOptions } from "./editOptions.js";

export function deleteCommand(runtime: CliRuntime): Command {
  const command = new Command("delete")
    .description("Delete the range [start, end)")
    .argument("<documentId>", "Google Doc ID or full URL")
    .argument("<start>", "Start of the range (inclusive)")
    .argument("<end>", "End of the range (exclusive)");

  return withEditOptions(command).action(
    async (documentId: string, start: string, end: string, flags: EditFlags) => {
      const id = extractDocumentId(documentId);
      const startIndex = parseIndexArgument(start, "startIndex");
      const endIndex = parseIndexArgument(end, "endIndex");

      const { editor } = await openEditor(runtime);
      const outcome = await editor.delete(id, startIndex, endIndex, toEditOptions(flags));
      reportOutcome(outcome, `Deleted range [${startIndex}, ${endIndex})`);
    }
  );
}
