import { Command } from "commander";
import { decodeEscapes, extractDocumentId, parseIndexArgument } from "../utils/arguments.js";
import { reportOutcome } from "../utils/output.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { type EditFlags, toEditOptions, withEditOptions } from "./editOptions.js";

export function replaceCommand(runtime: CliRuntime): Command {
  const command = new Command("replace")
    .description("Replace the range [start, end) with new text")
    .argument("<documentId>", "Google Doc ID or full URL")
    .argument("<start>", "Start of the range (inclusive)")
    .argument("<end>", "End of the range (exclusive)")
    .argument("<text>", "Replacement text (\\n for newlines)");

  return withEditOptions(command).action(
    async (documentId: string, start: string, end: string, text: string, flags: EditFlags) => {
      const id = extractDocumentId(documentId);
      const startIndex = parseIndexArgument(start, "startIndex");
      const endIndex = parseIndexArgument(end, "endIndex");

      const { editor } = await openEditor(runtime);
      const outcome = await editor.replace(
        id,
        startIndex,
        endIndex,
        decodeEscapes(text),
        toEditOptions(flags)
      );
      reportOutcome(outcome, `Replaced range [${startIndex}, ${endIndex}) with new text`);
    }
  );
}
