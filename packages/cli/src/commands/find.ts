import { Command } from "commander";
import { extractDocumentId } from "../utils/arguments.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { writeJson } from "../utils/terminal.js";

export function findCommand(runtime: CliRuntime): Command {
  return new Command("find")
    .description("Locate a section by heading and print its heading and content ranges")
    .argument("<documentId>", "Google Doc ID or full URL")
    .argument("<heading>", "Heading text to search for (case-insensitive substring)")
    .action(async (documentId: string, heading: string) => {
      const { editor } = await openEditor(runtime);
      writeJson(await editor.findSection(extractDocumentId(documentId), heading));
    });
}
