import { Command, Option } from "commander";
import { extractDocumentId } from "../utils/arguments.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { writeJson, writeStdout } from "../utils/terminal.js";

type ReadFormat = "json" | "text";

export function readCommand(runtime: CliRuntime): Command {
  return new Command("read")
    .description("Fetch the document structure and content with UTF-16 indices")
    .argument("<documentId>", "Google Doc ID or full URL")
    .addOption(
      new Option("--format <format>", "Output format").choices(["json", "text"]).default("json")
    )
    .action(async (documentId: string, options: { format: ReadFormat }) => {
      const { editor } = await openEditor(runtime);
      const document = await editor.read(extractDocumentId(documentId));
      if (options.format === "text") {
        writeStdout(document.fullText);
        return;
      }
      writeJson(document);
    });
}
