import { readFile } from "node:fs/promises";
import { DocEditError, getErrorMessage } from "@gdoc-editor/core";
import { Command } from "commander";
import { decodeEscapes, extractDocumentId, parseIndexArgument } from "../utils/arguments.js";
import { reportOutcome } from "../utils/output.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { readStdin } from "../utils/terminal.js";
import { type EditFlags, toEditOptions, withEditOptions } from "./editOptions.js";

type MarkdownFlags = EditFlags & { file?: string };

export function markdownCommand(runtime: CliRuntime): Command {
  const command = new Command("markdown")
    .description("Insert markdown (headings, lists, bold, italic, code) as formatted text")
    .argument("<documentId>", "Google Doc ID or full URL")
    .argument("<index>", "UTF-16 index where the content is inserted")
    .argument("[markdown]", "Markdown source (\\n for newlines); read from --file or stdin when omitted")
    .option("-f, --file <path>", "Read markdown from a file");

  return withEditOptions(command).action(
    async (documentId: string, index: string, markdown: string | undefined, flags: MarkdownFlags) => {
      const id = extractDocumentId(documentId);
      const at = parseIndexArgument(index, "index");
      const source = await resolveMarkdownSource(markdown, flags.file);

      const { editor } = await openEditor(runtime);
      const outcome = await editor.insertMarkdown(id, at, source, toEditOptions(flags));
      reportOutcome(outcome, `Inserted markdown at index ${at}`);
    }
  );
}

async function resolveMarkdownSource(inline: string | undefined, file: string | undefined): Promise<string> {
  if (inline !== undefined && file) {
    throw new DocEditError("INVALID_ARGUMENT", "Pass markdown inline or with --file, not both");
  }
  if (inline !== undefined) {
    return decodeEscapes(inline);
  }
  if (file) {
    try {
      return await readFile(file, "utf8");
    } catch (error) {
      throw new DocEditError("INVALID_ARGUMENT", `Could not read ${file}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }
  return readStdin();
}
