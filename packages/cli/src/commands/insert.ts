import type { CharStyle } from "@gdoc-editor/core";
import { Command } from "commander";
import {
  decodeEscapes,
  extractDocumentId,
  parseBulletPresetOption,
  parseIndexArgument,
  parseParagraphStyleOption,
} from "../utils/arguments.js";
import { describeInsert, reportOutcome } from "../utils/output.js";
import { type CliRuntime, openEditor } from "../utils/runtime.js";
import { type EditFlags, toEditOptions, withEditOptions } from "./editOptions.js";

type InsertFlags = EditFlags & {
  style?: string;
  bullet?: string;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikethrough?: boolean;
  code?: boolean;
};

export function insertCommand(runtime: CliRuntime): Command {
  const command = new Command("insert")
    .description("Insert text at an index with optional paragraph, list and character styles")
    .argument("<documentId>", "Google Doc ID or full URL")
    .argument("<index>", "UTF-16 index where the text is inserted")
    .argument("<text>", "Text to insert (\\n for newlines)")
    .option("--style <style>", "Paragraph style, e.g. HEADING_2 (NORMAL_TEXT is applied to text ending in \\n)")
    .option("--bullet <preset>", "Bullet or numbered list preset, e.g. BULLET_DISC_CIRCLE_SQUARE")
    .option("--bold", "Bold")
    .option("--italic", "Italic")
    .option("--underline", "Underline")
    .option("--strikethrough", "Strikethrough")
    .option("--code", "Monospace (Courier New)");

  return withEditOptions(command).action(
    async (documentId: string, index: string, text: string, flags: InsertFlags) => {
      const id = extractDocumentId(documentId);
      const at = parseIndexArgument(index, "index");
      const paragraphStyle = parseParagraphStyleOption(flags.style);
      const bulletPreset = parseBulletPresetOption(flags.bullet);
      const charStyle = toCharStyle(flags);
      const decoded = decodeEscapes(text);

      const { editor } = await openEditor(runtime);
      const outcome = await editor.insert(
        id,
        { index: at, text: decoded, paragraphStyle, bulletPreset, charStyle },
        toEditOptions(flags)
      );
      reportOutcome(
        outcome,
        describeInsert({
          index: at,
          paragraphStyle: paragraphStyle ?? (decoded.endsWith("\n") ? "NORMAL_TEXT" : undefined),
          bulletPreset,
          charStyle,
        })
      );
    }
  );
}

function toCharStyle(flags: InsertFlags): CharStyle | undefined {
  const style: CharStyle = {
    bold: flags.bold === true,
    italic: flags.italic === true,
    underline: flags.underline === true,
    strikethrough: flags.strikethrough === true,
    monospace: flags.code === true,
  };
  return Object.values(style).some(Boolean) ? style : undefined;
}
