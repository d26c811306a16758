import type { CharStyle, SubmitOutcome } from "@gdoc-editor/core";
import { writeJson, writeStderr } from "./terminal.js";

/**
 * Prints the command result as JSON on stdout. Only an applied batch gets a
 * `✓` confirmation, on stderr.
 */
export function reportOutcome(outcome: SubmitOutcome, confirmation: string): void {
  switch (outcome.status) {
    case "noop":
      writeJson({ message: outcome.message });
      return;
    case "dry_run":
      writeJson(outcome.preview);
      return;
    case "applied":
      writeJson(outcome.result);
      writeStderr(`✓ ${confirmation}`);
      return;
  }
}

const CHAR_STYLE_LABELS: ReadonlyArray<[keyof CharStyle, string]> = [
  ["bold", "bold"],
  ["italic", "italic"],
  ["underline", "underline"],
  ["strikethrough", "strikethrough"],
  ["monospace", "code"],
];

export type InsertSummary = {
  index: number;
  paragraphStyle?: string;
  bulletPreset?: string;
  charStyle?: CharStyle;
};

export function describeInsert(summary: InsertSummary): string {
  const parts = [`Inserted text at index ${summary.index}`];
  if (summary.paragraphStyle) {
    parts.push(` with style ${summary.paragraphStyle}`);
  }
  if (summary.bulletPreset) {
    parts.push(` as ${summary.bulletPreset} list`);
  }
  const flags = CHAR_STYLE_LABELS.filter(([key]) => summary.charStyle?.[key]).map(([, label]) => label);
  if (flags.length > 0) {
    parts.push(` (${flags.join(", ")})`);
  }
  return parts.join("");
}
