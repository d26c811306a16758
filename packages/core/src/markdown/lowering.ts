/**
 * Markdown Lowering
 *
 * Turns a small markdown dialect (headings, bullet and numbered items, bold,
 * italic, bold+italic, inline code) into one text insertion followed by
 * style requests addressed in the post-insertion index space. The batch is
 * insert-only, so it needs no sequencing.
 */

import type {
  BulletPreset,
  CharStyle,
  ParagraphStyle,
  WireRequest,
} from "../operations/types.js";
import {
  insertTextRequest,
  paragraphBulletsRequest,
  paragraphStyleRequest,
  textStyleRequest,
} from "../operations/wire.js";
import { type IndexRange, type Position, utf16Length } from "../text/utf16.js";
import { type InlineKind, scanInline } from "./inline.js";

export const MARKDOWN_BULLET_PRESET: BulletPreset = "BULLET_DISC_CIRCLE_SQUARE";
export const MARKDOWN_NUMBERED_PRESET: BulletPreset = "NUMBERED_DECIMAL_ALPHA_ROMAN";

export type LineKind =
  | { type: "heading"; style: ParagraphStyle }
  | { type: "bullet" }
  | { type: "numbered" }
  | { type: "paragraph" };

export type ClassifiedLine = {
  kind: LineKind;
  content: string;
};

export type MarkdownLowering = {
  /** Flattened text inserted at the start index */
  text: string;
  requests: WireRequest[];
  totalLength: number;
};

const HEADING_MARKERS: ReadonlyArray<{ marker: string; style: ParagraphStyle }> = [
  { marker: "### ", style: "HEADING_3" },
  { marker: "## ", style: "HEADING_2" },
  { marker: "# ", style: "HEADING_1" },
];

const BULLET_MARKERS = ["- ", "* "];

const ORDERED_MARKER = /^\d+\.\s/;

const INLINE_STYLES: Record<InlineKind, CharStyle> = {
  bold: { bold: true },
  italic: { italic: true },
  bold_italic: { bold: true, italic: true },
  code: { monospace: true },
};

export function classifyLine(line: string): ClassifiedLine {
  for (const { marker, style } of HEADING_MARKERS) {
    if (line.startsWith(marker)) {
      return { kind: { type: "heading", style }, content: line.slice(marker.length) };
    }
  }
  for (const marker of BULLET_MARKERS) {
    if (line.startsWith(marker)) {
      return { kind: { type: "bullet" }, content: line.slice(marker.length) };
    }
  }
  const ordered = ORDERED_MARKER.exec(line);
  if (ordered) {
    return { kind: { type: "numbered" }, content: line.slice(ordered[0].length) };
  }
  return { kind: { type: "paragraph" }, content: line };
}

export function splitMarkdownLines(markdown: string): string[] {
  const normalized = markdown.replace(/\r\n?/g, "\n");
  if (normalized.length === 0) {
    return [];
  }
  const lines = normalized.split("\n");
  // A final newline terminates the last line rather than opening a new one
  if (normalized.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}

type ListRange = IndexRange & { preset: BulletPreset };

export function lowerMarkdown(markdown: string, startIndex: Position): MarkdownLowering {
  const lines = splitMarkdownLines(markdown);
  if (lines.length === 0) {
    return { text: "", requests: [], totalLength: 0 };
  }

  const textParts: string[] = [];
  const headingRequests: WireRequest[] = [];
  const listRanges: ListRange[] = [];
  const inlineRequests: WireRequest[] = [];
  let cursor = startIndex;

  for (const line of lines) {
    const { kind, content } = classifyLine(line);
    const { text, spans } = scanInline(content);
    const lineText = `${text}\n`;
    const range: IndexRange = { startIndex: cursor, endIndex: cursor + utf16Length(lineText) };

    if (kind.type === "heading") {
      headingRequests.push(paragraphStyleRequest(range, kind.style));
    } else if (kind.type === "bullet") {
      appendListRange(listRanges, range, MARKDOWN_BULLET_PRESET);
    } else if (kind.type === "numbered") {
      appendListRange(listRanges, range, MARKDOWN_NUMBERED_PRESET);
    }

    for (const span of spans) {
      const request = textStyleRequest(
        { startIndex: cursor + span.start, endIndex: cursor + span.end },
        INLINE_STYLES[span.kind]
      );
      if (request) {
        inlineRequests.push(request);
      }
    }

    textParts.push(lineText);
    cursor = range.endIndex;
  }

  const text = textParts.join("");
  const listRequests = listRanges.map(({ preset, ...range }) => paragraphBulletsRequest(range, preset));

  return {
    text,
    requests: [insertTextRequest(startIndex, text), ...headingRequests, ...listRequests, ...inlineRequests],
    totalLength: cursor - startIndex,
  };
}

/** Consecutive items of the same list kind form one list. */
function appendListRange(ranges: ListRange[], range: IndexRange, preset: BulletPreset): void {
  const last = ranges[ranges.length - 1];
  if (last && last.preset === preset && last.endIndex === range.startIndex) {
    last.endIndex = range.endIndex;
    return;
  }
  ranges.push({ ...range, preset });
}
