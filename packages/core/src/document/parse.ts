/**
 * Read model: flattens a Docs API document resource into indexed blocks.
 */

import { z } from "zod";
import { DocEditError } from "../errors.js";
import type { BlockStyle, ContentBlock, ParsedDocument, SectionLocation } from "./types.js";

// ============================================================================
// Docs API resource (only the fields the read model uses)
// ============================================================================

const TextRunSchema = z.object({ content: z.string().optional() }).passthrough();

const ParagraphElementSchema = z.object({ textRun: TextRunSchema.optional() }).passthrough();

const ParagraphSchema = z
  .object({
    elements: z.array(ParagraphElementSchema).optional(),
    paragraphStyle: z.object({ namedStyleType: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const StructuralElementSchema = z
  .object({
    startIndex: z.number().int().optional(),
    endIndex: z.number().int().optional(),
    paragraph: ParagraphSchema.optional(),
    table: z.record(z.unknown()).optional(),
    sectionBreak: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const GoogleDocumentSchema = z
  .object({
    documentId: z.string().optional(),
    title: z.string().optional(),
    revisionId: z.string().optional(),
    body: z.object({ content: z.array(StructuralElementSchema).optional() }).passthrough().optional(),
  })
  .passthrough();

export type GoogleDocument = z.infer<typeof GoogleDocumentSchema>;
type StructuralElement = z.infer<typeof StructuralElementSchema>;
type Paragraph = z.infer<typeof ParagraphSchema>;

const NAMED_STYLE_MAP: Record<string, BlockStyle> = {
  NORMAL_TEXT: "paragraph",
  TITLE: "title",
  SUBTITLE: "subtitle",
  HEADING_1: "heading1",
  HEADING_2: "heading2",
  HEADING_3: "heading3",
  HEADING_4: "heading4",
  HEADING_5: "heading5",
  HEADING_6: "heading6",
};

export const TABLE_PLACEHOLDER = "[TABLE]";

// ============================================================================
// Parsing
// ============================================================================

export function parseGoogleDocument(raw: unknown): GoogleDocument {
  const parsed = GoogleDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DocEditError("REMOTE_OPERATION_FAILED", "Unexpected document payload from the Docs API", {
      context: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}

export function parseDocumentStructure(document: GoogleDocument): ParsedDocument {
  const elements = document.body?.content ?? [];
  const content: ContentBlock[] = [];
  const textParts: string[] = [];

  for (const element of elements) {
    const startIndex = element.startIndex ?? 0;
    const endIndex = element.endIndex ?? startIndex;

    if (element.paragraph) {
      const text = paragraphText(element.paragraph);
      // Leading empty paragraphs carry no content worth addressing
      if (text.trim() || startIndex > 1) {
        content.push({
          kind: "paragraph",
          style: paragraphStyle(element.paragraph),
          text,
          startIndex,
          endIndex,
        });
        textParts.push(text);
      }
    } else if (element.table) {
      content.push({ kind: "table", text: TABLE_PLACEHOLDER, startIndex, endIndex });
      textParts.push(`${TABLE_PLACEHOLDER}\n`);
    } else if (element.sectionBreak) {
      content.push({ kind: "section_break", text: "", startIndex, endIndex });
    }
  }

  return {
    documentId: document.documentId ?? "",
    title: document.title ?? "",
    revisionId: document.revisionId ?? "",
    content,
    fullText: textParts.join(""),
    totalLength: lastEndIndex(elements),
  };
}

function paragraphText(paragraph: Paragraph): string {
  return (paragraph.elements ?? []).map((element) => element.textRun?.content ?? "").join("");
}

function paragraphStyle(paragraph: Paragraph): BlockStyle {
  const named = paragraph.paragraphStyle?.namedStyleType;
  return (named && NAMED_STYLE_MAP[named]) || "paragraph";
}

function lastEndIndex(elements: StructuralElement[]): number {
  const last = elements[elements.length - 1];
  return last?.endIndex ?? 0;
}

// ============================================================================
// Sections
// ============================================================================

export function isHeadingBlock(block: ContentBlock): boolean {
  return block.kind === "paragraph" && (block.style?.startsWith("heading") ?? false);
}

/**
 * Locates the first heading containing `headingText` (case-insensitive). The
 * section content runs to the next heading of any level, or to the end.
 */
export function findSection(
  document: ParsedDocument,
  headingText: string
): SectionLocation | null {
  const needle = headingText.toLowerCase();
  const blocks = document.content;

  for (let i = 0; i < blocks.length; i += 1) {
    const block = blocks[i];
    if (!isHeadingBlock(block) || !block.text.toLowerCase().includes(needle)) {
      continue;
    }

    let contentEndIndex = document.totalLength;
    for (const next of blocks.slice(i + 1)) {
      if (isHeadingBlock(next)) {
        contentEndIndex = next.startIndex;
        break;
      }
    }

    return {
      heading: block.text.trim(),
      headingStartIndex: block.startIndex,
      headingEndIndex: block.endIndex,
      contentStartIndex: block.endIndex,
      contentEndIndex,
    };
  }

  return null;
}
