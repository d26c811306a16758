import type { IndexRange, Position } from "../text/utf16.js";
import {
  type BulletPreset,
  type CharStyle,
  type CreateParagraphBulletsRequest,
  type DeleteContentRangeRequest,
  type InsertTextRequest,
  MONOSPACE_FONT_FAMILY,
  type ParagraphStyle,
  type UpdateParagraphStyleRequest,
  type UpdateTextStyleRequest,
  type WireRequest,
  type WireTextStyle,
} from "./types.js";

export function insertTextRequest(index: Position, text: string): InsertTextRequest {
  return { insertText: { location: { index }, text } };
}

export function deleteContentRangeRequest(range: IndexRange): DeleteContentRangeRequest {
  return { deleteContentRange: { range: { ...range } } };
}

export function paragraphStyleRequest(
  range: IndexRange,
  namedStyleType: ParagraphStyle
): UpdateParagraphStyleRequest {
  return {
    updateParagraphStyle: {
      range: { ...range },
      paragraphStyle: { namedStyleType },
      fields: "namedStyleType",
    },
  };
}

export function paragraphBulletsRequest(
  range: IndexRange,
  bulletPreset: BulletPreset
): CreateParagraphBulletsRequest {
  return { createParagraphBullets: { range: { ...range }, bulletPreset } };
}

/**
 * Builds an `updateTextStyle` request whose `fields` mask names exactly the
 * flags that are set. Returns null when no flag is set.
 */
export function textStyleRequest(
  range: IndexRange,
  style: CharStyle
): UpdateTextStyleRequest | null {
  const textStyle: WireTextStyle = {};
  const fields: string[] = [];

  if (style.bold) {
    textStyle.bold = true;
    fields.push("bold");
  }
  if (style.italic) {
    textStyle.italic = true;
    fields.push("italic");
  }
  if (style.underline) {
    textStyle.underline = true;
    fields.push("underline");
  }
  if (style.strikethrough) {
    textStyle.strikethrough = true;
    fields.push("strikethrough");
  }
  if (style.monospace) {
    textStyle.weightedFontFamily = { fontFamily: MONOSPACE_FONT_FAMILY };
    fields.push("weightedFontFamily");
  }

  if (fields.length === 0) {
    return null;
  }
  return { updateTextStyle: { range: { ...range }, textStyle, fields: fields.join(",") } };
}

export function isInsertTextRequest(request: WireRequest): request is InsertTextRequest {
  return "insertText" in request;
}

export function isDeleteContentRangeRequest(
  request: WireRequest
): request is DeleteContentRangeRequest {
  return "deleteContentRange" in request;
}
