import type { IndexRange, Position } from "../text/utf16.js";

// ============================================================================
// Styles
// ============================================================================

export const PARAGRAPH_STYLES = [
  "NORMAL_TEXT",
  "HEADING_1",
  "HEADING_2",
  "HEADING_3",
  "HEADING_4",
  "HEADING_5",
  "HEADING_6",
  "TITLE",
  "SUBTITLE",
] as const;

export type ParagraphStyle = (typeof PARAGRAPH_STYLES)[number];

export const BULLET_PRESETS = [
  "BULLET_DISC_CIRCLE_SQUARE",
  "BULLET_DIAMONDX_ARROW3D_SQUARE",
  "BULLET_CHECKBOX",
  "BULLET_ARROW_DIAMOND_DISC",
  "NUMBERED_DECIMAL_ALPHA_ROMAN",
  "NUMBERED_DECIMAL_ALPHA_ROMAN_PARENS",
  "NUMBERED_DECIMAL_NESTED",
  "NUMBERED_UPPERALPHA_ALPHA_ROMAN",
  "NUMBERED_UPPERROMAN_UPPERALPHA_DECIMAL",
  "NUMBERED_ZERODECIMAL_ALPHA_ROMAN",
] as const;

export type BulletPreset = (typeof BULLET_PRESETS)[number];

export type CharStyle = {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikethrough?: boolean;
  /** Rendered as the Courier New font family */
  monospace?: boolean;
};

export const MONOSPACE_FONT_FAMILY = "Courier New";

// ============================================================================
// Operations
// ============================================================================

export type InsertOperation = {
  kind: "insert";
  at: Position;
  text: string;
  paragraphStyle?: ParagraphStyle;
  bulletPreset?: BulletPreset;
  charStyle?: CharStyle;
};

export type DeleteOperation = {
  kind: "delete";
  start: Position;
  end: Position;
};

/** Caller-facing edit intent; lowered to primitives before sequencing */
export type ReplaceOperation = {
  kind: "replace";
  start: Position;
  end: Position;
  text: string;
};

export type PrimitiveOperation = InsertOperation | DeleteOperation;

export type LogicalOperation = PrimitiveOperation | ReplaceOperation;

// ============================================================================
// Wire protocol (Docs API batchUpdate request shapes)
// ============================================================================

export type InsertTextRequest = {
  insertText: {
    location: { index: Position };
    text: string;
  };
};

export type DeleteContentRangeRequest = {
  deleteContentRange: {
    range: IndexRange;
  };
};

export type UpdateParagraphStyleRequest = {
  updateParagraphStyle: {
    range: IndexRange;
    paragraphStyle: { namedStyleType: ParagraphStyle };
    fields: "namedStyleType";
  };
};

export type CreateParagraphBulletsRequest = {
  createParagraphBullets: {
    range: IndexRange;
    bulletPreset: BulletPreset;
  };
};

export type WireTextStyle = {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikethrough?: boolean;
  weightedFontFamily?: { fontFamily: string };
};

export type UpdateTextStyleRequest = {
  updateTextStyle: {
    range: IndexRange;
    textStyle: WireTextStyle;
    fields: string;
  };
};

export type WireRequest =
  | InsertTextRequest
  | DeleteContentRangeRequest
  | UpdateParagraphStyleRequest
  | CreateParagraphBulletsRequest
  | UpdateTextStyleRequest;
