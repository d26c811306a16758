import type { RevisionToken } from "../batch/types.js";
import type { Position } from "../text/utf16.js";

export type BlockKind = "paragraph" | "table" | "section_break";

export type BlockStyle =
  | "paragraph"
  | "title"
  | "subtitle"
  | "heading1"
  | "heading2"
  | "heading3"
  | "heading4"
  | "heading5"
  | "heading6";

export type ContentBlock = {
  kind: BlockKind;
  /** Paragraph blocks only */
  style?: BlockStyle;
  text: string;
  startIndex: Position;
  endIndex: Position;
};

/** Immutable snapshot of a document, read fresh for every command. */
export type ParsedDocument = {
  readonly documentId: string;
  readonly title: string;
  readonly revisionId: RevisionToken;
  readonly content: readonly ContentBlock[];
  readonly fullText: string;
  readonly totalLength: number;
};

export type SectionLocation = {
  heading: string;
  headingStartIndex: Position;
  headingEndIndex: Position;
  contentStartIndex: Position;
  contentEndIndex: Position;
};
