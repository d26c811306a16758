import { assertPosition, assertRange, rangeOfInsertion } from "../text/utf16.js";
import {
  BULLET_PRESETS,
  type BulletPreset,
  type DeleteOperation,
  type InsertOperation,
  type LogicalOperation,
  PARAGRAPH_STYLES,
  type ParagraphStyle,
  type PrimitiveOperation,
  type WireRequest,
} from "./types.js";
import {
  deleteContentRangeRequest,
  insertTextRequest,
  paragraphBulletsRequest,
  paragraphStyleRequest,
  textStyleRequest,
} from "./wire.js";

/** Applied when newline-terminated text is inserted without an explicit style */
export const DEFAULT_PARAGRAPH_STYLE: ParagraphStyle = "NORMAL_TEXT";

const PARAGRAPH_STYLE_SET: ReadonlySet<string> = new Set(PARAGRAPH_STYLES);
const BULLET_PRESET_SET: ReadonlySet<string> = new Set(BULLET_PRESETS);

export function isParagraphStyle(value: string): value is ParagraphStyle {
  return PARAGRAPH_STYLE_SET.has(value);
}

export function isBulletPreset(value: string): value is BulletPreset {
  return BULLET_PRESET_SET.has(value);
}

export function endsWithLineTerminator(text: string): boolean {
  return text.endsWith("\n");
}

/**
 * Paragraph style an insert will carry: the explicit one, or NORMAL_TEXT for
 * newline-terminated text.
 */
export function resolveParagraphStyle(op: InsertOperation): ParagraphStyle | undefined {
  if (op.paragraphStyle) {
    return op.paragraphStyle;
  }
  return endsWithLineTerminator(op.text) ? DEFAULT_PARAGRAPH_STYLE : undefined;
}

export function validateOperation(op: LogicalOperation): void {
  switch (op.kind) {
    case "insert":
      assertPosition(op.at, "index");
      return;
    case "delete":
    case "replace":
      assertRange(op.start, op.end);
      return;
  }
}

export function toWireRequests(op: PrimitiveOperation): WireRequest[] {
  validateOperation(op);
  return op.kind === "insert" ? insertToWire(op) : [deleteToWire(op)];
}

function insertToWire(op: InsertOperation): WireRequest[] {
  const requests: WireRequest[] = [insertTextRequest(op.at, op.text)];
  const range = rangeOfInsertion(op.at, op.text);

  const paragraphStyle = resolveParagraphStyle(op);
  if (paragraphStyle) {
    requests.push(paragraphStyleRequest(range, paragraphStyle));
  }
  if (op.bulletPreset) {
    requests.push(paragraphBulletsRequest(range, op.bulletPreset));
  }
  if (op.charStyle) {
    const styleRequest = textStyleRequest(range, op.charStyle);
    if (styleRequest) {
      requests.push(styleRequest);
    }
  }
  return requests;
}

function deleteToWire(op: DeleteOperation): WireRequest {
  return deleteContentRangeRequest({ startIndex: op.start, endIndex: op.end });
}

export function describeOperation(op: LogicalOperation): string {
  switch (op.kind) {
    case "insert":
      return `Insert ${JSON.stringify(op.text)} at index ${op.at}`;
    case "delete":
      return `Delete range [${op.start}, ${op.end})`;
    case "replace":
      return `Replace range [${op.start}, ${op.end}) with ${JSON.stringify(op.text)}`;
  }
}
