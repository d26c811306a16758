import {
  type BulletPreset,
  BULLET_PRESETS,
  DocEditError,
  isBulletPreset,
  isParagraphStyle,
  PARAGRAPH_STYLES,
  type ParagraphStyle,
  type Position,
} from "@gdoc-editor/core";

const DOCUMENT_URL_ID = /docs\.google\.com\/(?:.*\/)?d\/([^/?#]+)/;
const NON_NEGATIVE_INTEGER = /^\d+$/;
const ESCAPE_SEQUENCE = /\\(\\|n)/g;

/** Accepts a bare document id or a full `…/document/d/<id>/edit` URL. */
export function extractDocumentId(value: string): string {
  const trimmed = value.trim();
  const id = DOCUMENT_URL_ID.exec(trimmed)?.[1] ?? trimmed;
  if (!id) {
    throw new DocEditError("INVALID_ARGUMENT", "Document id must not be empty");
  }
  return id;
}

export function parseIndexArgument(value: string, label: string): Position {
  if (!NON_NEGATIVE_INTEGER.test(value.trim())) {
    throw new DocEditError("INVALID_ARGUMENT", `${label} must be a non-negative integer, got ${value}`, {
      context: { [label]: value },
    });
  }
  return Number.parseInt(value, 10);
}

/** Shells pass `\n` through literally; `\\` stands for one backslash. */
export function decodeEscapes(text: string): string {
  return text.replace(ESCAPE_SEQUENCE, (_match, escaped: string) => (escaped === "n" ? "\n" : "\\"));
}

export function parseParagraphStyleOption(value: string | undefined): ParagraphStyle | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isParagraphStyle(value)) {
    throw new DocEditError("INVALID_ARGUMENT", `Unknown paragraph style: ${value}`, {
      hint: `Use one of ${PARAGRAPH_STYLES.join(", ")}`,
    });
  }
  return value;
}

export function parseBulletPresetOption(value: string | undefined): BulletPreset | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isBulletPreset(value)) {
    throw new DocEditError("INVALID_ARGUMENT", `Unknown bullet preset: ${value}`, {
      hint: `Use one of ${BULLET_PRESETS.join(", ")}`,
    });
  }
  return value;
}
