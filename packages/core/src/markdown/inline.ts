export type InlineKind = "bold" | "italic" | "bold_italic" | "code";

/** Offsets into the cleaned line, in UTF-16 code units */
export type InlineSpan = {
  start: number;
  end: number;
  kind: InlineKind;
};

export type InlineScanResult = {
  text: string;
  spans: InlineSpan[];
};

const EMPHASIS_MARKERS: ReadonlyArray<{ marker: string; kind: InlineKind }> = [
  { marker: "***", kind: "bold_italic" },
  { marker: "**", kind: "bold" },
  { marker: "*", kind: "italic" },
];

const CODE_MARKER = "`";

type InlineMatch = {
  kind: InlineKind;
  interior: string;
  next: number;
};

/**
 * Strips inline markers from one line in a single left-to-right pass,
 * recording where each styled interior lands in the cleaned output. A marker
 * without a closing partner around a non-empty interior stays literal.
 */
export function scanInline(line: string): InlineScanResult {
  let text = "";
  const spans: InlineSpan[] = [];
  let i = 0;

  while (i < line.length) {
    const match = matchAt(line, i);
    if (!match) {
      text += line[i];
      i += 1;
      continue;
    }
    const start = text.length;
    text += match.interior;
    spans.push({ start, end: text.length, kind: match.kind });
    i = match.next;
  }

  return { text, spans };
}

function matchAt(line: string, i: number): InlineMatch | null {
  if (line.startsWith(CODE_MARKER, i)) {
    return matchPair(line, i, CODE_MARKER, "code");
  }
  if (line[i] !== "*") {
    return null;
  }
  for (const { marker, kind } of EMPHASIS_MARKERS) {
    if (!line.startsWith(marker, i)) {
      continue;
    }
    const match = matchPair(line, i, marker, kind);
    if (match) {
      return match;
    }
  }
  return null;
}

function matchPair(line: string, i: number, marker: string, kind: InlineKind): InlineMatch | null {
  const from = i + marker.length;
  const close = line.indexOf(marker, from);
  if (close <= from) {
    return null;
  }
  return { kind, interior: line.slice(from, close), next: close + marker.length };
}
