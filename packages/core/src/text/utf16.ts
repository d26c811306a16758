/**
 * Position model.
 *
 * Every document index is a count of UTF-16 code units from the start of the
 * body. JavaScript strings are sequences of UTF-16 code units, so `length` is
 * the exact number of 16-bit words a UTF-16 encoder emits: a supplementary
 * plane character counts 2, a combining mark counts 1.
 */

import { invalidPosition, invalidRange } from "../errors.js";

export type Position = number;

/** Half-open range `[startIndex, endIndex)` */
export type IndexRange = {
  startIndex: Position;
  endIndex: Position;
};

export function utf16Length(text: string): number {
  return text.length;
}

export function isPosition(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

export function assertPosition(value: number, label = "index"): void {
  if (!isPosition(value)) {
    throw invalidPosition(label, value);
  }
}

export function assertRange(start: number, end: number): void {
  assertPosition(start, "startIndex");
  assertPosition(end, "endIndex");
  if (end <= start) {
    throw invalidRange(start, end);
  }
}

/** Range covered by `text` once inserted at `at`. */
export function rangeOfInsertion(at: Position, text: string): IndexRange {
  return { startIndex: at, endIndex: at + utf16Length(text) };
}
