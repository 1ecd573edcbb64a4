import type { Span } from "../types/common";

export function createSpan(fields: Span): Span {
  return Object.freeze({ ...fields });
}

/** `0 <= start < end <= textLength`, integer offsets, score in [0,1]. */
export function isValidSpan(span: Span, textLength: number): boolean {
  return (
    Number.isInteger(span.start) &&
    Number.isInteger(span.end) &&
    span.start >= 0 &&
    span.start < span.end &&
    span.end <= textLength &&
    span.score >= 0 &&
    span.score <= 1
  );
}

export function spanLength(span: Span): number {
  return span.end - span.start;
}

export function overlaps(a: TextRange, b: TextRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export interface TextRange {
  start: number;
  end: number;
}

/** Every exact (case-sensitive) occurrence of `needle`, overlapping occurrences included. */
export function findOccurrences(text: string, needle: string): TextRange[] {
  const ranges: TextRange[] = [];
  if (!needle) return ranges;
  let from = text.indexOf(needle);
  while (from !== -1) {
    ranges.push({ start: from, end: from + needle.length });
    from = text.indexOf(needle, from + 1);
  }
  return ranges;
}
