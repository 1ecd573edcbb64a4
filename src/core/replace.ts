import type { ReplacementEntry, Span } from "../types/common";
import type { CategoryCatalog } from "./catalog";
import { ReplacementFailure } from "./errors";

export interface ReplacementOutput {
  text: string;
  /** Ascending by start, offsets in the coordinates of the input text. */
  entries: ReplacementEntry[];
}

export type ReplacementEngine = (
  text: string,
  spans: readonly Span[],
  catalog: CategoryCatalog,
) => ReplacementOutput;

/**
 * Substitutes each span with its category token. Spans are spliced last-to-first so
 * earlier offsets stay valid while the string changes length.
 */
export const applyReplacements: ReplacementEngine = (text, spans, catalog) => {
  const ordered = [...spans].sort((a, b) => a.start - b.start);

  let previousEnd = 0;
  for (const span of ordered) {
    if (span.start < 0 || span.end > text.length || span.start >= span.end) {
      throw new ReplacementFailure(`span [${span.start}, ${span.end}) out of bounds`);
    }
    if (span.start < previousEnd) {
      throw new ReplacementFailure(`span [${span.start}, ${span.end}) overlaps its predecessor`);
    }
    previousEnd = span.end;
  }

  const entries = ordered.map((span) => ({ span, replacement: catalog.tokenFor(span.category) }));

  let out = text;
  for (let i = entries.length - 1; i >= 0; i--) {
    const { span, replacement } = entries[i];
    out = out.slice(0, span.start) + replacement + out.slice(span.end);
  }
  return { text: out, entries };
};
