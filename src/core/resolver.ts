import { METHOD_PRIORITY } from "../types/categories";
import type { ResolvedSpanSet, Span } from "../types/common";
import { ResolutionFailure } from "./errors";
import { spanLength } from "./span";

export type SpanResolver = (candidates: readonly Span[]) => ResolvedSpanSet;

/** Ordering used both for the initial sort and for picking an overlap winner. */
function compareStrength(a: Span, b: Span): number {
  if (a.score !== b.score) return b.score - a.score;
  const byMethod = METHOD_PRIORITY[b.method] - METHOD_PRIORITY[a.method];
  if (byMethod !== 0) return byMethod;
  return spanLength(b) - spanLength(a);
}

/** True when `challenger` should replace `winner` on overlap. */
function beats(challenger: Span, winner: Span): boolean {
  return compareStrength(challenger, winner) < 0;
}

/**
 * Greedy left-to-right sweep over candidates sorted by start, score, method priority
 * and length. Overlapping candidates compete with the current winner (higher score,
 * then higher method priority, then longer span); disjoint ones are all kept.
 *
 * Not globally optimal in covered entities, but deterministic and O(n log n).
 */
export const resolveSpans: SpanResolver = (candidates) => {
  for (const c of candidates) {
    if (!(Number.isInteger(c.start) && Number.isInteger(c.end) && c.start >= 0 && c.start < c.end)) {
      throw new ResolutionFailure(`malformed candidate span [${c.start}, ${c.end})`);
    }
  }
  if (candidates.length === 0) return [];

  const sorted = [...candidates].sort((a, b) => a.start - b.start || compareStrength(a, b));

  const resolved: Span[] = [];
  let winner = sorted[0];
  for (let i = 1; i < sorted.length; i++) {
    const candidate = sorted[i];
    if (candidate.start < winner.end) {
      if (beats(candidate, winner)) winner = candidate;
      continue;
    }
    resolved.push(winner);
    winner = candidate;
  }
  resolved.push(winner);
  return resolved;
};
