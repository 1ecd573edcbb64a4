import type { Span } from "../types/common";
import { silentLogger, type Logger } from "../util/logger";
import { findOccurrences, overlaps } from "./span";

/**
 * Removes every span touching an occurrence of the pseudonym so it is never redacted.
 * A span that only partly overlaps, or that contains the pseudonym, is dropped whole
 * rather than trimmed; each such drop is logged for audit.
 */
export function guardPseudonym(
  spans: readonly Span[],
  text: string,
  pseudonym: string | undefined,
  logger: Logger = silentLogger,
): Span[] {
  if (!pseudonym) return [...spans];
  const protectedRanges = findOccurrences(text, pseudonym);
  if (protectedRanges.length === 0) return [...spans];

  return spans.filter((span) => {
    const hit = protectedRanges.find((r) => overlaps(span, r));
    if (!hit) return true;
    const inside = protectedRanges.some((r) => span.start >= r.start && span.end <= r.end);
    if (!inside) {
      logger.warn("pseudonym_overlap_dropped", {
        start: span.start,
        end: span.end,
        category: span.category,
        method: span.method,
        occurrenceStart: hit.start,
        occurrenceEnd: hit.end,
      });
    }
    return false;
  });
}
