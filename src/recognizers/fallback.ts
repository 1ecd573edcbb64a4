import { createSpan } from "../core/span";
import type { Span } from "../types/common";
import { matchPattern } from "./matcher";
import { FALLBACK_PATTERNS, type PatternDefinition } from "./patterns";
import type { Recognizer } from "./types";

/** Last line of detection: strict regexes at fixed scores, no context. */
export class FallbackRecognizer implements Recognizer {
  readonly name = "fallback_regex";
  readonly method = "fallback_regex";

  constructor(private readonly patterns: readonly PatternDefinition[] = FALLBACK_PATTERNS) {}

  async detect(text: string): Promise<Span[]> {
    const spans: Span[] = [];
    for (const pattern of this.patterns) {
      for (const m of matchPattern(text, pattern)) {
        spans.push(
          createSpan({
            start: m.start,
            end: m.end,
            category: pattern.classify ? pattern.classify(m.value) : pattern.category,
            score: pattern.score,
            method: this.method,
          }),
        );
      }
    }
    return spans;
  }
}
