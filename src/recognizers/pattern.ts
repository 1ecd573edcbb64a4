import { createSpan } from "../core/span";
import type { Span } from "../types/common";
import { DEFAULT_CONTEXT, scoreWithContext, type ContextOptions } from "./context";
import { matchPattern } from "./matcher";
import { CUSTOM_PATTERNS, type PatternDefinition } from "./patterns";
import type { Recognizer } from "./types";

export interface PatternRecognizerOptions {
  patterns?: readonly PatternDefinition[];
  context?: ContextOptions;
}

/** Regex recognizers whose confidence rises when a context keyword precedes the hit. */
export class PatternRecognizer implements Recognizer {
  readonly name = "custom_patterns";
  readonly method = "custom_recognizer";
  private readonly patterns: readonly PatternDefinition[];
  private readonly context: ContextOptions;

  constructor(opts: PatternRecognizerOptions = {}) {
    this.patterns = opts.patterns ?? CUSTOM_PATTERNS;
    this.context = opts.context ?? DEFAULT_CONTEXT;
  }

  async detect(text: string): Promise<Span[]> {
    const spans: Span[] = [];
    for (const pattern of this.patterns) {
      for (const m of matchPattern(text, pattern)) {
        spans.push(
          createSpan({
            start: m.start,
            end: m.end,
            category: pattern.classify ? pattern.classify(m.value) : pattern.category,
            score: scoreWithContext(pattern.score, text, m.start, pattern.context, this.context),
            method: this.method,
          }),
        );
      }
    }
    return spans;
  }
}
