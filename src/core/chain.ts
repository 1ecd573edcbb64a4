import type { Recognizer } from "../recognizers/types";
import { METHOD_PRIORITY } from "../types/categories";
import type { Span } from "../types/common";
import { silentLogger, type Logger } from "../util/logger";
import { describeError, RecognizerFailure } from "./errors";
import { isValidSpan } from "./span";

export const DEFAULT_MIN_SCORE = 0.4;
export const DEFAULT_RECOGNIZER_TIMEOUT_MS = 3500;

export interface ChainOptions {
  minScore?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export interface ChainOutput {
  candidates: Span[];
  /** Names of recognizers that threw or timed out for this call. */
  failures: string[];
}

/**
 * Runs every recognizer on the same text and concatenates their spans in priority order
 * (ml_model, custom_recognizer, fallback_regex). A failing recognizer contributes nothing.
 */
export class RecognizerChain {
  readonly recognizers: readonly Recognizer[];
  private readonly minScore: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(recognizers: readonly Recognizer[], opts: ChainOptions = {}) {
    // Array.prototype.sort is stable: same-method recognizers keep insertion order
    this.recognizers = Object.freeze(
      [...recognizers].sort((a, b) => METHOD_PRIORITY[b.method] - METHOD_PRIORITY[a.method]),
    );
    this.minScore = opts.minScore ?? DEFAULT_MIN_SCORE;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_RECOGNIZER_TIMEOUT_MS;
    this.logger = opts.logger ?? silentLogger;
  }

  get names(): string[] {
    return this.recognizers.map((r) => r.name);
  }

  async detect(text: string, language: string): Promise<ChainOutput> {
    const outcomes = await Promise.all(this.recognizers.map((r) => this.runIsolated(r, text, language)));

    const candidates: Span[] = [];
    const failures: string[] = [];
    outcomes.forEach((outcome, i) => {
      const recognizer = this.recognizers[i];
      if (outcome instanceof RecognizerFailure) {
        failures.push(recognizer.name);
        this.logger.warn("recognizer_failed", {
          recognizer: recognizer.name,
          error: describeError(outcome),
          cause: describeError(outcome.cause),
        });
        return;
      }
      let invalid = 0;
      for (const span of outcome) {
        if (!isValidSpan(span, text.length)) {
          invalid++;
          continue;
        }
        if (span.score >= this.minScore) candidates.push(span);
      }
      if (invalid > 0) {
        this.logger.warn("recognizer_invalid_spans", { recognizer: recognizer.name, discarded: invalid });
      }
    });

    this.logger.debug("chain_detected", { candidates: candidates.length, failures: failures.length });
    return { candidates, failures };
  }

  private async runIsolated(
    recognizer: Recognizer,
    text: string,
    language: string,
  ): Promise<Span[] | RecognizerFailure> {
    const controller = new AbortController();
    const timeout = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () =>
        reject(new RecognizerFailure(recognizer.name, `timed out after ${this.timeoutMs}ms`)),
      );
    });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      // the wrapping promise turns a synchronous throw into a rejection
      const detection = Promise.resolve().then(() => recognizer.detect(text, language, controller.signal));
      return await Promise.race([detection, timeout]);
    } catch (err) {
      if (err instanceof RecognizerFailure) return err;
      return new RecognizerFailure(recognizer.name, "detection failed", { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}
