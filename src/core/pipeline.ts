import { DEFAULT_CONTEXT, type ContextOptions } from "../recognizers/context";
import { FallbackRecognizer } from "../recognizers/fallback";
import { MlRecognizer } from "../recognizers/ml";
import { PatternRecognizer } from "../recognizers/pattern";
import type { Recognizer } from "../recognizers/types";
import type { NerCapability } from "../ner/types";
import type {
  AnonymizationResult,
  DetectionResult,
  PipelineMode,
  PipelineStatus,
  ResultMode,
  Span,
} from "../types/common";
import { silentLogger, type Logger } from "../util/logger";
import type { CategoryCatalog } from "./catalog";
import { RecognizerChain } from "./chain";
import { emergencyAnonymization, emergencyDetection, withFailSafe } from "./failsafe";
import { guardPseudonym } from "./pseudonym";
import { applyReplacements, type ReplacementEngine } from "./replace";
import { resolveSpans, type SpanResolver } from "./resolver";

export const DEFAULT_LANGUAGE = "en";

/**
 * What a pipeline is built from: the catalog and the NER capability loaded at startup,
 * chain tuning, and optional stage overrides (resolver, replacement, pattern recognizers).
 */
export interface PipelineDeps {
  catalog: CategoryCatalog;
  /** Loaded NER capability; absent means DEGRADED for the life of the pipeline. */
  ner?: NerCapability | null;
  minScore?: number;
  recognizerTimeoutMs?: number;
  context?: ContextOptions;
  logger?: Logger;
  resolve?: SpanResolver;
  replace?: ReplacementEngine;
  /** Replaces the default pattern and fallback recognizers. */
  recognizers?: readonly Recognizer[];
}

export interface AnalyzeOptions {
  pseudonym?: string;
  language?: string;
}

interface PipelineContext {
  readonly catalog: CategoryCatalog;
  readonly chain: RecognizerChain;
  readonly mode: PipelineMode;
  readonly modelId: string | null;
  readonly logger: Logger;
  readonly resolve: SpanResolver;
  readonly replace: ReplacementEngine;
}

interface Analysis {
  spans: Span[];
  failures: string[];
}

const ML_RECOGNIZER = "ml_model";

/**
 * Orchestrates: recognizer chain → resolver → pseudonym guard → replacement,
 * wrapped so that any failure yields an emergency redaction instead of raw text.
 */
export class RedactionPipeline {
  private constructor(private readonly ctx: PipelineContext) {}

  static create(deps: PipelineDeps): RedactionPipeline {
    const logger = deps.logger ?? silentLogger;
    const ml = deps.ner ? new MlRecognizer(deps.ner, deps.catalog) : null;
    const rest = deps.recognizers ?? [
      new PatternRecognizer({ context: deps.context ?? DEFAULT_CONTEXT }),
      new FallbackRecognizer(),
    ];
    const chain = new RecognizerChain(ml ? [ml, ...rest] : rest, {
      minScore: deps.minScore,
      timeoutMs: deps.recognizerTimeoutMs,
      logger,
    });
    const mode: PipelineMode = ml ? "NORMAL" : "DEGRADED";

    return new RedactionPipeline(
      Object.freeze({
        catalog: deps.catalog,
        chain,
        mode,
        modelId: ml ? ml.modelId : null,
        logger,
        resolve: deps.resolve ?? resolveSpans,
        replace: deps.replace ?? applyReplacements,
      }),
    );
  }

  get mode(): PipelineMode {
    return this.ctx.mode;
  }

  status(): PipelineStatus {
    return {
      mode: this.ctx.mode,
      nerLoaded: this.ctx.modelId !== null,
      modelId: this.ctx.modelId,
      recognizers: this.ctx.chain.names,
      catalogVersion: this.ctx.catalog.version,
    };
  }

  async detect(text: string, opts: AnalyzeOptions = {}): Promise<DetectionResult> {
    let failures: string[] = [];
    return withFailSafe(
      "detect",
      this.ctx.logger,
      async () => {
        const analysis = await this.analyze(text, opts);
        failures = analysis.failures;
        return { spans: analysis.spans, mode: this.resultMode(failures), failedRecognizers: failures };
      },
      () => emergencyDetection(failures),
    );
  }

  async anonymize(text: string, opts: AnalyzeOptions = {}): Promise<AnonymizationResult> {
    let failures: string[] = [];
    return withFailSafe(
      "anonymize",
      this.ctx.logger,
      async () => {
        const analysis = await this.analyze(text, opts);
        failures = analysis.failures;
        const out = this.ctx.replace(text, analysis.spans, this.ctx.catalog);
        const result: AnonymizationResult = {
          anonymizedText: out.text,
          spans: out.entries,
          mode: this.resultMode(failures),
          failedRecognizers: failures,
        };
        if (opts.pseudonym) result.pseudonymPreserved = opts.pseudonym;
        return result;
      },
      () => emergencyAnonymization(failures),
    );
  }

  private async analyze(text: string, opts: AnalyzeOptions): Promise<Analysis> {
    const { candidates, failures } = await this.ctx.chain.detect(text, opts.language ?? DEFAULT_LANGUAGE);
    const resolved = this.ctx.resolve(candidates);
    const spans = guardPseudonym(resolved, text, opts.pseudonym, this.ctx.logger);
    this.ctx.logger.debug("analyzed", { candidates: candidates.length, spans: spans.length });
    return { spans, failures };
  }

  /** A request is DEGRADED when ML detection did not contribute to it. */
  private resultMode(failures: readonly string[]): ResultMode {
    if (this.ctx.mode === "DEGRADED" || failures.includes(ML_RECOGNIZER)) return "DEGRADED";
    return "NORMAL";
  }
}
