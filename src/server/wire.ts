import type { AnonymizationResult, DetectionResult, PipelineStatus } from "../types/common";

/** HTTP representations use snake_case keys; the core keeps camelCase. */

export function toAnonymizeResponse(result: AnonymizationResult) {
  return {
    anonymized_text: result.anonymizedText,
    anonymized_spans: result.spans.map(({ span, replacement }) => ({
      type: span.category,
      start: span.start,
      end: span.end,
      score: span.score,
      method: span.method,
      replacement,
    })),
    pseudonym_preserved: result.pseudonymPreserved ?? null,
    mode: result.mode,
    failed_recognizers: result.failedRecognizers,
  };
}

export function toDetectResponse(result: DetectionResult) {
  return {
    entities: result.spans.map((s) => ({
      type: s.category,
      start: s.start,
      end: s.end,
      score: s.score,
      method: s.method,
    })),
    mode: result.mode,
    failed_recognizers: result.failedRecognizers,
  };
}

export function toHealthResponse(status: PipelineStatus) {
  return {
    status: "ok",
    mode: status.mode,
    ner_loaded: status.nerLoaded,
    model_id: status.modelId,
    recognizers: status.recognizers,
    catalog_version: status.catalogVersion,
  };
}
