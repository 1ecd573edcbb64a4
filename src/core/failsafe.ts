import type { AnonymizationResult, DetectionResult } from "../types/common";
import type { Logger } from "../util/logger";
import { describeError } from "./errors";

/** Whole-text replacement used when the pipeline itself fails. */
export const REDACTION_MARKER = "[REDACTED]";

export function emergencyAnonymization(failedRecognizers: string[] = []): AnonymizationResult {
  return {
    anonymizedText: REDACTION_MARKER,
    spans: [],
    mode: "EMERGENCY",
    failedRecognizers,
  };
}

export function emergencyDetection(failedRecognizers: string[] = []): DetectionResult {
  return { spans: [], mode: "EMERGENCY", failedRecognizers };
}

/**
 * Runs `work`; on any error logs the error type only and returns `fallback()` instead.
 * The original text never reaches the log or the result.
 */
export async function withFailSafe<T>(
  stage: string,
  logger: Logger,
  work: () => Promise<T>,
  fallback: () => T,
): Promise<T> {
  try {
    return await work();
  } catch (err) {
    logger.error("pipeline_failed", { stage, error: describeError(err) });
    return fallback();
  }
}
