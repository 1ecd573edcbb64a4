import type { Category, DetectionMethod } from "./categories";

/**
 * A labeled character range detected as sensitive.
 * Offsets are UTF-16 code unit indexes into the analyzed text, `end` exclusive.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
  readonly category: Category;
  readonly score: number; // 0..1
  readonly method: DetectionMethod;
}

/** Sorted by start, with `spans[i].end <= spans[i + 1].start`. */
export type ResolvedSpanSet = readonly Span[];

export type PipelineMode = "NORMAL" | "DEGRADED";

/** Outcome flag of a single request. */
export type ResultMode = PipelineMode | "EMERGENCY";

export interface ReplacementEntry {
  span: Span; // in the coordinates of the original text
  replacement: string;
}

/**
 * Final, caller-facing anonymization result (what API/CLI will return).
 * Never carries any substring of the input apart from the pseudonym the caller supplied.
 */
export interface AnonymizationResult {
  anonymizedText: string;
  spans: ReplacementEntry[];
  pseudonymPreserved?: string;
  mode: ResultMode;
  failedRecognizers: string[];
}

export interface DetectionResult {
  spans: Span[];
  mode: ResultMode;
  failedRecognizers: string[];
}

export interface PipelineStatus {
  mode: PipelineMode;
  nerLoaded: boolean;
  modelId: string | null;
  recognizers: string[];
  catalogVersion: string;
}
