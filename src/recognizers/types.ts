import type { DetectionMethod } from "../types/categories";
import type { Span } from "../types/common";

/**
 * One detection strategy. Implementations may return overlapping or duplicate spans;
 * the resolver sorts that out. Throwing is allowed: the chain isolates every call.
 */
export interface Recognizer {
  readonly name: string;
  readonly method: DetectionMethod;
  detect(text: string, language: string, signal?: AbortSignal): Promise<Span[]>;
}
