/** Characters before a match searched for context keywords. */
export const CONTEXT_WINDOW = 30;

/** Added to a pattern's base score when a context keyword is found. */
export const CONTEXT_BOOST = 0.15;

export interface ContextOptions {
  window: number;
  boost: number;
}

export const DEFAULT_CONTEXT: ContextOptions = { window: CONTEXT_WINDOW, boost: CONTEXT_BOOST };

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True when one of `keywords` occurs as a whole word (case-insensitive)
 * within the `window` characters preceding `start`.
 */
export function hasContext(
  text: string,
  start: number,
  keywords: readonly string[],
  window: number = CONTEXT_WINDOW,
): boolean {
  if (keywords.length === 0 || window <= 0) return false;
  const before = text.slice(Math.max(0, start - window), start);
  const alternatives = keywords.map(escapeRegExp).join("|");
  return new RegExp(`(?:^|[^a-z0-9])(?:${alternatives})(?![a-z0-9])`, "i").test(before);
}

/**
 * Confidence of a regex hit: `base`, or `min(1, base + boost)` when a context keyword
 * precedes it.
 */
export function scoreWithContext(
  base: number,
  text: string,
  start: number,
  keywords: readonly string[],
  opts: ContextOptions = DEFAULT_CONTEXT,
): number {
  if (!hasContext(text, start, keywords, opts.window)) return base;
  return Math.min(1, base + opts.boost);
}
