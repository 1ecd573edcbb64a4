import type { PatternDefinition } from "./patterns";

export interface PatternMatch {
  start: number;
  end: number;
  value: string;
}

/**
 * All non-empty matches of a pattern, narrowed to the `value` group when it participated.
 * `matchAll` iterates a clone of the regex, so shared definitions keep no per-call state.
 */
export function matchPattern(text: string, pattern: PatternDefinition): PatternMatch[] {
  const out: PatternMatch[] = [];
  for (const m of text.matchAll(pattern.regex)) {
    const group = m.indices?.groups?.value;
    const start = group ? group[0] : m.index ?? 0;
    const end = group ? group[1] : start + m[0].length;
    if (end <= start) continue;
    const value = text.slice(start, end);
    if (pattern.validate && !pattern.validate(value)) continue;
    out.push({ start, end, value });
  }
  return out;
}
