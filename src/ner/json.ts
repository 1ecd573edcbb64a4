import { LlmEntitiesSchema, type LlmEntities } from "../types/schemas";

/**
 * Extract the first top-level JSON object from a string.
 * Tolerant to extra text before/after; handles braces inside strings.
 */
export function extractFirstJsonObject(source: string): string | null {
  const i = source.indexOf("{");
  if (i < 0) return null;

  let depth = 0;
  let inStr = false;
  let esc = false;

  for (let idx = i; idx < source.length; idx++) {
    const ch = source[idx];

    if (inStr) {
      if (esc) {
        esc = false;
      } else if (ch === "\\") {
        esc = true;
      } else if (ch === '"') {
        inStr = false;
      }
      continue;
    }

    if (ch === '"') {
      inStr = true;
      continue;
    }
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return source.slice(i, idx + 1);
      }
    }
  }
  return null;
}

/** Parse and validate the entity list, throwing on malformed JSON or schema mismatch. */
export function parseLlmEntities(input: string): LlmEntities {
  return LlmEntitiesSchema.parse(JSON.parse(input));
}

/** Safe parse pipeline from raw model text → validated entities (or null on failure). */
export function tryParseModelTextToEntities(text: string): LlmEntities | null {
  const jsonStr = extractFirstJsonObject(text);
  if (!jsonStr) return null;
  try {
    return parseLlmEntities(jsonStr);
  } catch {
    return null;
  }
}
