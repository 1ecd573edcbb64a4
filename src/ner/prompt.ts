/**
 * Builds a strict-JSON entity extraction prompt for Gemini.
 * The model is instructed to return ONLY JSON (no prose, no code fences).
 */

const LABELS = [
  "PERSON",
  "LOCATION",
  "ORGANIZATION",
  "DATE_TIME",
  "DATE_OF_BIRTH",
  "PHONE_NUMBER",
  "EMAIL_ADDRESS",
  "MEDICAL_RECORD_NUMBER",
  "HEALTH_PLAN_NUMBER",
  "SSN",
  "NRP",
];

export function buildNerPrompt(text: string, language: string): string {
  const SCHEMA = '{"entities":[{"text":"<exact substring>","label":"<LABEL>","score":0.0}]}';

  return [
    "SYSTEM: You are a named-entity recognizer for personal and health information. Output ONLY one minified JSON object matching the schema below.",
    `SCHEMA:${SCHEMA}`,
    "HARD RULES: 1) No markdown, no code fences, no extra text. 2) `text` must be copied character for character from the input. 3) score in [0,1]. 4) Return an empty list when nothing qualifies.",
    `LABELS: ${LABELS.join(", ")}. Use the closest label; dates that are not birth dates are DATE_TIME.`,
    `LANGUAGE: ${language}`,
    "TEXT:",
    JSON.stringify(text),
  ].join("\n");
}
