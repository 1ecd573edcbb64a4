import { GoogleGenerativeAI } from "@google/generative-ai";

import { ModelUnavailable } from "../core/errors";
import { findOccurrences } from "../core/span";
import { tryParseModelTextToEntities } from "./json";
import { buildNerPrompt } from "./prompt";
import type { NerCapability, NerEntity } from "./types";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

/** The slice of the Gemini model client this capability uses; swapped for a fake in tests. */
export interface GenerativeModelLike {
  generateContent(
    request: string,
    options?: { signal?: AbortSignal },
  ): Promise<{ response: { text(): string } }>;
  countTokens(request: string): Promise<{ totalTokens: number }>;
}

export interface GeminiNerOptions {
  apiKey?: string;
  model?: string;
  /** Issue one countTokens call before declaring the model loaded. */
  probe?: boolean;
  client?: GenerativeModelLike;
}

/**
 * Entity extraction through a Gemini model. The model returns entity texts, which are
 * mapped back to every exact occurrence in the input.
 */
export class GeminiNer implements NerCapability {
  private constructor(
    readonly modelId: string,
    private readonly model: GenerativeModelLike,
  ) {}

  static async load(opts: GeminiNerOptions = {}): Promise<GeminiNer> {
    const modelName = opts.model ?? DEFAULT_GEMINI_MODEL;
    let model = opts.client;
    if (!model) {
      if (!opts.apiKey) throw new ModelUnavailable("GEMINI_API_KEY is required for NER_PROVIDER=gemini");
      model = new GoogleGenerativeAI(opts.apiKey).getGenerativeModel({
        model: modelName,
        generationConfig: {
          // Strongly hint JSON-only
          responseMimeType: "application/json",
          maxOutputTokens: 1024,
          temperature: 0,
        },
      });
    }

    if (opts.probe) {
      try {
        await model.countTokens("ping");
      } catch (err) {
        throw new ModelUnavailable(`gemini model ${modelName} did not answer the probe`, { cause: err });
      }
    }
    return new GeminiNer(`gemini:${modelName}`, model);
  }

  async analyze(text: string, language: string, signal?: AbortSignal): Promise<NerEntity[]> {
    const result = await this.model.generateContent(buildNerPrompt(text, language), { signal });
    const parsed = tryParseModelTextToEntities(result.response.text());
    if (!parsed) throw new Error("model output is not a valid entity list");

    const seen = new Set<string>();
    const entities: NerEntity[] = [];
    for (const entity of parsed.entities) {
      for (const range of findOccurrences(text, entity.text)) {
        const key = `${range.start}:${range.end}:${entity.label}`;
        if (seen.has(key)) continue;
        seen.add(key);
        entities.push({ ...range, label: entity.label, score: entity.score });
      }
    }
    return entities;
  }
}
