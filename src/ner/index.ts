import type { AppConfig } from "../config";
import { GeminiNer } from "./gemini";
import { PresidioNer, type FetchLike } from "./presidio";
import type { NerCapability } from "./types";

export type { NerCapability, NerEntity } from "./types";

/** One attempt at building the configured capability; `null` when NER is switched off. */
export async function loadNer(config: AppConfig["ner"], fetchImpl?: FetchLike): Promise<NerCapability | null> {
  switch (config.provider) {
    case "none":
      return null;
    case "gemini":
      return GeminiNer.load({ apiKey: config.geminiApiKey, model: config.geminiModel, probe: config.probe });
    case "presidio":
      return PresidioNer.load({ url: config.presidioUrl, probe: config.probe, fetch: fetchImpl });
  }
}
