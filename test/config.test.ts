import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/core/errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe("info");
    expect(config.ner).toEqual({
      provider: "none",
      geminiApiKey: undefined,
      geminiModel: "gemini-2.0-flash",
      presidioUrl: "http://localhost:5001",
      probe: true,
      initRetries: 3,
      initBackoffMs: 1000,
    });
    expect(config.recognizerTimeoutMs).toBe(3500);
    expect(config.minScore).toBe(0.4);
    expect(config.context).toEqual({ window: 30, boost: 0.15 });
    expect(config.bodyLimit).toBe("512kb");
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("coerces values from strings", () => {
    const config = loadConfig({ PORT: "8080", MIN_SCORE: "0.5", NER_PROBE: "false", NER_PROVIDER: "presidio" });
    expect(config.port).toBe(8080);
    expect(config.minScore).toBe(0.5);
    expect(config.ner.probe).toBe(false);
    expect(config.ner.provider).toBe("presidio");
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ PORT: "", GEMINI_API_KEY: "" }).port).toBe(3000);
  });

  it("names invalid fields without their values", () => {
    expect(() => loadConfig({ NER_PROVIDER: "spacy", MIN_SCORE: "2" })).toThrow(ConfigError);
    expect(() => loadConfig({ NER_PROVIDER: "spacy", MIN_SCORE: "2" })).toThrow(
      "invalid environment: NER_PROVIDER, MIN_SCORE",
    );
  });
});
