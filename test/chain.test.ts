import { describe, it, expect } from "vitest";
import { RecognizerChain } from "../src/core/chain";
import type { Recognizer } from "../src/recognizers/types";
import type { DetectionMethod } from "../src/types/categories";
import type { Span } from "../src/types/common";
import { capturingLogger, span } from "./helpers";

function stub(
  name: string,
  method: DetectionMethod,
  detect: (text: string, language: string, signal?: AbortSignal) => Promise<Span[]>,
): Recognizer {
  return { name, method, detect };
}

const TEXT = "some sample text here";

describe("RecognizerChain", () => {
  it("orders recognizers by method priority", () => {
    const chain = new RecognizerChain([
      stub("fb", "fallback_regex", async () => []),
      stub("ml", "ml_model", async () => []),
      stub("custom", "custom_recognizer", async () => []),
    ]);
    expect(chain.names).toEqual(["ml", "custom", "fb"]);
  });

  it("concatenates outputs in priority order", async () => {
    const chain = new RecognizerChain([
      stub("fb", "fallback_regex", async () => [span(0, 4, "PERSON", 0.5, "fallback_regex")]),
      stub("ml", "ml_model", async () => [span(5, 11, "PERSON", 0.9, "ml_model")]),
    ]);
    const { candidates, failures } = await chain.detect(TEXT, "en");
    expect(candidates.map((c) => c.method)).toEqual(["ml_model", "fallback_regex"]);
    expect(failures).toEqual([]);
  });

  it("isolates a recognizer that throws", async () => {
    const logger = capturingLogger();
    const chain = new RecognizerChain(
      [
        stub("boom", "custom_recognizer", () => {
          throw new Error("secret text should not be logged");
        }),
        stub("fb", "fallback_regex", async () => [span(0, 4)]),
      ],
      { logger },
    );
    const { candidates, failures } = await chain.detect(TEXT, "en");
    expect(failures).toEqual(["boom"]);
    expect(candidates).toHaveLength(1);
    expect(logger.records).toEqual([
      {
        level: "warn",
        message: "recognizer_failed",
        metadata: {
          recognizer: "boom",
          error: { name: "RecognizerFailure", code: "recognizer_failure", message: "boom: detection failed" },
          cause: { name: "Error" },
        },
      },
      expect.objectContaining({ level: "debug" }),
    ]);
  });

  it("times out slow recognizers through the abort signal", async () => {
    let received: AbortSignal | undefined;
    const chain = new RecognizerChain(
      [
        stub("slow", "ml_model", (_t, _l, signal) => {
          received = signal;
          return new Promise<Span[]>(() => undefined);
        }),
        stub("fb", "fallback_regex", async () => [span(0, 4)]),
      ],
      { timeoutMs: 20 },
    );
    const { candidates, failures } = await chain.detect(TEXT, "en");
    expect(failures).toEqual(["slow"]);
    expect(candidates).toHaveLength(1);
    expect(received?.aborted).toBe(true);
  });

  it("drops candidates below minScore", async () => {
    const chain = new RecognizerChain(
      [stub("c", "custom_recognizer", async () => [span(0, 4, "PERSON", 0.39), span(5, 9, "PERSON", 0.4)])],
      { minScore: 0.4 },
    );
    const { candidates } = await chain.detect(TEXT, "en");
    expect(candidates.map((c) => c.start)).toEqual([5]);
  });

  it("discards spans that break the span invariant", async () => {
    const logger = capturingLogger();
    const chain = new RecognizerChain(
      [stub("c", "custom_recognizer", async () => [span(0, 4), span(3, 500), span(6, 6)])],
      { logger },
    );
    const { candidates } = await chain.detect(TEXT, "en");
    expect(candidates).toEqual([span(0, 4)]);
    expect(logger.records[0]).toEqual({
      level: "warn",
      message: "recognizer_invalid_spans",
      metadata: { recognizer: "c", discarded: 2 },
    });
  });
});
