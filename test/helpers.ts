import { loadCatalog } from "../src/core/catalog";
import { createSpan } from "../src/core/span";
import type { NerCapability, NerEntity } from "../src/ner/types";
import type { DetectionMethod, Category } from "../src/types/categories";
import type { Span } from "../src/types/common";
import type { Logger, LogLevel, LogMetadata } from "../src/util/logger";

export const catalog = loadCatalog();

export class FakeNer implements NerCapability {
  readonly modelId = "fake-ner";
  calls = 0;
  private entities: NerEntity[] | null;
  private delayMs: number;
  constructor(entities: NerEntity[] | null, delayMs = 0) {
    this.entities = entities;
    this.delayMs = delayMs;
  }
  async analyze(_text: string, _language: string, signal?: AbortSignal): Promise<NerEntity[]> {
    this.calls++;
    if (this.delayMs) await new Promise((res, rej) => {
      const t = setTimeout(res, this.delayMs);
      signal?.addEventListener("abort", () => {
        clearTimeout(t);
        rej(Object.assign(new Error("aborted"), { name: "AbortError" }));
      });
    });
    if (!this.entities) throw new Error("fake failure");
    return this.entities;
  }
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  metadata?: LogMetadata;
}

export function capturingLogger(): Logger & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  const push = (level: LogLevel) => (message: string, metadata?: LogMetadata) => {
    records.push({ level, message, metadata });
  };
  return {
    records,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
  };
}

export function span(
  start: number,
  end: number,
  category: Category = "PERSON",
  score = 0.8,
  method: DetectionMethod = "custom_recognizer",
): Span {
  return createSpan({ start, end, category, score, method });
}
