import type { CategoryCatalog } from "../core/catalog";
import { createSpan } from "../core/span";
import type { NerCapability } from "../ner/types";
import type { Span } from "../types/common";
import type { Recognizer } from "./types";

const clamp01 = (n: number) => (Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : 0);

/** Delegates to an NER capability and maps its labels onto catalog categories. */
export class MlRecognizer implements Recognizer {
  readonly name = "ml_model";
  readonly method = "ml_model";

  constructor(
    private readonly ner: NerCapability,
    private readonly catalog: CategoryCatalog,
  ) {}

  get modelId(): string {
    return this.ner.modelId;
  }

  async detect(text: string, language: string, signal?: AbortSignal): Promise<Span[]> {
    const entities = await this.ner.analyze(text, language, signal);
    return entities.map((e) =>
      createSpan({
        start: e.start,
        end: e.end,
        category: this.catalog.categoryForLabel(e.label),
        score: clamp01(e.score),
        method: this.method,
      }),
    );
  }
}
