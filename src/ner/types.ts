/** One entity reported by a statistical NER model. Labels are model-specific. */
export interface NerEntity {
  start: number;
  end: number;
  label: string;
  score: number;
}

/** Black-box "given text, return labeled spans" capability. */
export interface NerCapability {
  readonly modelId: string;
  analyze(text: string, language: string, signal?: AbortSignal): Promise<NerEntity[]>;
}
