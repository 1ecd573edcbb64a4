import { ModelUnavailable } from "../core/errors";
import { PresidioResultsSchema } from "../types/schemas";
import type { NerCapability, NerEntity } from "./types";

export type FetchLike = typeof fetch;

export interface PresidioNerOptions {
  url: string;
  probe?: boolean;
  fetch?: FetchLike;
}

/** Client for a Presidio analyzer deployment (`POST /analyze`). */
export class PresidioNer implements NerCapability {
  private constructor(
    readonly modelId: string,
    private readonly baseUrl: string,
    private readonly fetchImpl: FetchLike,
  ) {}

  static async load(opts: PresidioNerOptions): Promise<PresidioNer> {
    const fetchImpl = opts.fetch ?? fetch;
    const baseUrl = opts.url.replace(/\/+$/, "");

    if (opts.probe) {
      let status: number;
      try {
        status = (await fetchImpl(`${baseUrl}/health`)).status;
      } catch (err) {
        throw new ModelUnavailable(`presidio analyzer unreachable at ${baseUrl}`, { cause: err });
      }
      if (status !== 200) throw new ModelUnavailable(`presidio health check returned ${status}`);
    }
    return new PresidioNer(`presidio:${new URL(baseUrl).host}`, baseUrl, fetchImpl);
  }

  async analyze(text: string, language: string, signal?: AbortSignal): Promise<NerEntity[]> {
    const res = await this.fetchImpl(`${this.baseUrl}/analyze`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ text, language }),
      signal,
    });
    if (!res.ok) throw new Error(`presidio analyze returned ${res.status}`);

    const results = PresidioResultsSchema.parse(await res.json());
    return results.map((r) => ({ start: r.start, end: r.end, label: r.entity_type, score: r.score }));
  }
}
