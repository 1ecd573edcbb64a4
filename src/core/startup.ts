import type { AppConfig } from "../config";
import { loadNer } from "../ner";
import type { NerCapability } from "../ner/types";
import type { FetchLike } from "../ner/presidio";
import type { Logger } from "../util/logger";
import { sleep } from "../util/sleep";
import { DEFAULT_CATALOG_PATH, loadCatalog } from "./catalog";
import { describeError } from "./errors";
import { RedactionPipeline } from "./pipeline";

export interface StartupOverrides {
  /** Replaces the configured provider (tests). */
  loadNer?: () => Promise<NerCapability | null>;
  fetch?: FetchLike;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Tries to load the NER capability up to `initRetries` times with doubling backoff.
 * Never throws: exhausting the attempts means running without it.
 */
export async function loadNerWithRetries(
  config: AppConfig["ner"],
  logger: Logger,
  overrides: StartupOverrides = {},
): Promise<NerCapability | null> {
  if (config.provider === "none" && !overrides.loadNer) return null;
  const attempt = overrides.loadNer ?? (() => loadNer(config, overrides.fetch));
  const wait = overrides.wait ?? sleep;

  let backoff = config.initBackoffMs;
  for (let i = 1; i <= config.initRetries; i++) {
    try {
      const ner = await attempt();
      if (ner) logger.info("ner_loaded", { provider: config.provider, modelId: ner.modelId, attempt: i });
      return ner;
    } catch (err) {
      logger.warn("ner_load_failed", { provider: config.provider, attempt: i, error: describeError(err) });
      if (i < config.initRetries) {
        await wait(backoff);
        backoff *= 2;
      }
    }
  }
  logger.error("ner_unavailable", { provider: config.provider, attempts: config.initRetries });
  return null;
}

/** Builds the process-wide pipeline. Catalog problems are fatal; NER problems only degrade. */
export async function initPipeline(
  config: AppConfig,
  logger: Logger,
  overrides: StartupOverrides = {},
): Promise<RedactionPipeline> {
  const catalog = loadCatalog(config.catalogPath ?? DEFAULT_CATALOG_PATH);
  const ner = await loadNerWithRetries(config.ner, logger, overrides);

  const pipeline = RedactionPipeline.create({
    catalog,
    ner,
    minScore: config.minScore,
    recognizerTimeoutMs: config.recognizerTimeoutMs,
    context: config.context,
    logger,
  });
  const status = pipeline.status();
  logger.info("pipeline_ready", {
    mode: status.mode,
    modelId: status.modelId,
    recognizers: status.recognizers,
    catalogVersion: status.catalogVersion,
  });
  return pipeline;
}
