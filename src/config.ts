import { z } from "zod";

import { ConfigError } from "./core/errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NER_PROVIDER: z.enum(["gemini", "presidio", "none"]).default("none"),
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  PRESIDIO_URL: z.string().url().default("http://localhost:5001"),
  NER_PROBE: booleanFlag.default("true"),
  NER_INIT_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  NER_INIT_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  RECOGNIZER_TIMEOUT_MS: z.coerce.number().int().positive().default(3500),
  MIN_SCORE: z.coerce.number().min(0).max(1).default(0.4),
  CONTEXT_WINDOW: z.coerce.number().int().min(0).default(30),
  CONTEXT_BOOST: z.coerce.number().min(0).max(1).default(0.15),
  CATALOG_PATH: z.string().min(1).optional(),
  BODY_LIMIT: z.string().min(1).default("512kb"),
});

export type NerProvider = z.infer<typeof EnvSchema>["NER_PROVIDER"];

export interface AppConfig {
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  ner: {
    provider: NerProvider;
    geminiApiKey?: string;
    geminiModel: string;
    presidioUrl: string;
    probe: boolean;
    initRetries: number;
    initBackoffMs: number;
  };
  recognizerTimeoutMs: number;
  minScore: number;
  context: { window: number; boost: number };
  catalogPath?: string;
  bodyLimit: string;
}

/** Reads configuration from the environment (dotenv is loaded by the entry points). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings count as unset, so a blank line in .env does not fail validation
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ConfigError(`invalid environment: ${fields}`);
  }
  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    ner: Object.freeze({
      provider: e.NER_PROVIDER,
      geminiApiKey: e.GEMINI_API_KEY,
      geminiModel: e.GEMINI_MODEL,
      presidioUrl: e.PRESIDIO_URL,
      probe: e.NER_PROBE,
      initRetries: e.NER_INIT_RETRIES,
      initBackoffMs: e.NER_INIT_BACKOFF_MS,
    }),
    recognizerTimeoutMs: e.RECOGNIZER_TIMEOUT_MS,
    minScore: e.MIN_SCORE,
    context: Object.freeze({ window: e.CONTEXT_WINDOW, boost: e.CONTEXT_BOOST }),
    catalogPath: e.CATALOG_PATH,
    bodyLimit: e.BODY_LIMIT,
  });
}
