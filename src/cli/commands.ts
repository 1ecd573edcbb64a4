import { Command } from "commander";

import { InputValidationFailure } from "../core/errors";
import type { RedactionPipeline } from "../core/pipeline";
import { toAnonymizeResponse, toDetectResponse } from "../server/wire";
import type { AnonymizationResult, DetectionResult, ResultMode } from "../types/common";
import { RequestSchema, type RequestBody } from "../types/schemas";

export type CliOpts = {
  file?: string;
  pseudonym?: string;
  lang?: string;
  detect?: boolean;
  json?: boolean;
};

export interface Output {
  write(chunk: string): unknown;
}

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_EMERGENCY = 3;

export function exitCodeFor(mode: ResultMode): number {
  return mode === "EMERGENCY" ? EXIT_EMERGENCY : EXIT_OK;
}

function formatAnonymized(res: AnonymizationResult, jsonMode: boolean): string {
  if (jsonMode) return JSON.stringify(toAnonymizeResponse(res));
  return res.anonymizedText;
}

function formatDetected(res: DetectionResult, jsonMode: boolean): string {
  if (jsonMode) return JSON.stringify(toDetectResponse(res));
  const lines = res.spans.map((s) => `${s.category}\t${s.start}-${s.end}\t${s.score.toFixed(2)}\t${s.method}`);
  lines.push(`mode: ${res.mode}`);
  return lines.join("\n");
}

/** Runs one request and writes its result; returns the exit code it implies. */
export async function handleRequest(
  pipeline: RedactionPipeline,
  req: RequestBody,
  opts: CliOpts,
  out: Output,
): Promise<number> {
  const options = { pseudonym: req.pseudonym, language: req.language };
  if (opts.detect) {
    const res = await pipeline.detect(req.text, options);
    out.write(formatDetected(res, !!opts.json) + "\n");
    return exitCodeFor(res.mode);
  }
  const res = await pipeline.anonymize(req.text, options);
  out.write(formatAnonymized(res, !!opts.json) + "\n");
  return exitCodeFor(res.mode);
}

/** Validates one JSONL line; the thrown error names fields, never content. */
export function parseLine(line: string, opts: CliOpts): RequestBody {
  let obj: unknown;
  try {
    obj = JSON.parse(line);
  } catch {
    throw new InputValidationFailure([]);
  }
  if (typeof obj !== "object" || obj === null || Array.isArray(obj)) {
    throw new InputValidationFailure([]);
  }
  // line fields take precedence over the command-line defaults
  const parsed = RequestSchema.safeParse({ pseudonym: opts.pseudonym, language: opts.lang, ...obj });
  if (!parsed.success) {
    throw new InputValidationFailure(Object.keys(parsed.error.flatten().fieldErrors));
  }
  return parsed.data;
}

/** Processes JSONL lines in order. Invalid lines are skipped with a warning on `err`. */
export async function runBatch(
  pipeline: RedactionPipeline,
  lines: AsyncIterable<string>,
  opts: CliOpts,
  out: Output,
  err: Output,
): Promise<number> {
  let worstExit = EXIT_OK;
  let lineNo = 0;
  for await (const line of lines) {
    lineNo++;
    const trimmed = line.trim();
    if (!trimmed) continue;
    let req: RequestBody;
    try {
      req = parseLine(trimmed, opts);
    } catch (e) {
      const reason = e instanceof InputValidationFailure ? e.message : "invalid line";
      err.write(`[warn] skipping line ${lineNo}: ${reason}\n`);
      continue;
    }
    worstExit = Math.max(worstExit, await handleRequest(pipeline, req, opts, out));
  }
  return worstExit;
}

export function buildProgram(): Command {
  return new Command()
    .name("pii-redact")
    .description("Detect and redact PII/PHI in free text")
    .argument("[text...]", "text to anonymize (omit when using --file)")
    .option("-f, --file <jsonl>", "JSONL file with {\"text\":\"...\",\"pseudonym?\":\"...\",\"language?\":\"en\"} per line")
    .option("-p, --pseudonym <name>", "string to keep verbatim in the output")
    .option("--lang <code>", "language hint (e.g., en, es)")
    .option("--detect", "print detected spans instead of anonymized text", false)
    .option("--json", "print JSON result(s)", false);
}
