#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs";
import readline from "node:readline";

import { loadConfig } from "../config";
import { describeError, InputValidationFailure } from "../core/errors";
import { initPipeline } from "../core/startup";
import { RequestSchema } from "../types/schemas";
import { createLogger } from "../util/logger";
import { buildProgram, EXIT_USAGE, handleRequest, runBatch, type CliOpts } from "./commands";

async function main(argv: string[]): Promise<number> {
  const program = buildProgram().parse(argv);
  const opts = program.opts<CliOpts>();
  const inline = program.args.join(" ");

  if (opts.file && inline) {
    console.error("[error] Provide either TEXT args or --file, not both.");
    return EXIT_USAGE;
  }
  if (!opts.file && !inline) {
    program.help({ error: true });
  }
  if (opts.file && !fs.existsSync(opts.file)) {
    console.error(`[error] file not found: ${opts.file}`);
    return EXIT_USAGE;
  }

  const config = loadConfig();
  // stdout carries results only
  const logger = createLogger("warn", "cli");
  const pipeline = await initPipeline(config, logger);

  if (opts.file) {
    const rl = readline.createInterface({
      input: fs.createReadStream(opts.file, { encoding: "utf8" }),
      crlfDelay: Infinity,
    });
    return runBatch(pipeline, rl, opts, process.stdout, process.stderr);
  }

  const parsed = RequestSchema.safeParse({ text: inline, pseudonym: opts.pseudonym, language: opts.lang });
  if (!parsed.success) {
    console.error(`[error] ${new InputValidationFailure(Object.keys(parsed.error.flatten().fieldErrors)).message}`);
    return EXIT_USAGE;
  }
  return handleRequest(pipeline, parsed.data, opts, process.stdout);
}

main(process.argv)
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(`[error] ${JSON.stringify(describeError(err))}`);
    process.exit(EXIT_USAGE);
  });
