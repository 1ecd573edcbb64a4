import "dotenv/config";

import { loadConfig } from "../config";
import { describeError } from "../core/errors";
import { initPipeline } from "../core/startup";
import { createLogger } from "../util/logger";
import { createApp } from "./app";

(async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, "api");
  const pipeline = await initPipeline(config, logger);

  const app = createApp(pipeline, { bodyLimit: config.bodyLimit, logger });
  app.listen(config.port, () => {
    logger.info("listening", { port: config.port, mode: pipeline.mode });
  });
})().catch((err: unknown) => {
  createLogger("error", "api").error("startup_failed", { error: describeError(err) });
  process.exit(1);
});
