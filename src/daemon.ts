import { loadConfig, type AppConfig } from "./config.js";
import { describeError } from "./errors.js";
import { logger, setLoggerConfig } from "./logger.js";
import { createRuntime } from "./runtime.js";
import { describeStorage, validateStorage } from "./storage.js";

export function applyLogging(config: AppConfig) {
  setLoggerConfig({
    level: config.logging.level,
    format: config.logging.format,
    color: config.logging.color,
    timeZone: config.logging.timeZone,
    file: config.logging.file
  });
}

/**
 * Runs the recorder until SIGINT/SIGTERM. Resolves with the process exit
 * code: 1 for startup configuration problems, 0 after a graceful drain.
 */
export async function runDaemon(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error("config.invalid", describeError(error));
    return 1;
  }
  applyLogging(config);

  const runLogger = logger.withContext({ component: "daemon" });
  try {
    runLogger.info("storage.validate.start", describeStorage(config.storage));
    await validateStorage(config.storage);
    runLogger.info("storage.validate.done", describeStorage(config.storage));
  } catch (error) {
    runLogger.error("storage.validate.failed", describeError(error));
    return 1;
  }

  const runtime = createRuntime(config);
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    runLogger.info("daemon.shutdown", { signal });
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  runLogger.info("daemon.start", {
    stream: config.recorder.streamUrl,
    outputDir: config.recorder.outputDir,
    excludedCategories: config.schedule.excludedCategories
  });
  await runtime.loop.run(controller.signal);
  runLogger.info("daemon.stopped");
  return 0;
}
