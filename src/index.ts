import { runDaemon } from "./daemon.js";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";

runDaemon()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("daemon.crashed", describeError(error));
    process.exitCode = 1;
  });
