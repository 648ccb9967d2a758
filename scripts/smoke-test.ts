import { loadConfig } from "../src/config.js";
import { createFfmpegCapture } from "../src/capture.js";
import { applyLogging } from "../src/daemon.js";
import { describeError } from "../src/errors.js";
import { logger } from "../src/logger.js";
import { createArtifactPublisher } from "../src/publisher.js";
import { createStorageClient, validateStorage } from "../src/storage.js";
import { systemClock } from "../src/clock.js";
import { RecordingSupervisor } from "../src/supervisor.js";

const DEFAULT_SECONDS = 10;

async function main() {
  const config = loadConfig();
  applyLogging(config);
  const seconds = Number(process.argv[2] ?? DEFAULT_SECONDS);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid clip length: ${process.argv[2]}`);
  }

  const baseLogger = logger.withContext({ component: "smoke" });
  await validateStorage(config.storage);

  const now = systemClock.now();
  const supervisor = new RecordingSupervisor({
    backend: createFfmpegCapture({ ffmpegPath: config.recorder.ffmpegPath }),
    clock: systemClock,
    streamUrl: config.recorder.streamUrl,
    outputDir: config.recorder.outputDir,
    format: config.recorder.format,
    stopGraceMs: config.recorder.stopGraceMs,
    captureBufferMs: config.recorder.captureBufferMs,
    timeZone: config.timeZone
  });
  const job = await supervisor.start({
    id: `smoke-${now.getTime()}`,
    showName: "Smoke Test",
    fileStem: "SmokeTest",
    start: now,
    end: new Date(now.getTime() + seconds * 1000),
    recipients: [],
    excluded: false
  });

  await systemClock.sleep(seconds * 1000);
  const artifact = await supervisor.stop(job);
  baseLogger.info("smoke.captured", { localPath: artifact.localPath, size: artifact.size });

  const publisher = createArtifactPublisher({
    storage: createStorageClient(config.storage),
    retry: { retries: config.network.retryCount, backoffMs: config.network.retryBackoffMs },
    attemptTimeoutMs: config.network.uploadTimeoutMs,
    prefix: config.storage.prefix,
    deleteAfterUpload: config.storage.deleteAfterUpload
  });
  const url = await publisher.publish(artifact);
  baseLogger.info("smoke.ok", { url });
}

main().catch((error: unknown) => {
  logger.error("smoke.error", describeError(error));
  process.exit(1);
});
