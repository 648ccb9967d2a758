import type { AppConfig } from "./config.js";
import { createFfmpegCapture, type CaptureBackend } from "./capture.js";
import { systemClock, type Clock } from "./clock.js";
import { SchedulerLoop } from "./loop.js";
import { createSmtpTransport, type EmailTransport } from "./mailer.js";
import { Notifier } from "./notifier.js";
import { createArtifactPublisher } from "./publisher.js";
import { createScheduleSource, type ScheduleSource } from "./schedule-source.js";
import { createStorageClient, type StorageClient } from "./storage.js";
import { RecordingSupervisor } from "./supervisor.js";

export type Runtime = {
  source: ScheduleSource;
  supervisor: RecordingSupervisor;
  notifier: Notifier;
  transport: EmailTransport;
  loop: SchedulerLoop;
};

/** Collaborators that tests or tools may swap out. */
export type RuntimeOverrides = {
  clock?: Clock;
  source?: ScheduleSource;
  backend?: CaptureBackend;
  storage?: StorageClient;
  transport?: EmailTransport;
};

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const clock = overrides.clock ?? systemClock;
  const source =
    overrides.source ??
    createScheduleSource({
      baseUrl: config.schedule.baseUrl,
      apiKey: config.schedule.apiKey,
      requestTimeoutMs: config.network.requestTimeoutMs
    });

  const supervisor = new RecordingSupervisor({
    backend: overrides.backend ?? createFfmpegCapture({ ffmpegPath: config.recorder.ffmpegPath }),
    clock,
    streamUrl: config.recorder.streamUrl,
    outputDir: config.recorder.outputDir,
    format: config.recorder.format,
    stopGraceMs: config.recorder.stopGraceMs,
    captureBufferMs: config.recorder.captureBufferMs,
    timeZone: config.timeZone
  });

  const publisher = createArtifactPublisher({
    storage: overrides.storage ?? createStorageClient(config.storage),
    retry: {
      retries: config.network.retryCount,
      backoffMs: config.network.retryBackoffMs
    },
    attemptTimeoutMs: config.network.uploadTimeoutMs,
    prefix: config.storage.prefix,
    deleteAfterUpload: config.storage.deleteAfterUpload,
    sleep: (ms) => clock.sleep(ms)
  });

  const transport = overrides.transport ?? createSmtpTransport(config.email);
  const notifier = new Notifier({
    transport,
    station: {
      stationName: config.email.stationName,
      contactAddress: config.email.adminAddress,
      retentionDays: config.email.retentionDays,
      timeZone: config.timeZone
    },
    adminAddress: config.email.adminAddress,
    ccAddress: config.email.ccAddress
  });

  const loop = new SchedulerLoop({
    source,
    supervisor,
    publisher,
    notifier,
    clock,
    pollIntervalMs: config.recorder.pollIntervalMs,
    refreshIntervalMs: config.schedule.refreshIntervalMs,
    scheduleCount: config.schedule.count,
    excludedCategories: config.schedule.excludedCategories,
    refreshBackoffMs: config.network.retryBackoffMs,
    horizonMs:
      config.schedule.horizonHours === undefined
        ? undefined
        : config.schedule.horizonHours * 60 * 60 * 1000,
    minDurationMs: config.recorder.minDurationMs,
    healthIntervalMs: config.recorder.healthIntervalMs,
    timeZone: config.timeZone
  });

  return { source, supervisor, notifier, transport, loop };
}
