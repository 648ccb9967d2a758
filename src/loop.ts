import type { Clock } from "./clock.js";
import { LaunchFailedError, UploadFailedError, describeError, errorMessage } from "./errors.js";
import { logger as rootLogger, type ContextLogger } from "./logger.js";
import type { Notifier } from "./notifier.js";
import { planTimeslots } from "./planner.js";
import type { AlertKind } from "./templates.js";
import type { ArtifactPublisher } from "./publisher.js";
import { backoffDelay } from "./retry.js";
import type { ScheduleSource } from "./schedule-source.js";
import type { RecordingSupervisor } from "./supervisor.js";
import type { Artifact, PipelineOutcome, RawSlot, RecordingJob, Timeslot } from "./types.js";
import { formatScheduleTable } from "./utils.js";

export type SchedulerLoopOptions = {
  source: ScheduleSource;
  supervisor: RecordingSupervisor;
  publisher: ArtifactPublisher;
  notifier: Notifier;
  clock: Clock;
  pollIntervalMs: number;
  refreshIntervalMs: number;
  scheduleCount: number;
  excludedCategories: readonly string[];
  /** Base delay for re-trying a failed refresh; doubles per consecutive failure. */
  refreshBackoffMs: number;
  /** Consecutive refresh failures before an operator alert goes out. */
  refreshAlertThreshold?: number;
  horizonMs?: number;
  minDurationMs?: number;
  healthIntervalMs?: number;
  timeZone?: string;
  logger?: ContextLogger;
};

export type LoopStatus = {
  pending: number;
  active: number;
  inFlight: number;
  completed: number;
  failed: number;
  nextRefreshAt: string | null;
  nextStart: string | null;
};

/**
 * Process-wide control loop. Each cycle refreshes the plan when due, then
 * starts due recordings and hands ended ones to a background
 * stop/publish/notify task. Tasks report back through an outcome queue
 * that only the loop drains.
 */
export class SchedulerLoop {
  private pending: Timeslot[] = [];
  private readonly knownIds = new Map<string, number>();
  private readonly reportedPast = new Set<string>();
  private readonly outcomes: PipelineOutcome[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private nextRefreshAt = 0;
  private nextHealthAt = 0;
  private refreshFailures = 0;
  private completed = 0;
  private failed = 0;
  private readonly log: ContextLogger;

  constructor(private readonly options: SchedulerLoopOptions) {
    this.log = options.logger ?? rootLogger.withContext({ component: "loop" });
  }

  init() {
    this.pending = [];
    this.knownIds.clear();
    this.reportedPast.clear();
    this.outcomes.length = 0;
    this.nextRefreshAt = 0;
    this.nextHealthAt = 0;
    this.refreshFailures = 0;
    this.completed = 0;
    this.failed = 0;
  }

  async run(signal?: AbortSignal) {
    this.init();
    this.log.info("loop.start", {
      pollIntervalMs: this.options.pollIntervalMs,
      refreshIntervalMs: this.options.refreshIntervalMs
    });

    while (!signal?.aborted) {
      try {
        await this.runCycle();
      } catch (error) {
        this.log.error("loop.cycle.failed", describeError(error));
      }
      await this.options.clock.sleep(this.options.pollIntervalMs, signal);
    }

    await this.teardown();
  }

  async runCycle() {
    this.drainOutcomes();
    const now = this.options.clock.now();
    if (now.getTime() >= this.nextRefreshAt) {
      await this.refresh(now);
    }
    await this.dispatch(this.options.clock.now());
    this.reportHealth(this.options.clock.now());
  }

  /** Stops live captures gracefully and waits for background tasks. */
  async teardown() {
    const active = this.options.supervisor
      .activeJobs()
      .filter((job) => job.state === "recording");
    if (active.length > 0) {
      this.log.warn("loop.teardown.stopping", { active: active.length });
    }
    await Promise.all(
      active.map(async (job) => {
        try {
          const artifact = await this.options.supervisor.stop(job);
          this.log.warn("loop.teardown.kept", {
            timeslotId: job.timeslotId,
            localPath: artifact.localPath
          });
        } catch (error) {
          this.log.error("loop.teardown.stop_failed", {
            timeslotId: job.timeslotId,
            ...describeError(error)
          });
        }
      })
    );
    await Promise.all([...this.inFlight]);
    this.drainOutcomes();
    this.log.info("loop.stopped", { completed: this.completed, failed: this.failed });
  }

  status(): LoopStatus {
    const next = this.pending[0];
    return {
      pending: this.pending.length,
      active: this.options.supervisor.activeCount,
      inFlight: this.inFlight.size,
      completed: this.completed,
      failed: this.failed,
      nextRefreshAt: this.nextRefreshAt > 0 ? new Date(this.nextRefreshAt).toISOString() : null,
      nextStart: next ? next.start.toISOString() : null
    };
  }

  pendingTimeslots(): readonly Timeslot[] {
    return this.pending;
  }

  private async refresh(now: Date) {
    const refreshLog = this.log.withContext({ stage: "refresh" });
    let records: RawSlot[];
    try {
      records = await this.options.source.fetchUpcoming(this.options.scheduleCount);
    } catch (error) {
      this.refreshFailures += 1;
      const waitMs = Math.min(
        backoffDelay({ retries: 0, backoffMs: this.options.refreshBackoffMs }, this.refreshFailures - 1),
        this.options.refreshIntervalMs
      );
      this.nextRefreshAt = now.getTime() + waitMs;
      refreshLog.error("loop.refresh.failed", {
        failures: this.refreshFailures,
        retryInMs: waitMs,
        ...describeError(error)
      });
      if (this.refreshFailures === (this.options.refreshAlertThreshold ?? 5)) {
        this.alert("schedule_unavailable", {
          failures: this.refreshFailures,
          error: errorMessage(error)
        });
      }
      return;
    }

    this.refreshFailures = 0;
    this.nextRefreshAt = now.getTime() + this.options.refreshIntervalMs;
    this.pruneKnownIds(now);

    const planned = planTimeslots(records, new Set(this.knownIds.keys()), {
      now,
      excludedCategories: this.options.excludedCategories,
      horizonMs: this.options.horizonMs,
      reportedPast: this.reportedPast,
      logger: refreshLog
    });
    const listed = new Set(records.map((record) => record.id));
    for (const id of this.reportedPast) {
      if (!listed.has(id)) this.reportedPast.delete(id);
    }
    for (const slot of planned) {
      this.knownIds.set(slot.id, slot.end.getTime());
    }
    this.pending = [...this.pending, ...planned].sort(
      (a, b) => a.start.getTime() - b.start.getTime()
    );

    refreshLog.info("loop.refresh.done", {
      fetched: records.length,
      planned: planned.length,
      pending: this.pending.length,
      nextRefreshAt: new Date(this.nextRefreshAt).toISOString()
    });
    if (planned.length > 0) {
      refreshLog.info("loop.refresh.schedule", {
        table: formatScheduleTable(this.pending, this.options.timeZone)
      });
    }
  }

  private async dispatch(now: Date) {
    const nowMs = now.getTime();
    const due: Timeslot[] = [];
    const waiting: Timeslot[] = [];
    for (const slot of this.pending) {
      (slot.start.getTime() <= nowMs ? due : waiting).push(slot);
    }
    this.pending = waiting;

    for (const slot of due) {
      await this.startRecording(slot, nowMs);
    }

    for (const job of this.options.supervisor.dueForStop(now)) {
      this.track(this.finishJob(job));
    }
  }

  private async startRecording(slot: Timeslot, nowMs: number) {
    const slotLog = this.log.withContext({ timeslotId: slot.id, stage: "capture" });
    if (this.options.supervisor.has(slot.id)) {
      return;
    }
    const remainingMs = slot.end.getTime() - nowMs;
    if (remainingMs <= 0) {
      slotLog.warn("loop.slot.stale", { show: slot.showName, end: slot.end.toISOString() });
      return;
    }
    if (this.options.minDurationMs !== undefined && remainingMs < this.options.minDurationMs) {
      slotLog.warn("loop.slot.too_short", { show: slot.showName, remainingMs });
      return;
    }

    try {
      await this.options.supervisor.start(slot);
    } catch (error) {
      this.failed += 1;
      slotLog.error("loop.recording.launch_failed", describeError(error));
      if (error instanceof LaunchFailedError) {
        this.alert("capture_failed", {
          show: slot.showName,
          timeslotId: slot.id,
          error: error.message
        });
      }
    }
  }

  // Alerts go out in the background; a slow SMTP server must not hold up dispatch.
  private alert(kind: AlertKind, detail: Record<string, unknown>) {
    this.track(
      this.options.notifier.alert(kind, detail).then((sent) => {
        if (!sent) this.log.debug("loop.alert.skipped", { kind });
      })
    );
  }

  private track(task: Promise<void>) {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.log.error("loop.task.crashed", describeError(error));
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  /** stop → publish → notify for one job, strictly in that order. */
  private async finishJob(job: RecordingJob) {
    const { timeslot } = job;
    const taskLog = this.log.withContext({ timeslotId: timeslot.id });
    const post = (outcome: Omit<PipelineOutcome, "timeslotId" | "showName">) =>
      this.outcomes.push({ timeslotId: timeslot.id, showName: timeslot.showName, ...outcome });

    let artifact: Artifact;
    try {
      artifact = await this.options.supervisor.stop(job);
    } catch (error) {
      taskLog.error("loop.recording.incomplete", { stage: "capture", ...describeError(error) });
      await this.options.notifier.alert("capture_failed", {
        show: timeslot.showName,
        timeslotId: timeslot.id,
        error: errorMessage(error)
      });
      post({ status: "failed", stage: "capture", error: errorMessage(error) });
      return;
    }

    let remoteUrl: string;
    try {
      remoteUrl = await this.options.publisher.publish(artifact);
    } catch (error) {
      taskLog.error("loop.upload.failed", { stage: "upload", ...describeError(error) });
      if (error instanceof UploadFailedError) {
        await this.options.notifier.alert("upload_failed", {
          show: timeslot.showName,
          timeslotId: timeslot.id,
          localPath: artifact.localPath
        });
      }
      post({ status: "failed", stage: "upload", error: errorMessage(error) });
      return;
    }

    const songs = await this.options.source.fetchSpins(timeslot);
    const report = await this.options.notifier.notify(
      timeslot.recipients,
      timeslot.showName,
      remoteUrl,
      { airedAt: timeslot.start, songs, timeslotId: timeslot.id }
    );
    if (report.failed > 0) {
      post({
        status: "failed",
        stage: "notify",
        remoteUrl,
        error: `${report.failed} of ${report.outcomes.length} deliveries failed`
      });
      return;
    }
    post({ status: "completed", remoteUrl });
  }

  private drainOutcomes() {
    for (const outcome of this.outcomes.splice(0)) {
      if (outcome.status === "completed") {
        this.completed += 1;
        this.log.info("loop.show.completed", {
          timeslotId: outcome.timeslotId,
          show: outcome.showName,
          url: outcome.remoteUrl
        });
      } else {
        this.failed += 1;
        this.log.warn("loop.show.failed", { ...outcome });
      }
    }
  }

  private pruneKnownIds(now: Date) {
    for (const [id, endMs] of this.knownIds) {
      if (endMs <= now.getTime() && !this.options.supervisor.has(id)) {
        this.knownIds.delete(id);
      }
    }
  }

  private reportHealth(now: Date) {
    const interval = this.options.healthIntervalMs;
    if (interval === undefined || now.getTime() < this.nextHealthAt) return;
    this.nextHealthAt = now.getTime() + interval;
    this.log.info("loop.health", { ...this.status() });
  }
}
