import { mkdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { CaptureBackend, CaptureHandle } from "./capture.js";
import type { Clock } from "./clock.js";
import { IncompleteCaptureError, LaunchFailedError, errorMessage } from "./errors.js";
import { logger as rootLogger, type ContextLogger } from "./logger.js";
import type { Artifact, RecordingJob, Timeslot } from "./types.js";
import { formatSlotStamp } from "./utils.js";

export type SupervisorOptions = {
  backend: CaptureBackend;
  clock: Clock;
  streamUrl: string;
  outputDir: string;
  format: string;
  stopGraceMs: number;
  /** Extra capture time past the scheduled end before ffmpeg stops itself. */
  captureBufferMs: number;
  timeZone?: string;
  logger?: ContextLogger;
};

export function buildOutputPath(
  timeslot: Timeslot,
  options: Pick<SupervisorOptions, "outputDir" | "format" | "timeZone">
) {
  const stamp = formatSlotStamp(timeslot.start, options.timeZone);
  return join(options.outputDir, `${timeslot.fileStem}_${stamp}.${options.format}`);
}

/**
 * Owns every in-progress capture. One job per timeslot; each job is stopped
 * exactly once and leaves the active set when its stop settles.
 */
export class RecordingSupervisor {
  private readonly jobs = new Map<string, RecordingJob>();
  private readonly stops = new Map<string, Promise<Artifact>>();
  private readonly log: ContextLogger;

  constructor(private readonly options: SupervisorOptions) {
    this.log = options.logger ?? rootLogger.withContext({ component: "supervisor" });
  }

  get activeCount() {
    return this.jobs.size;
  }

  has(timeslotId: string) {
    return this.jobs.has(timeslotId);
  }

  activeJobs(): RecordingJob[] {
    return [...this.jobs.values()];
  }

  /** Jobs still recording whose timeslot has ended at `now`. */
  dueForStop(now: Date): RecordingJob[] {
    return this.activeJobs().filter(
      (job) => job.state === "recording" && job.timeslot.end.getTime() <= now.getTime()
    );
  }

  async start(timeslot: Timeslot): Promise<RecordingJob> {
    const existing = this.jobs.get(timeslot.id);
    if (existing) {
      this.log.warn("recording.start.duplicate", { timeslotId: timeslot.id });
      return existing;
    }

    const outputPath = buildOutputPath(timeslot, this.options);
    const now = this.options.clock.now();
    const remainingMs = timeslot.end.getTime() - now.getTime();
    const jobLog = this.log.withContext({ timeslotId: timeslot.id, stage: "capture" });

    try {
      await mkdir(this.options.outputDir, { recursive: true });
    } catch (error) {
      throw new LaunchFailedError(`Unable to create ${this.options.outputDir}`, {
        cause: error,
        context: { timeslotId: timeslot.id }
      });
    }

    let handle: CaptureHandle;
    try {
      handle = await this.options.backend.start({
        streamUrl: this.options.streamUrl,
        outputPath,
        maxDurationSeconds: (remainingMs + this.options.captureBufferMs) / 1000,
        title: timeslot.showName
      });
    } catch (error) {
      if (error instanceof LaunchFailedError) throw error;
      throw new LaunchFailedError(`Capture failed to start: ${errorMessage(error)}`, {
        cause: error,
        context: { timeslotId: timeslot.id, outputPath }
      });
    }

    const job: RecordingJob = {
      timeslotId: timeslot.id,
      timeslot,
      handle,
      outputPath,
      state: "recording",
      startedAt: now
    };
    this.jobs.set(timeslot.id, job);

    void handle.exited.then((exit) => {
      if (job.state === "recording") {
        jobLog.warn("recording.exited_early", {
          code: exit.code,
          signal: exit.signal,
          stderr: exit.stderrTail
        });
      }
    });

    jobLog.info("recording.started", {
      show: timeslot.showName,
      outputPath,
      pid: handle.pid,
      end: timeslot.end.toISOString()
    });
    return job;
  }

  stop(job: RecordingJob): Promise<Artifact> {
    const pending = this.stops.get(job.timeslotId);
    if (pending) return pending;

    const stopping = this.finish(job).finally(() => {
      this.jobs.delete(job.timeslotId);
      this.stops.delete(job.timeslotId);
    });
    this.stops.set(job.timeslotId, stopping);
    return stopping;
  }

  private async finish(job: RecordingJob): Promise<Artifact> {
    const jobLog = this.log.withContext({ timeslotId: job.timeslotId, stage: "capture" });
    job.state = "stopping";

    const result = await this.options.backend.stop(job.handle, this.options.stopGraceMs);
    jobLog.info("recording.stopped", {
      code: result.code,
      signal: result.signal,
      forced: result.forced
    });

    let size = 0;
    try {
      size = (await stat(job.outputPath)).size;
    } catch (error) {
      job.state = "abandoned";
      throw new IncompleteCaptureError(`Capture output missing: ${job.outputPath}`, {
        cause: error,
        context: { timeslotId: job.timeslotId, stderr: result.stderrTail }
      });
    }
    if (size === 0) {
      job.state = "abandoned";
      throw new IncompleteCaptureError(`Capture output is empty: ${job.outputPath}`, {
        context: { timeslotId: job.timeslotId, stderr: result.stderrTail }
      });
    }

    job.state = "finished";
    return { timeslot: job.timeslot, localPath: job.outputPath, size };
  }
}
