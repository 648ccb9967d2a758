import type { CaptureHandle } from "./capture.js";

export type Recipient = {
  name: string;
  email: string;
};

/** A show record as returned by the schedule API, hosts already resolved. */
export type RawSlot = {
  id: string;
  title: string;
  start: string;
  end: string;
  category: string | null;
  recipients: Recipient[];
};

export type Timeslot = {
  readonly id: string;
  readonly showName: string;
  readonly fileStem: string;
  readonly start: Date;
  readonly end: Date;
  readonly recipients: readonly Recipient[];
  readonly excluded: boolean;
};

export type JobState = "recording" | "stopping" | "finished" | "abandoned";

export type RecordingJob = {
  timeslotId: string;
  timeslot: Timeslot;
  handle: CaptureHandle;
  outputPath: string;
  state: JobState;
  startedAt: Date;
};

export type Artifact = {
  timeslot: Timeslot;
  localPath: string;
  size: number;
  remoteUrl?: string;
};

export type Spin = {
  song: string;
  artist: string;
  start?: string;
};

export type PipelineStage = "capture" | "upload" | "notify";

export type PipelineOutcome = {
  timeslotId: string;
  showName: string;
  status: "completed" | "failed";
  stage?: PipelineStage;
  remoteUrl?: string;
  error?: string;
};
