import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { IncompleteCaptureError, LaunchFailedError } from "./errors.js";
import { setLoggerConfig } from "./logger.js";
import { RecordingSupervisor, buildOutputPath } from "./supervisor.js";
import { FakeCaptureBackend, FakeClock } from "./test-support.js";
import type { Timeslot } from "./types.js";

const T0 = Date.parse("2026-05-10T18:30:00Z");

function timeslot(overrides: Partial<Timeslot> = {}): Timeslot {
  return {
    id: "42",
    showName: "Jazz Hour",
    fileStem: "JazzHour",
    start: new Date(T0),
    end: new Date(T0 + 60 * 60 * 1000),
    recipients: [],
    excluded: false,
    ...overrides
  };
}

let dir: string;

beforeAll(() => {
  setLoggerConfig({ level: "error" });
});

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "recorder-supervisor-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function build() {
  const clock = new FakeClock(T0);
  const backend = new FakeCaptureBackend(clock);
  const supervisor = new RecordingSupervisor({
    backend,
    clock,
    streamUrl: "http://stream.example.test/live",
    outputDir: dir,
    format: "mp3",
    stopGraceMs: 500,
    captureBufferMs: 30_000,
    timeZone: "UTC"
  });
  return { clock, backend, supervisor };
}

describe("buildOutputPath", () => {
  it("stamps the file with the slot start in the configured zone", () => {
    const slot = timeslot();
    expect(buildOutputPath(slot, { outputDir: "/rec", format: "mp3", timeZone: "UTC" })).toBe(
      join("/rec", "JazzHour_2026-05-10_1830.mp3")
    );
    expect(
      buildOutputPath(slot, { outputDir: "/rec", format: "mp3", timeZone: "America/Los_Angeles" })
    ).toBe(join("/rec", "JazzHour_2026-05-10_1130.mp3"));
  });
});

describe("RecordingSupervisor", () => {
  it("starts a capture bounded by the remaining slot time", async () => {
    const { backend, supervisor } = build();
    const job = await supervisor.start(timeslot());

    expect(job.state).toBe("recording");
    expect(supervisor.has("42")).toBe(true);
    expect(backend.started).toEqual([
      {
        streamUrl: "http://stream.example.test/live",
        outputPath: join(dir, "JazzHour_2026-05-10_1830.mp3"),
        maxDurationSeconds: 3630,
        title: "Jazz Hour"
      }
    ]);
  });

  it("returns the running job when started twice", async () => {
    const { backend, supervisor } = build();
    const first = await supervisor.start(timeslot());
    const second = await supervisor.start(timeslot());

    expect(second).toBe(first);
    expect(backend.started).toHaveLength(1);
    expect(supervisor.activeCount).toBe(1);
  });

  it("produces an artifact on stop and releases the job", async () => {
    const { supervisor } = build();
    const job = await supervisor.start(timeslot());
    const artifact = await supervisor.stop(job);

    expect(artifact.localPath).toBe(join(dir, "JazzHour_2026-05-10_1830.mp3"));
    expect(artifact.size).toBe("ID3-fake-audio".length);
    expect(job.state).toBe("finished");
    expect(supervisor.activeCount).toBe(0);
  });

  it("stops a job only once when asked twice", async () => {
    const { backend, supervisor } = build();
    const job = await supervisor.start(timeslot());
    const [a, b] = await Promise.all([supervisor.stop(job), supervisor.stop(job)]);

    expect(a).toBe(b);
    expect(backend.stopped).toHaveLength(1);
  });

  it("reports an empty capture as incomplete", async () => {
    const { backend, supervisor } = build();
    backend.mode = "empty";
    const job = await supervisor.start(timeslot());

    await expect(supervisor.stop(job)).rejects.toBeInstanceOf(IncompleteCaptureError);
    expect(job.state).toBe("abandoned");
    expect(supervisor.has("42")).toBe(false);
  });

  it("reports a missing capture file as incomplete", async () => {
    const { backend, supervisor } = build();
    backend.mode = "missing";
    const job = await supervisor.start(timeslot());

    await expect(supervisor.stop(job)).rejects.toThrow(/Capture output missing/);
  });

  it("wraps launch errors", async () => {
    const { backend, supervisor } = build();
    backend.failTitles.add("Jazz Hour");

    const start = supervisor.start(timeslot());
    await expect(start).rejects.toBeInstanceOf(LaunchFailedError);
    await expect(start).rejects.toThrow("Capture failed to start: spawn ffmpeg ENOENT");
    expect(supervisor.activeCount).toBe(0);
  });

  it("lists only recording jobs past their end as due for stop", async () => {
    const { supervisor } = build();
    await supervisor.start(timeslot());
    await supervisor.start(
      timeslot({ id: "43", fileStem: "Late", end: new Date(T0 + 2 * 60 * 60 * 1000) })
    );

    const due = supervisor.dueForStop(new Date(T0 + 60 * 60 * 1000));
    expect(due.map((job) => job.timeslotId)).toEqual(["42"]);
  });
});
