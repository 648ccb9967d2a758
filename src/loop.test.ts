import { mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { setLoggerConfig } from "./logger.js";
import { SchedulerLoop } from "./loop.js";
import type { EmailMessage } from "./mailer.js";
import { Notifier } from "./notifier.js";
import { createArtifactPublisher } from "./publisher.js";
import type { ScheduleSource } from "./schedule-source.js";
import { RecordingSupervisor } from "./supervisor.js";
import {
  FakeCaptureBackend,
  FakeClock,
  MemoryStorage,
  RecordingTransport,
  rawSlot,
  stubSource
} from "./test-support.js";
import type { RawSlot } from "./types.js";

const T0 = Date.parse("2026-03-02T10:00:00Z");
const at = (offsetMs: number) => new Date(T0 + offsetMs).toISOString();

let dir: string;

beforeAll(() => {
  setLoggerConfig({ level: "error" });
});

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "recorder-loop-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

/** Holds operator alerts for a while, noting how many captures had stopped by then. */
class SlowAlertTransport extends RecordingTransport {
  readonly stoppedWhenAlertSent: number[] = [];
  stoppedCount = () => 0;

  async send(message: EmailMessage) {
    if (message.subject.startsWith("Recorder:")) {
      await delay(50);
      this.stoppedWhenAlertSent.push(this.stoppedCount());
    }
    await super.send(message);
  }
}

function buildLoop(
  source: ScheduleSource,
  overrides: { refreshIntervalMs?: number; transport?: RecordingTransport } = {}
) {
  const clock = new FakeClock(T0);
  const backend = new FakeCaptureBackend(clock);
  const storage = new MemoryStorage();
  const transport = overrides.transport ?? new RecordingTransport();
  const supervisor = new RecordingSupervisor({
    backend,
    clock,
    streamUrl: "http://stream.example.test/live",
    outputDir: dir,
    format: "mp3",
    stopGraceMs: 1000,
    captureBufferMs: 0,
    timeZone: "UTC"
  });
  const publisher = createArtifactPublisher({
    storage,
    retry: { retries: 1, backoffMs: 100 },
    attemptTimeoutMs: 1000,
    sleep: async () => {}
  });
  const notifier = new Notifier({
    transport,
    station: { stationName: "KTST", retentionDays: 30, timeZone: "UTC" },
    adminAddress: "ops@example.org"
  });
  const loop = new SchedulerLoop({
    source,
    supervisor,
    publisher,
    notifier,
    clock,
    pollIntervalMs: 500,
    refreshIntervalMs: overrides.refreshIntervalMs ?? 60_000,
    scheduleCount: 10,
    excludedCategories: ["Automation"],
    refreshBackoffMs: 1000,
    refreshAlertThreshold: 1,
    timeZone: "UTC"
  });

  const run = (stopAtOffsetMs: number) => {
    const controller = new AbortController();
    clock.whenAdvanced((nowMs) => {
      if (nowMs >= T0 + stopAtOffsetMs) controller.abort();
    });
    return loop.run(controller.signal);
  };

  return { clock, backend, storage, transport, supervisor, loop, run };
}

describe("SchedulerLoop", () => {
  it("records, publishes and notifies a show end to end", async () => {
    const { source } = stubSource([
      rawSlot({ id: "501", title: "Morning Mix", start: at(2000), end: at(4000) })
    ]);
    const { backend, storage, transport, loop, run } = buildLoop(source);

    await run(6000);

    expect(backend.startTimes).toHaveLength(1);
    expect(backend.startTimes[0]).toBeGreaterThanOrEqual(T0 + 2000);
    expect(backend.startTimes[0]).toBeLessThanOrEqual(T0 + 2500);
    expect(backend.stopTimes).toHaveLength(1);
    expect(backend.stopTimes[0]).toBeGreaterThanOrEqual(T0 + 4000);
    expect(backend.stopTimes[0]).toBeLessThanOrEqual(T0 + 4500);

    const outputPath = join(dir, "MorningMix_2026-03-02_1000.mp3");
    expect(backend.started[0].outputPath).toBe(outputPath);
    expect([...storage.objects.entries()]).toEqual([
      ["MorningMix_2026-03-02_1000.mp3", outputPath]
    ]);

    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0].to).toBe("host@example.org");
    expect(transport.sent[0].subject).toBe("Morning Mix Recording Link - 03/02/2026");
    expect(transport.sent[0].text).toContain(
      "Download here: https://files.example.test/MorningMix_2026-03-02_1000.mp3"
    );

    expect(loop.status()).toMatchObject({ active: 0, inFlight: 0, completed: 1, failed: 0 });
  });

  it("keeps running after a failed refresh and retries it", async () => {
    const slots: RawSlot[] = [
      rawSlot({ id: "502", title: "Night Owl", start: at(2000), end: at(4000) })
    ];
    let calls = 0;
    const source: ScheduleSource = {
      async fetchUpcoming() {
        calls += 1;
        if (calls === 1) throw new Error("getaddrinfo ENOTFOUND");
        return slots;
      },
      async fetchSpins() {
        return [];
      }
    };
    const { backend, transport, loop, run } = buildLoop(source);

    await run(6000);

    expect(calls).toBe(2);
    expect(backend.started).toHaveLength(1);
    expect(transport.sent.map((message) => message.subject)).toEqual([
      "Recorder: schedule API unavailable",
      "Night Owl Recording Link - 03/02/2026"
    ]);
    expect(transport.sent[0].to).toBe("ops@example.org");
    expect(loop.status()).toMatchObject({ completed: 1, failed: 0 });
  });

  it("continues with later shows when a capture fails to launch", async () => {
    const { source } = stubSource([
      rawSlot({ id: "601", title: "Broken Show", start: at(2000), end: at(4000) }),
      rawSlot({ id: "602", title: "Late Show", start: at(3000), end: at(5000) })
    ]);
    const { backend, transport, loop, run } = buildLoop(source);
    backend.failTitles.add("Broken Show");

    await run(7000);

    expect(backend.started.map((request) => request.title)).toEqual(["Late Show"]);
    expect(transport.sent.map((message) => message.subject)).toEqual([
      "Recorder: capture failed",
      "Late Show Recording Link - 03/02/2026"
    ]);
    expect(loop.status()).toMatchObject({ completed: 1, failed: 1 });
  });

  it("records a slot once even when every refresh returns it", async () => {
    const { source, calls } = stubSource([
      rawSlot({ id: "701", title: "Repeat", start: at(2000), end: at(4000) })
    ]);
    const { backend, loop, run } = buildLoop(source, { refreshIntervalMs: 1000 });

    await run(6000);

    expect(calls.upcoming).toBe(6);
    expect(backend.started).toHaveLength(1);
    expect(loop.status().completed).toBe(1);
  });

  it("stops live captures on shutdown and keeps the partial file", async () => {
    const { source } = stubSource([
      rawSlot({ id: "801", title: "Long Show", start: at(2000), end: at(10_000) })
    ]);
    const { backend, storage, transport, loop, run } = buildLoop(source);

    await run(3000);

    expect(backend.stopped).toEqual([join(dir, "LongShow_2026-03-02_1000.mp3")]);
    expect(storage.attempts).toBe(0);
    expect(transport.sent).toHaveLength(0);
    expect((await stat(backend.stopped[0])).size).toBeGreaterThan(0);
    expect(loop.status().active).toBe(0);
  });

  it("skips excluded categories", async () => {
    const { source } = stubSource([
      rawSlot({
        id: "901",
        title: "Overnight",
        category: "automation",
        start: at(2000),
        end: at(4000)
      })
    ]);
    const { backend, loop, run } = buildLoop(source);

    await run(5000);

    expect(backend.started).toHaveLength(0);
    expect(loop.status()).toMatchObject({ pending: 0, completed: 0, failed: 0 });
  });

  it("records overlapping shows at the same time", async () => {
    const { source } = stubSource([
      rawSlot({ id: "1001", title: "First Show", start: at(1000), end: at(4000) }),
      rawSlot({ id: "1002", title: "Second Show", start: at(2000), end: at(5000) })
    ]);
    const { backend, storage, transport, loop, run } = buildLoop(source);

    await run(7000);

    expect(backend.started.map((request) => request.title)).toEqual(["First Show", "Second Show"]);
    expect(backend.startTimes).toEqual([T0 + 1000, T0 + 2000]);
    expect(backend.stopTimes).toEqual([T0 + 4000, T0 + 5000]);
    expect(storage.objects.size).toBe(2);
    expect(transport.sent.map((message) => message.subject).sort()).toEqual([
      "First Show Recording Link - 03/02/2026",
      "Second Show Recording Link - 03/02/2026"
    ]);
    expect(loop.status()).toMatchObject({ completed: 2, failed: 0 });
  });

  it("keeps the file and emails no host when the upload runs out of retries", async () => {
    const { source, calls } = stubSource([
      rawSlot({ id: "1101", title: "Lost Upload", start: at(2000), end: at(4000) })
    ]);
    const { storage, transport, loop, run } = buildLoop(source);
    storage.failuresRemaining = 10;

    await run(6000);

    expect(storage.attempts).toBe(2);
    expect(storage.objects.size).toBe(0);
    expect(transport.sent.map((message) => [message.to, message.subject])).toEqual([
      ["ops@example.org", "Recorder: upload failed"]
    ]);
    expect(calls.spins).toBe(0);
    const localPath = join(dir, "LostUpload_2026-03-02_1000.mp3");
    expect((await stat(localPath)).size).toBe("ID3-fake-audio".length);
    expect(loop.status()).toMatchObject({ completed: 0, failed: 1 });
  });

  it("stops a finished show without waiting for a slow alert", async () => {
    const { source } = stubSource([
      rawSlot({ id: "1201", title: "Early Show", start: at(1000), end: at(2000) }),
      rawSlot({ id: "1202", title: "Broken Show", start: at(2000), end: at(4000) })
    ]);
    const transport = new SlowAlertTransport();
    const { backend, loop, run } = buildLoop(source, { transport });
    backend.failTitles.add("Broken Show");
    transport.stoppedCount = () => backend.stopped.length;

    await run(4000);

    expect(backend.stopTimes).toEqual([T0 + 2000]);
    expect(transport.stoppedWhenAlertSent).toEqual([1]);
    expect(transport.sent.map((message) => message.subject)).toContain("Recorder: capture failed");
    expect(loop.status()).toMatchObject({ completed: 1, failed: 1 });
  });
});
