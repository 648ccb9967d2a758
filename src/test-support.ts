import { writeFile } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import type { CaptureBackend, CaptureExit, CaptureHandle, CaptureRequest } from "./capture.js";
import type { Clock } from "./clock.js";
import type { ContextLogger, LogLevel } from "./logger.js";
import type { EmailMessage, EmailTransport } from "./mailer.js";
import type { ScheduleSource } from "./schedule-source.js";
import type { StorageClient, StoredObject } from "./storage.js";
import type { RawSlot, Spin } from "./types.js";

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private onAdvance?: (nowMs: number) => void;

  constructor(public current: number) {}

  now() {
    return new Date(this.current);
  }

  async sleep(ms: number, signal?: AbortSignal) {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += ms;
    this.onAdvance?.(this.current);
  }

  whenAdvanced(listener: (nowMs: number) => void) {
    this.onAdvance = listener;
  }
}

export type FakeCaptureMode = "ok" | "empty" | "missing";

export class FakeCaptureBackend implements CaptureBackend {
  readonly started: CaptureRequest[] = [];
  readonly stopped: string[] = [];
  readonly startTimes: number[] = [];
  readonly stopTimes: number[] = [];
  mode: FakeCaptureMode = "ok";
  /** Titles whose capture refuses to launch. */
  readonly failTitles = new Set<string>();
  private readonly exits = new Map<string, (exit: CaptureExit) => void>();

  constructor(private readonly clock?: Clock) {}

  async start(request: CaptureRequest): Promise<CaptureHandle> {
    if (request.title && this.failTitles.has(request.title)) {
      throw new Error("spawn ffmpeg ENOENT");
    }
    this.started.push(request);
    this.startTimes.push(this.clock?.now().getTime() ?? Date.now());
    if (this.mode === "ok") {
      await writeFile(request.outputPath, "ID3-fake-audio");
    } else if (this.mode === "empty") {
      await writeFile(request.outputPath, "");
    }

    let exited = false;
    const exitedPromise = new Promise<CaptureExit>((resolve) => {
      this.exits.set(request.outputPath, (exit) => {
        exited = true;
        resolve(exit);
      });
    });
    return {
      pid: 4242,
      outputPath: request.outputPath,
      startedAt: new Date(),
      exited: exitedPromise,
      hasExited: () => exited
    };
  }

  async stop(handle: CaptureHandle) {
    this.stopped.push(handle.outputPath);
    this.stopTimes.push(this.clock?.now().getTime() ?? Date.now());
    const exit: CaptureExit = { code: 0, signal: null, stderrTail: "" };
    this.exits.get(handle.outputPath)?.(exit);
    return { ...exit, forced: false };
  }
}

export class RecordingTransport implements EmailTransport {
  readonly sent: EmailMessage[] = [];
  readonly attempts: string[] = [];
  /** Address → number of sends that should still fail. */
  readonly failures = new Map<string, number>();
  /** Real delay applied to every send. */
  delayMs = 0;

  async send(message: EmailMessage) {
    this.attempts.push(message.to);
    if (this.delayMs > 0) {
      await delay(this.delayMs);
    }
    const remaining = this.failures.get(message.to) ?? 0;
    if (remaining > 0) {
      this.failures.set(message.to, remaining - 1);
      throw new Error(`550 mailbox unavailable: ${message.to}`);
    }
    this.sent.push(message);
  }

  async verify() {}
}

export class MemoryStorage implements StorageClient {
  readonly objects = new Map<string, string>();
  attempts = 0;
  failuresRemaining = 0;

  async putFile(key: string, localPath: string): Promise<StoredObject> {
    this.attempts += 1;
    if (this.failuresRemaining > 0) {
      this.failuresRemaining -= 1;
      throw new Error("connect ETIMEDOUT");
    }
    this.objects.set(key, localPath);
    return {
      key,
      uri: `memory://${key}`,
      url: `https://files.example.test/${key}`,
      size: 1
    };
  }
}

export function stubSource(slots: RawSlot[], spins: Spin[] = []) {
  const calls = { upcoming: 0, spins: 0 };
  const source: ScheduleSource = {
    async fetchUpcoming() {
      calls.upcoming += 1;
      return slots;
    },
    async fetchSpins() {
      calls.spins += 1;
      return spins;
    }
  };
  return { source, calls };
}

export function rawSlot(overrides: Partial<RawSlot> & { id: string; start: string; end: string }): RawSlot {
  return {
    title: `Show ${overrides.id}`,
    category: null,
    recipients: [{ name: "Host", email: "host@example.org" }],
    ...overrides
  };
}

export type LogRecord = { level: LogLevel; msg: string; data?: Record<string, unknown> };

/** A ContextLogger that keeps entries in memory instead of printing them. */
export function recordingLogger() {
  const records: LogRecord[] = [];
  const create = (context?: Record<string, unknown>): ContextLogger => {
    const write = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) => {
      records.push({ level, msg, data: { ...context, ...data } });
    };
    return {
      debug: write("debug"),
      info: write("info"),
      warn: write("warn"),
      error: write("error"),
      withContext: (extra) => create({ ...context, ...extra })
    };
  };
  return { logger: create(), records };
}
