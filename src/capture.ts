import { spawn, type ChildProcess } from "node:child_process";
import { LaunchFailedError } from "./errors.js";
import { logger } from "./logger.js";

export type CaptureRequest = {
  streamUrl: string;
  outputPath: string;
  maxDurationSeconds?: number;
  title?: string;
};

export type CaptureExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderrTail: string;
};

export type CaptureResult = CaptureExit & {
  forced: boolean;
};

export type CaptureHandle = {
  pid?: number;
  outputPath: string;
  startedAt: Date;
  exited: Promise<CaptureExit>;
  hasExited: () => boolean;
};

/**
 * Capability used by the supervisor to run one capture. Implementations
 * must finalize the output file when asked to stop gracefully.
 */
export type CaptureBackend = {
  start: (request: CaptureRequest) => Promise<CaptureHandle>;
  stop: (handle: CaptureHandle, graceMs: number) => Promise<CaptureResult>;
};

const STDERR_TAIL_BYTES = 2000;

export function buildCaptureArgs(request: CaptureRequest): string[] {
  return [
    "-hide_banner",
    ["-loglevel", "error"],
    "-y",
    ["-i", request.streamUrl],
    request.maxDurationSeconds ? ["-t", `${Math.ceil(request.maxDurationSeconds)}`] : [],
    request.title ? ["-metadata", `title=${request.title}`] : [],
    request.outputPath
  ].flat();
}

export function createFfmpegCapture(options: { ffmpegPath: string }): CaptureBackend {
  const processes = new WeakMap<CaptureHandle, ChildProcess>();

  return {
    start(request) {
      const args = buildCaptureArgs(request);
      logger.debug("capture.spawn", { command: options.ffmpegPath, args: args.join(" ") });

      return new Promise<CaptureHandle>((resolve, reject) => {
        const child = spawn(options.ffmpegPath, args, {
          stdio: ["ignore", "ignore", "pipe"]
        });

        let stderrTail = "";
        let exit: CaptureExit | undefined;
        child.stderr?.on("data", (chunk: Buffer) => {
          stderrTail = (stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
        });

        const exited = new Promise<CaptureExit>((resolveExit) => {
          child.once("close", (code, signal) => {
            exit = { code, signal, stderrTail };
            resolveExit(exit);
          });
        });

        child.once("error", (error) => {
          if (child.pid === undefined) {
            reject(
              new LaunchFailedError(`Unable to spawn ${options.ffmpegPath}`, {
                cause: error,
                context: { outputPath: request.outputPath }
              })
            );
            return;
          }
          logger.warn("capture.process.error", { pid: child.pid, error: error.message });
        });

        child.once("spawn", () => {
          const handle: CaptureHandle = {
            pid: child.pid,
            outputPath: request.outputPath,
            startedAt: new Date(),
            exited,
            hasExited: () => exit !== undefined
          };
          processes.set(handle, child);
          resolve(handle);
        });
      });
    },

    async stop(handle, graceMs) {
      const child = processes.get(handle);
      if (!child || handle.hasExited()) {
        return { ...(await handle.exited), forced: false };
      }

      // ffmpeg finalizes the container on SIGINT
      child.kill("SIGINT");
      const graceful = await Promise.race([
        handle.exited,
        new Promise<null>((resolve) => {
          const timer = setTimeout(() => resolve(null), graceMs);
          void handle.exited.then(() => clearTimeout(timer));
        })
      ]);
      if (graceful) {
        return { ...graceful, forced: false };
      }

      logger.warn("capture.stop.forced", { pid: handle.pid, graceMs });
      child.kill("SIGKILL");
      return { ...(await handle.exited), forced: true };
    }
  };
}
