import { unlink } from "node:fs/promises";
import { basename } from "node:path";
import { UploadFailedError, errorMessage } from "./errors.js";
import { logger as rootLogger, type ContextLogger } from "./logger.js";
import { withDeadline, withRetry, type RetryConfig } from "./retry.js";
import { contentTypeFor, type StorageClient, type StoredObject } from "./storage.js";
import type { Artifact } from "./types.js";

export type ArtifactPublisher = {
  publish: (artifact: Artifact) => Promise<string>;
};

export type PublisherOptions = {
  storage: StorageClient;
  retry: RetryConfig;
  /** Each attempt is aborted after this long; the retry starts once it has settled. */
  attemptTimeoutMs: number;
  prefix?: string;
  deleteAfterUpload?: boolean;
  sleep?: (ms: number) => Promise<void>;
  logger?: ContextLogger;
};

export function buildObjectKey(localPath: string, prefix?: string) {
  const name = basename(localPath);
  const trimmed = prefix?.replace(/^\/+|\/+$/g, "");
  return trimmed ? `${trimmed}/${name}` : name;
}

export function createArtifactPublisher(options: PublisherOptions): ArtifactPublisher {
  const log = options.logger ?? rootLogger.withContext({ component: "publisher" });

  return {
    async publish(artifact) {
      const key = buildObjectKey(artifact.localPath, options.prefix);
      const uploadLog = log.withContext({ timeslotId: artifact.timeslot.id, stage: "upload" });
      uploadLog.info("upload.start", { key, localPath: artifact.localPath, size: artifact.size });

      let stored: StoredObject;
      try {
        stored = await withRetry(
          () =>
            withDeadline(
              (signal) =>
                options.storage.putFile(key, artifact.localPath, {
                  contentType: contentTypeFor(artifact.localPath),
                  signal
                }),
              options.attemptTimeoutMs,
              `upload of ${key}`
            ),
          options.retry,
          {
            sleep: options.sleep,
            onRetry: (error, attempt, waitMs) =>
              uploadLog.warn("upload.retry", { attempt, waitMs, error: errorMessage(error) })
          }
        );
      } catch (error) {
        uploadLog.error("upload.failed", {
          key,
          attempts: options.retry.retries + 1,
          retainedAt: artifact.localPath,
          error: errorMessage(error)
        });
        throw new UploadFailedError(`Upload of ${key} failed`, {
          cause: error,
          context: { timeslotId: artifact.timeslot.id, localPath: artifact.localPath }
        });
      }

      uploadLog.info("upload.done", { key, uri: stored.uri, url: stored.url });

      if (options.deleteAfterUpload) {
        try {
          await unlink(artifact.localPath);
        } catch (error) {
          uploadLog.warn("upload.cleanup.failed", {
            localPath: artifact.localPath,
            error: errorMessage(error)
          });
        }
      }

      return stored.url;
    }
  };
}
