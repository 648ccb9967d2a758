import { mkdir, stat } from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { join, dirname, resolve } from "node:path";
import {
  S3Client,
  PutObjectCommand,
  HeadBucketCommand
} from "@aws-sdk/client-s3";

export type StorageConfig = {
  type: string;
  bucket?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  accessKeyId?: string;
  secretAccessKey?: string;
  publicBaseUrl?: string;
  prefix?: string;
  localDir?: string;
  deleteAfterUpload?: boolean;
};

export type StoredObject = {
  key: string;
  uri: string;
  url: string;
  size: number;
};

export type PutOptions = {
  contentType?: string;
  /** Aborting cancels the transfer; the returned promise then rejects. */
  signal?: AbortSignal;
};

export type StorageClient = {
  putFile: (key: string, localPath: string, options?: PutOptions) => Promise<StoredObject>;
};

const contentTypes: Record<string, string> = {
  mp3: "audio/mpeg",
  aac: "audio/aac",
  m4a: "audio/mp4",
  ogg: "audio/ogg",
  opus: "audio/ogg",
  flac: "audio/flac",
  wav: "audio/wav"
};

export function contentTypeFor(path: string) {
  const extension = path.split(".").pop()?.toLowerCase() ?? "";
  return contentTypes[extension] ?? "application/octet-stream";
}

export function describeStorage(config: StorageConfig) {
  return {
    type: config.type,
    bucket: config.bucket ?? null,
    region: config.region ?? null,
    endpoint: config.endpoint ?? null,
    forcePathStyle: config.forcePathStyle ?? false,
    publicBaseUrl: config.publicBaseUrl ?? null
  };
}

/** Builds the link handed to listeners for an uploaded object. */
export function buildPublicUrl(config: StorageConfig, key: string) {
  const encodedKey = key.split("/").map(encodeURIComponent).join("/");
  if (config.publicBaseUrl) {
    return `${config.publicBaseUrl.replace(/\/+$/, "")}/${encodedKey}`;
  }
  if (config.endpoint) {
    const endpoint = config.endpoint.replace(/\/+$/, "");
    if (config.forcePathStyle) {
      return `${endpoint}/${config.bucket}/${encodedKey}`;
    }
    const url = new URL(endpoint);
    return `${url.protocol}//${config.bucket}.${url.host}/${encodedKey}`;
  }
  const region = config.region && config.region !== "auto" ? config.region : "us-east-1";
  return `https://${config.bucket}.s3.${region}.amazonaws.com/${encodedKey}`;
}

export function createStorageClient(config: StorageConfig): StorageClient {
  if (config.type === "local") {
    return createLocalClient(config);
  }
  if (config.type === "s3") {
    return createS3Client(config);
  }
  throw new Error(`Storage type not implemented: ${config.type}`);
}

export async function validateStorage(config: StorageConfig) {
  if (config.type === "local") {
    await mkdir(localBasePath(config), { recursive: true });
    return;
  }
  if (config.type === "s3") {
    if (!config.bucket) {
      throw new Error("Storage validation failed: missing bucket name.");
    }
    const client = buildS3Client(config);
    try {
      await client.send(new HeadBucketCommand({ Bucket: config.bucket }));
    } catch (error) {
      const status = readHttpStatus(error);
      const hint =
        status === 403
          ? "Check access keys and bucket permissions."
          : status === 404
          ? "Bucket not found; check bucket name and endpoint."
          : "Check endpoint and credentials.";
      throw new Error(`Storage validation failed (${status ?? "unknown"}): ${hint}`);
    }
    return;
  }
  throw new Error(`Storage validation failed: unsupported type ${config.type}`);
}

function localBasePath(config: StorageConfig) {
  return resolve(config.localDir ?? join(process.cwd(), "out"));
}

function createLocalClient(config: StorageConfig): StorageClient {
  const basePath = localBasePath(config);
  return {
    async putFile(key, localPath, options = {}) {
      const filePath = join(basePath, key);
      await mkdir(dirname(filePath), { recursive: true });
      await pipeline(createReadStream(localPath), createWriteStream(filePath), {
        signal: options.signal
      });
      const { size } = await stat(filePath);
      return {
        key,
        uri: filePath,
        url: config.publicBaseUrl ? buildPublicUrl(config, key) : `file://${filePath}`,
        size
      };
    }
  };
}

function buildS3Client(config: StorageConfig) {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: config.accessKeyId
      ? {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey ?? ""
        }
      : undefined
  });
}

function createS3Client(config: StorageConfig): StorageClient {
  if (!config.bucket) {
    throw new Error("Missing storage.bucket for S3.");
  }
  const client = buildS3Client(config);

  return {
    async putFile(key, localPath, options = {}) {
      const { size } = await stat(localPath);
      const body = createReadStream(localPath);
      try {
        await client.send(
          new PutObjectCommand({
            Bucket: config.bucket,
            Key: key,
            Body: body,
            ContentLength: size,
            ContentType: options.contentType ?? contentTypeFor(localPath)
          }),
          { abortSignal: options.signal }
        );
      } finally {
        body.destroy();
      }
      return {
        key,
        uri: `s3://${config.bucket}/${key}`,
        url: buildPublicUrl(config, key),
        size
      };
    }
  };
}

function readHttpStatus(error: unknown) {
  if (typeof error !== "object" || error === null || !("$metadata" in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}
