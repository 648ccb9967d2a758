import "dotenv/config";
import { z } from "zod";
import { defaultConfig } from "../config.defaults.js";
import { ConfigError } from "./errors.js";
import { isValidEmail } from "./utils.js";

const truthy = new Set(["true", "1", "yes"]);

const envSchema = z.object({
  SCHEDULE_API_URL: z.string().url().optional(),
  SCHEDULE_API_KEY: z.string().optional(),
  SCHEDULE_COUNT: z.coerce.number().int().positive().optional(),
  EXCLUDED_CATEGORIES: z.string().optional(),
  REFRESH_INTERVAL_MS: z.coerce.number().int().positive().optional(),

  STREAM_URL: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),
  FFMPEG_PATH: z.string().optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().optional(),

  BUCKET_TYPE: z.string().optional(),
  BUCKET_URI: z.string().optional(),
  BUCKET_NAME: z.string().optional(),
  BUCKET_REGION: z.string().optional(),
  BUCKET_ENDPOINT: z.string().optional(),
  BUCKET_FORCE_PATH_STYLE: z.string().optional(),
  BUCKET_ACCESS_KEY_ID: z.string().optional(),
  BUCKET_SECRET_ACCESS_KEY: z.string().optional(),
  BUCKET_PUBLIC_URL: z.string().optional(),

  EMAIL_ADDRESS: z.string().optional(),
  EMAIL_PASSWORD: z.string().optional(),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().optional(),
  SMTP_SECURE: z.string().optional(),
  ADMIN_EMAIL: z.string().optional(),
  CC_EMAIL: z.string().optional(),

  RETRY_COUNT: z.coerce.number().int().nonnegative().optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().positive().optional(),
  TIMEZONE: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
  LOG_FORMAT: z.enum(["json", "pretty"]).optional(),
  LOG_COLOR: z.string().optional(),
  LOG_FILE: z.string().optional()
});

export type AppConfig = ReturnType<typeof loadConfig>;

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
  defaults: ConfigFile = defaultConfig
) {
  const envResult = envSchema.safeParse(source);
  if (!envResult.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(envResult.error)}`);
  }
  const fileResult = fileConfigSchema.safeParse(defaults);
  if (!fileResult.success) {
    throw new ConfigError(`Invalid config.defaults.ts: ${formatIssues(fileResult.error)}`);
  }
  const env = envResult.data;
  const fileConfig = fileResult.data;

  const apiKey = env.SCHEDULE_API_KEY ?? fileConfig.schedule.apiKey;
  if (!apiKey) {
    throw new ConfigError("Missing SCHEDULE_API_KEY (env or config.defaults.ts).");
  }
  const streamUrl = env.STREAM_URL ?? fileConfig.recorder.streamUrl;
  if (!streamUrl) {
    throw new ConfigError("Missing STREAM_URL (env or config.defaults.ts).");
  }
  const address = env.EMAIL_ADDRESS ?? fileConfig.email.address;
  if (!address || !isValidEmail(address)) {
    throw new ConfigError("Missing or invalid EMAIL_ADDRESS for the sender account.");
  }
  const password = env.EMAIL_PASSWORD ?? fileConfig.email.password;
  if (!password) {
    throw new ConfigError("Missing EMAIL_PASSWORD for the sender account.");
  }
  const adminAddress = env.ADMIN_EMAIL ?? fileConfig.email.adminAddress;
  if (adminAddress && !isValidEmail(adminAddress)) {
    throw new ConfigError(`Invalid ADMIN_EMAIL: ${adminAddress}`);
  }

  const storage = {
    type: env.BUCKET_TYPE ?? fileConfig.storage.type,
    bucket: resolveBucketName(env, fileConfig.storage.bucket),
    region: env.BUCKET_REGION ?? fileConfig.storage.region,
    endpoint: env.BUCKET_ENDPOINT ?? fileConfig.storage.endpoint,
    forcePathStyle: resolveBool(
      env.BUCKET_FORCE_PATH_STYLE,
      fileConfig.storage.forcePathStyle
    ),
    accessKeyId: env.BUCKET_ACCESS_KEY_ID ?? fileConfig.storage.accessKeyId,
    secretAccessKey:
      env.BUCKET_SECRET_ACCESS_KEY ?? fileConfig.storage.secretAccessKey,
    publicBaseUrl: env.BUCKET_PUBLIC_URL ?? fileConfig.storage.publicBaseUrl,
    prefix: fileConfig.storage.prefix,
    localDir: fileConfig.storage.localDir,
    deleteAfterUpload: fileConfig.storage.deleteAfterUpload
  };

  if (storage.type === "s3" && !storage.bucket) {
    throw new ConfigError("Missing BUCKET_NAME/BUCKET_URI for S3 storage.");
  }

  const timeZone = env.TIMEZONE ?? fileConfig.timeZone;

  return {
    timeZone,
    schedule: {
      baseUrl: env.SCHEDULE_API_URL ?? fileConfig.schedule.baseUrl,
      apiKey,
      count: env.SCHEDULE_COUNT ?? fileConfig.schedule.count,
      excludedCategories: resolveList(
        env.EXCLUDED_CATEGORIES,
        fileConfig.schedule.excludedCategories
      ),
      refreshIntervalMs: env.REFRESH_INTERVAL_MS ?? fileConfig.schedule.refreshIntervalMs,
      horizonHours: fileConfig.schedule.horizonHours
    },
    recorder: {
      streamUrl,
      outputDir: env.OUTPUT_DIR ?? fileConfig.recorder.outputDir,
      ffmpegPath: env.FFMPEG_PATH ?? fileConfig.recorder.ffmpegPath,
      format: fileConfig.recorder.format,
      pollIntervalMs: env.POLL_INTERVAL_MS ?? fileConfig.recorder.pollIntervalMs,
      stopGraceMs: fileConfig.recorder.stopGraceMs,
      captureBufferMs: fileConfig.recorder.captureBufferMs,
      minDurationMs: fileConfig.recorder.minDurationMs,
      healthIntervalMs: fileConfig.recorder.healthIntervalMs
    },
    storage,
    email: {
      host: env.SMTP_HOST ?? fileConfig.email.host,
      port: env.SMTP_PORT ?? fileConfig.email.port,
      secure: resolveBool(env.SMTP_SECURE, fileConfig.email.secure),
      address,
      password,
      senderName: fileConfig.email.senderName,
      adminAddress,
      ccAddress: env.CC_EMAIL ?? fileConfig.email.ccAddress,
      stationName: fileConfig.email.stationName,
      retentionDays: fileConfig.email.retentionDays,
      timeoutMs: fileConfig.network.emailTimeoutMs
    },
    network: {
      retryCount: env.RETRY_COUNT ?? fileConfig.network.retryCount,
      retryBackoffMs: env.RETRY_BACKOFF_MS ?? fileConfig.network.retryBackoffMs,
      requestTimeoutMs: fileConfig.network.requestTimeoutMs,
      uploadTimeoutMs: fileConfig.network.uploadTimeoutMs
    },
    logging: {
      level: env.LOG_LEVEL ?? fileConfig.logging.level,
      format: env.LOG_FORMAT ?? fileConfig.logging.format,
      color: resolveBool(env.LOG_COLOR, fileConfig.logging.color),
      timeZone,
      file: env.LOG_FILE ?? fileConfig.logging.file
    }
  };
}

export const fileConfigSchema = z.object({
  timeZone: z.string().optional(),
  schedule: z
    .object({
      baseUrl: z.string().url().default("https://spinitron.com/api"),
      apiKey: z.string().optional(),
      count: z.coerce.number().int().positive().default(24),
      excludedCategories: z.array(z.string()).default(["Automation"]),
      refreshIntervalMs: z.coerce.number().int().positive().default(60 * 60 * 1000),
      horizonHours: z.coerce.number().positive().optional()
    })
    .default({}),
  recorder: z
    .object({
      streamUrl: z.string().optional(),
      outputDir: z.string().default("recordings"),
      ffmpegPath: z.string().default("ffmpeg"),
      format: z.string().default("mp3"),
      pollIntervalMs: z.coerce.number().int().positive().default(1000),
      stopGraceMs: z.coerce.number().int().positive().default(15000),
      captureBufferMs: z.coerce.number().int().nonnegative().default(60000),
      minDurationMs: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
      healthIntervalMs: z.coerce.number().int().positive().default(60000)
    })
    .default({}),
  storage: z
    .object({
      type: z.string().default("s3"),
      bucket: z.string().optional(),
      region: z.string().optional(),
      endpoint: z.string().optional(),
      forcePathStyle: z.boolean().default(false),
      accessKeyId: z.string().optional(),
      secretAccessKey: z.string().optional(),
      publicBaseUrl: z.string().optional(),
      prefix: z.string().default(""),
      localDir: z.string().optional(),
      deleteAfterUpload: z.boolean().default(true)
    })
    .default({}),
  email: z
    .object({
      host: z.string().default("smtp.gmail.com"),
      port: z.coerce.number().int().positive().default(587),
      secure: z.boolean().default(false),
      address: z.string().optional(),
      password: z.string().optional(),
      senderName: z.string().optional(),
      adminAddress: z.string().optional(),
      ccAddress: z.string().optional(),
      stationName: z.string().default("the station"),
      retentionDays: z.coerce.number().int().positive().default(90)
    })
    .default({}),
  network: z
    .object({
      retryCount: z.coerce.number().int().nonnegative().default(3),
      retryBackoffMs: z.coerce.number().int().positive().default(5000),
      requestTimeoutMs: z.coerce.number().int().positive().default(10000),
      uploadTimeoutMs: z.coerce.number().int().positive().default(10 * 60 * 1000),
      emailTimeoutMs: z.coerce.number().int().positive().default(30000)
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      format: z.enum(["json", "pretty"]).default("json"),
      color: z.boolean().default(false),
      file: z.string().optional()
    })
    .default({})
});

export type ConfigFile = z.input<typeof fileConfigSchema>;

function formatIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function resolveBool(value: string | undefined, fallback: boolean) {
  if (value === undefined) return fallback;
  return truthy.has(value.toLowerCase());
}

function resolveList(value: string | undefined, fallback: string[]) {
  if (!value) return fallback;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function resolveBucketName(
  env: { BUCKET_NAME?: string; BUCKET_URI?: string },
  fallback?: string
) {
  if (env.BUCKET_NAME) return env.BUCKET_NAME;
  if (env.BUCKET_URI) return stripBucketScheme(env.BUCKET_URI);
  return fallback;
}

function stripBucketScheme(value: string) {
  return value.replace(/^s3:\/\//, "");
}
