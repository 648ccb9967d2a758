import type { ConfigFile } from "./src/config.js";

export const defaultConfig: ConfigFile = {
  timeZone: "America/Los_Angeles", // Time zone for file names, email dates and log timestamps
  schedule: {
    baseUrl: "https://spinitron.com/api", // Schedule API base URL (shows, personas, spins)
    count: 24, // Number of upcoming shows requested per refresh
    excludedCategories: ["Automation"], // Show categories that are never recorded
    refreshIntervalMs: 60 * 60 * 1000, // How often the plan is refreshed from the API
    horizonHours: 26, // Only plan shows starting within this many hours
  },
  recorder: {
    outputDir: "recordings", // Local directory for captured files
    ffmpegPath: "ffmpeg", // Capture binary
    format: "mp3", // Output container / file extension
    pollIntervalMs: 1000, // Scheduler loop period
    stopGraceMs: 15000, // Time ffmpeg gets to finalize after SIGINT before SIGKILL
    captureBufferMs: 60000, // Safety cap past the scheduled end if a stop is missed
    minDurationMs: 5 * 60 * 1000, // Skip shows with less than this much airtime left
    healthIntervalMs: 60000, // How often the loop logs its health line
  },
  storage: {
    type: "s3", // Storage backend type ("s3" or "local")
    region: "us-west-1", // AWS region used for the bucket and its public URL
    forcePathStyle: false, // Use path-style URLs (needed for S3-compatible services)
    prefix: "", // Key prefix for uploaded recordings
    deleteAfterUpload: true, // Remove the local file once it is safely uploaded
  },
  email: {
    host: "smtp.gmail.com", // SMTP server
    port: 587, // SMTP port (STARTTLS)
    secure: false, // true for implicit TLS (port 465)
    senderName: "Radio Recorder", // Display name on outgoing mail
    stationName: "the station", // Used in email bodies
    retentionDays: 90, // How long recordings stay in the bucket, quoted to hosts
  },
  network: {
    retryCount: 3, // Retry attempts for uploads
    retryBackoffMs: 5000, // Base delay; doubles per attempt
    requestTimeoutMs: 10000, // Per-request timeout for the schedule API
    uploadTimeoutMs: 10 * 60 * 1000, // Per-attempt upload timeout
    emailTimeoutMs: 30000, // SMTP connection, greeting and socket timeout per attempt
  },
  logging: {
    level: "info", // Log level: "debug", "info", "warn", "error"
    format: "pretty", // Log format: "pretty" (human-readable) or "json"
    color: true, // Enable colored output in terminal logs
  },
};
