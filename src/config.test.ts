import { describe, expect, it } from "vitest";
import { defaultConfig } from "../config.defaults.js";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const baseEnv = {
  SCHEDULE_API_KEY: "test-key",
  STREAM_URL: "http://stream.example.test/live",
  EMAIL_ADDRESS: "recorder@example.org",
  EMAIL_PASSWORD: "test-password",
  BUCKET_NAME: "recordings-bucket"
};

describe("loadConfig", () => {
  it("fills in the file defaults", () => {
    const config = loadConfig(baseEnv, defaultConfig);

    expect(config.timeZone).toBe("America/Los_Angeles");
    expect(config.schedule).toEqual({
      baseUrl: "https://spinitron.com/api",
      apiKey: "test-key",
      count: 24,
      excludedCategories: ["Automation"],
      refreshIntervalMs: 3_600_000,
      horizonHours: 26
    });
    expect(config.recorder).toMatchObject({
      streamUrl: "http://stream.example.test/live",
      outputDir: "recordings",
      format: "mp3",
      pollIntervalMs: 1000,
      minDurationMs: 300_000
    });
    expect(config.storage).toMatchObject({
      type: "s3",
      bucket: "recordings-bucket",
      region: "us-west-1",
      deleteAfterUpload: true
    });
    expect(config.email).toMatchObject({ host: "smtp.gmail.com", port: 587, secure: false });
    expect(config.network.retryCount).toBe(3);
    expect(config.logging).toMatchObject({ level: "info", format: "pretty", color: true });
  });

  it("lets the environment override defaults", () => {
    const config = loadConfig(
      {
        ...baseEnv,
        BUCKET_NAME: undefined,
        BUCKET_URI: "s3://other-bucket",
        EXCLUDED_CATEGORIES: "Automation, Sports ,",
        POLL_INTERVAL_MS: "250",
        SMTP_SECURE: "true",
        SMTP_PORT: "465",
        LOG_COLOR: "0",
        TIMEZONE: "UTC"
      },
      defaultConfig
    );

    expect(config.storage.bucket).toBe("other-bucket");
    expect(config.schedule.excludedCategories).toEqual(["Automation", "Sports"]);
    expect(config.recorder.pollIntervalMs).toBe(250);
    expect(config.email).toMatchObject({ secure: true, port: 465 });
    expect(config.logging).toMatchObject({ color: false, timeZone: "UTC" });
    expect(config.timeZone).toBe("UTC");
  });

  it("applies schema defaults to an empty config file", () => {
    const config = loadConfig(baseEnv, {});

    expect(config.timeZone).toBeUndefined();
    expect(config.schedule.horizonHours).toBeUndefined();
    expect(config.logging.format).toBe("json");
    expect(config.email.retentionDays).toBe(90);
  });

  const invalid: [string, Record<string, string | undefined>, RegExp][] = [
    ["a missing API key", { ...baseEnv, SCHEDULE_API_KEY: undefined }, /SCHEDULE_API_KEY/],
    ["a missing stream", { ...baseEnv, STREAM_URL: undefined }, /STREAM_URL/],
    ["a bad sender address", { ...baseEnv, EMAIL_ADDRESS: "not-an-address" }, /EMAIL_ADDRESS/],
    ["a missing password", { ...baseEnv, EMAIL_PASSWORD: undefined }, /EMAIL_PASSWORD/],
    ["a bad admin address", { ...baseEnv, ADMIN_EMAIL: "ops" }, /ADMIN_EMAIL/],
    ["S3 without a bucket", { ...baseEnv, BUCKET_NAME: undefined }, /BUCKET_NAME/],
    ["a non-numeric interval", { ...baseEnv, POLL_INTERVAL_MS: "soon" }, /Invalid environment/]
  ];

  for (const [name, env, message] of invalid) {
    it(`rejects ${name}`, () => {
      expect(() => loadConfig(env, defaultConfig)).toThrow(ConfigError);
      expect(() => loadConfig(env, defaultConfig)).toThrow(message);
    });
  }

  it("does not need a bucket for local storage", () => {
    const config = loadConfig({ ...baseEnv, BUCKET_NAME: undefined, BUCKET_TYPE: "local" }, defaultConfig);
    expect(config.storage).toMatchObject({ type: "local", bucket: undefined });
  });
});
