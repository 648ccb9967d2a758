import { describe, expect, it } from "vitest";
import { buildSmtpOptions } from "./mailer.js";

describe("buildSmtpOptions", () => {
  it("bounds each send with the client's own timeouts", () => {
    expect(
      buildSmtpOptions({
        host: "smtp.example.test",
        port: 587,
        secure: false,
        address: "recorder@example.org",
        password: "test-password",
        timeoutMs: 30_000
      })
    ).toEqual({
      host: "smtp.example.test",
      port: 587,
      secure: false,
      requireTLS: true,
      auth: { user: "recorder@example.org", pass: "test-password" },
      connectionTimeout: 30_000,
      greetingTimeout: 30_000,
      socketTimeout: 30_000
    });
  });
});
