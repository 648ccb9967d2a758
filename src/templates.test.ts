import { describe, expect, it } from "vitest";
import { alertEmail, formatAirDate, recordingLinkEmail } from "./templates.js";

const station = {
  stationName: "KTST",
  contactAddress: "ops@example.org",
  retentionDays: 30,
  timeZone: "America/Los_Angeles"
};

describe("formatAirDate", () => {
  it("uses the station's local date", () => {
    const lateEvening = new Date("2026-05-11T05:30:00Z");
    expect(formatAirDate(lateEvening)).toBe("05/11/2026");
    expect(formatAirDate(lateEvening, "America/Los_Angeles")).toBe("05/10/2026");
  });
});

describe("recordingLinkEmail", () => {
  it("renders the link email without spins", () => {
    const message = recordingLinkEmail({
      hostName: "Ana",
      to: "ana@example.org",
      showName: "Jazz Hour",
      airedAt: new Date("2026-05-11T05:30:00Z"),
      url: "https://cdn.example.test/JazzHour.mp3",
      station
    });

    expect(message.to).toBe("ana@example.org");
    expect(message.subject).toBe("Jazz Hour Recording Link - 05/10/2026");
    expect(message.text).toBe(
      [
        "Hey Ana!",
        "",
        "This is an automated email from KTST.",
        "",
        "You can use the link below to download your show.",
        "We only keep your recording for 30 days, so download it to keep it permanently.",
        "",
        "Download here: https://cdn.example.test/JazzHour.mp3",
        "",
        "If there are any issues with this system, please let us know at ops@example.org.",
        ""
      ].join("\n")
    );
  });
});

describe("alertEmail", () => {
  it("lists details as key/value lines", () => {
    const message = alertEmail({
      kind: "capture_failed",
      to: "ops@example.org",
      detail: { show: "Jazz Hour", attempts: 2 },
      station
    });

    expect(message.subject).toBe("Recorder: capture failed");
    expect(message.text.startsWith("This is an automated message from the KTST recorder.\n\n")).toBe(true);
    expect(message.text.endsWith("\n\nshow: Jazz Hour\nattempts: 2\n")).toBe(true);
  });
});
