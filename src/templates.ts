import dedent from "dedent";
import type { EmailMessage } from "./mailer.js";
import type { Spin } from "./types.js";

export type StationDetails = {
  stationName: string;
  contactAddress?: string;
  retentionDays: number;
  timeZone?: string;
};

export type AlertKind = "schedule_unavailable" | "capture_failed" | "upload_failed";

export function formatAirDate(date: Date, timeZone?: string) {
  return new Intl.DateTimeFormat("en-US", {
    timeZone: timeZone ?? "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).format(date);
}

export function formatSongList(songs: readonly Spin[]) {
  return songs.map((spin) => `${spin.song} - ${spin.artist}`).join("\n");
}

function contactLine(station: StationDetails) {
  return station.contactAddress
    ? `If there are any issues with this system, please let us know at ${station.contactAddress}.`
    : "";
}

export function recordingLinkEmail(args: {
  hostName: string;
  to: string;
  showName: string;
  airedAt: Date;
  url: string;
  songs?: readonly Spin[];
  station: StationDetails;
}): EmailMessage {
  const { station } = args;
  const intro = dedent`
    Hey ${args.hostName}!

    This is an automated email from ${station.stationName}.

    You can use the link below to download your show.
    We only keep your recording for ${station.retentionDays} days, so download it to keep it permanently.

    Download here: ${args.url}
  `;
  const songs =
    args.songs && args.songs.length > 0
      ? `Spins during your show:\n${formatSongList(args.songs)}`
      : "";

  return {
    to: args.to,
    subject: `${args.showName} Recording Link - ${formatAirDate(args.airedAt, station.timeZone)}`,
    text: [intro, songs, contactLine(station)].filter(Boolean).join("\n\n") + "\n"
  };
}

/** Sent to the operator when a host's public address is unusable. */
export function missingAddressEmail(args: {
  hostName: string;
  invalidAddress: string;
  to: string;
  cc?: string;
  showName: string;
  url: string;
  station: StationDetails;
}): EmailMessage {
  const text = dedent`
    The public email address for ${args.hostName} needs to be updated (currently "${args.invalidAddress}").

    Their show "${args.showName}" has been recorded and can be downloaded here: ${args.url}

    Forward this email to the host so they can access the recording, and update their
    email address in the schedule for future shows.
  `;
  return {
    to: args.to,
    cc: args.cc,
    subject: `Public Email Address Needs Updating - ${args.showName}`,
    text: `${text}\n`
  };
}

const alertSubjects: Record<AlertKind, string> = {
  schedule_unavailable: "Recorder: schedule API unavailable",
  capture_failed: "Recorder: capture failed",
  upload_failed: "Recorder: upload failed"
};

const alertSummaries: Record<AlertKind, string> = {
  schedule_unavailable:
    "The recorder was unable to retrieve the show schedule after several attempts. Check the API key and the schedule API URL.",
  capture_failed:
    "The recorder was unable to capture a show. If this happens often, check the stream URL and the ffmpeg installation.",
  upload_failed:
    "The recorder was unable to upload a recorded show. The file was kept on disk so it can be recovered manually."
};

export function alertEmail(args: {
  kind: AlertKind;
  to: string;
  cc?: string;
  detail: Record<string, unknown>;
  station: StationDetails;
}): EmailMessage {
  const details = Object.entries(args.detail)
    .map(([key, value]) => `${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join("\n");
  const summary = dedent`
    This is an automated message from the ${args.station.stationName} recorder.

    ${alertSummaries[args.kind]}
  `;
  return {
    to: args.to,
    cc: args.cc,
    subject: alertSubjects[args.kind],
    text: [summary, details].filter(Boolean).join("\n\n") + "\n"
  };
}
