import type { Timeslot } from "./types.js";

const illegalFileChars = new Set([
  "#", "%", "&", "{", "}", "\\", "$", "!", "'", "\"", ":", "@", "<", ">",
  "*", "?", "/", "+", "`", "|", "=", " ", ".", "_", "-", ",", "(", ")"
]);

const emailPattern = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

const compactOffsetPattern = /([+-]\d{2})(\d{2})$/;

export function sanitizeFileStem(title: string, fallback: string) {
  const stem = Array.from(title)
    .filter((char) => !illegalFileChars.has(char))
    .join("");
  return stem || fallback;
}

export function isValidEmail(value: string) {
  return emailPattern.test(value.trim());
}

/** Parses API instants, accepting compact offsets such as `+0000`. */
export function parseApiDate(value: string): Date | null {
  const normalized = value.trim().replace(compactOffsetPattern, "$1:$2");
  const parsed = new Date(normalized);
  return Number.isFinite(parsed.getTime()) ? parsed : null;
}

export function formatSlotStamp(date: Date, timeZone?: string) {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timeZone ?? "UTC",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);
  const map = Object.fromEntries(parts.map((part) => [part.type, part.value]));
  return `${map.year}-${map.month}-${map.day}_${map.hour}${map.minute}`;
}

export function formatLocal(date: Date, timeZone?: string) {
  return formatSlotStamp(date, timeZone).replace("_", " ").replace(/(\d{2})(\d{2})$/, "$1:$2");
}

export function formatDuration(ms: number) {
  const totalMinutes = Math.max(0, Math.round(ms / 60000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h${String(minutes).padStart(2, "0")}m` : `${minutes}m`;
}

/**
 * Renders planned timeslots as a fixed-width table, one row per host.
 * Shows without hosts get a single placeholder row.
 */
export function formatScheduleTable(slots: readonly Timeslot[], timeZone?: string) {
  const headers = ["Start", "End", "Show", "Host", "Email"];
  const rows = slots.flatMap((slot) => {
    const start = formatLocal(slot.start, timeZone);
    const end = formatLocal(slot.end, timeZone);
    if (slot.recipients.length === 0) {
      return [[start, end, slot.showName, "-", "-"]];
    }
    return slot.recipients.map((recipient) => [
      start,
      end,
      slot.showName,
      recipient.name,
      recipient.email
    ]);
  });

  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index].length))
  );
  const formatRow = (cells: string[]) =>
    `| ${cells.map((cell, index) => cell.padEnd(widths[index])).join(" | ")} |`;
  const divider = `|${widths.map((width) => "-".repeat(width + 2)).join("|")}|`;

  return [formatRow(headers), divider, ...rows.map(formatRow)].join("\n");
}
