import { logger as rootLogger, type ContextLogger } from "./logger.js";
import type { RawSlot, Timeslot } from "./types.js";
import { parseApiDate, sanitizeFileStem } from "./utils.js";

export type PlanOptions = {
  now: Date;
  excludedCategories: readonly string[];
  /** Slots starting later than this are left for a later refresh. */
  horizonMs?: number;
  /** Ids already warned about as past; the planner adds to it. */
  reportedPast?: Set<string>;
  logger?: ContextLogger;
};

export function isExcludedCategory(
  category: string | null,
  excludedCategories: readonly string[]
) {
  if (!category) return false;
  const normalized = category.trim().toLowerCase();
  return excludedCategories.some((item) => item.trim().toLowerCase() === normalized);
}

export function planTimeslots(
  records: readonly RawSlot[],
  knownIds: ReadonlySet<string>,
  options: PlanOptions
): Timeslot[] {
  const log = options.logger ?? rootLogger.withContext({ component: "planner" });
  const nowMs = options.now.getTime();
  const seen = new Set<string>();
  const planned: Timeslot[] = [];

  for (const record of records) {
    if (isExcludedCategory(record.category, options.excludedCategories)) {
      log.debug("planner.slot.excluded", { timeslotId: record.id, category: record.category });
      continue;
    }
    if (knownIds.has(record.id) || seen.has(record.id)) {
      continue;
    }

    const start = parseApiDate(record.start);
    const end = parseApiDate(record.end);
    if (!start || !end || end.getTime() <= start.getTime()) {
      log.warn("planner.slot.invalid_window", {
        timeslotId: record.id,
        start: record.start,
        end: record.end
      });
      continue;
    }
    if (start.getTime() < nowMs) {
      // Shows already on air come back on every refresh until they end.
      const detail = { timeslotId: record.id, show: record.title, start: start.toISOString() };
      if (options.reportedPast?.has(record.id)) {
        log.debug("planner.slot.past", detail);
      } else {
        log.warn("planner.slot.past", detail);
        options.reportedPast?.add(record.id);
      }
      continue;
    }
    if (options.horizonMs !== undefined && start.getTime() > nowMs + options.horizonMs) {
      log.debug("planner.slot.beyond_horizon", { timeslotId: record.id });
      continue;
    }

    seen.add(record.id);
    planned.push({
      id: record.id,
      showName: record.title,
      fileStem: sanitizeFileStem(record.title, record.id),
      start,
      end,
      recipients: record.recipients,
      excluded: false
    });
  }

  // Array#sort is stable, so equal starts keep source order.
  return planned.sort((a, b) => a.start.getTime() - b.start.getTime());
}
