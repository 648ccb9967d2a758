import { z } from "zod";
import { RemoteUnavailableError, errorMessage } from "./errors.js";
import { logger as rootLogger, type ContextLogger } from "./logger.js";
import type { RawSlot, Recipient, Spin, Timeslot } from "./types.js";
import { parseApiDate } from "./utils.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type ScheduleSource = {
  fetchUpcoming: (limit: number) => Promise<RawSlot[]>;
  fetchSpins: (timeslot: Timeslot) => Promise<Spin[]>;
};

export type ScheduleApiConfig = {
  baseUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  /** How long a resolved host persona is reused across refreshes. */
  personaCacheTtlMs?: number;
};

const DEFAULT_PERSONA_TTL_MS = 6 * 60 * 60 * 1000;

const showSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  start: z.string(),
  end: z.string(),
  category: z.string().nullish().transform((value) => value ?? null),
  _links: z
    .object({
      personas: z.array(z.object({ href: z.string() })).optional()
    })
    .passthrough()
    .optional()
});

const showListSchema = z.object({
  items: z.array(showSchema)
});

const personaSchema = z.object({
  id: z.union([z.string(), z.number()]),
  name: z.string(),
  email: z.string().nullish()
});

const spinListSchema = z.object({
  items: z.array(
    z.object({
      song: z.string().nullish(),
      artist: z.string().nullish(),
      start: z.string()
    })
  )
});

const MAX_SPIN_COUNT = 200;

export function spinCountFor(durationMs: number) {
  return Math.min(Math.floor(durationMs / 1000 / 360) + 10, MAX_SPIN_COUNT);
}

export function createScheduleSource(
  config: ScheduleApiConfig,
  deps: { fetch?: FetchLike; logger?: ContextLogger; now?: () => number } = {}
): ScheduleSource {
  const now = deps.now ?? Date.now;
  const personaTtlMs = config.personaCacheTtlMs ?? DEFAULT_PERSONA_TTL_MS;
  const personas = new Map<string, { recipient: Recipient; expiresAt: number }>();
  const lookups = new Map<string, Promise<Recipient | null>>();
  const fetchImpl: FetchLike = deps.fetch ?? ((url, init) => fetch(url, init));
  const log = deps.logger ?? rootLogger.withContext({ component: "schedule" });
  const baseUrl = config.baseUrl.replace(/\/+$/, "");

  async function getJson(url: string): Promise<unknown> {
    const response = await fetchImpl(url, {
      headers: {
        accept: "application/json",
        authorization: `Bearer ${config.apiKey}`
      },
      signal: AbortSignal.timeout(config.requestTimeoutMs)
    });
    if (!response.ok) {
      const text = await response.text();
      throw new Error(`GET ${redact(url)} failed: ${response.status} ${text.slice(0, 200)}`);
    }
    return response.json();
  }

  function resolvePersona(href: string): Promise<Recipient | null> {
    const cached = personas.get(href);
    if (cached && cached.expiresAt > now()) {
      return Promise.resolve(cached.recipient);
    }
    // Hosts with several shows share one request.
    const pending = lookups.get(href);
    if (pending) return pending;
    const lookup = fetchPersona(href).finally(() => lookups.delete(href));
    lookups.set(href, lookup);
    return lookup;
  }

  async function fetchPersona(href: string): Promise<Recipient | null> {
    try {
      const persona = personaSchema.parse(await getJson(href));
      const recipient = { name: persona.name, email: persona.email?.trim() ?? "" };
      personas.set(href, { recipient, expiresAt: now() + personaTtlMs });
      return recipient;
    } catch (error) {
      log.warn("schedule.persona.failed", { href: redact(href), error: errorMessage(error) });
      return null;
    }
  }

  return {
    async fetchUpcoming(limit) {
      const url = `${baseUrl}/shows?count=${limit}`;
      log.debug("schedule.fetch.start", { url, limit });

      let shows: z.infer<typeof showListSchema>["items"];
      try {
        shows = showListSchema.parse(await getJson(url)).items;
      } catch (error) {
        throw new RemoteUnavailableError(`Schedule fetch failed: ${errorMessage(error)}`, {
          cause: error,
          context: { url }
        });
      }

      // All hosts resolve concurrently; a refresh waits for one round of lookups at most.
      const slots = await Promise.all(
        shows.map(async (show): Promise<RawSlot> => {
          const resolved = await Promise.all(
            (show._links?.personas ?? []).map((link) => resolvePersona(link.href))
          );
          return {
            id: show.id,
            title: show.title,
            start: show.start,
            end: show.end,
            category: show.category,
            recipients: resolved.filter((recipient): recipient is Recipient => recipient !== null)
          };
        })
      );

      log.debug("schedule.fetch.done", { count: slots.length });
      return sortByStart(slots);
    },

    async fetchSpins(timeslot) {
      const durationMs = timeslot.end.getTime() - timeslot.start.getTime();
      const url = `${baseUrl}/spins?count=${spinCountFor(durationMs)}`;
      try {
        const { items } = spinListSchema.parse(await getJson(url));
        const spins = items
          .map((item) => ({ item, at: parseApiDate(item.start) }))
          .filter(
            ({ at }) =>
              at !== null &&
              at.getTime() >= timeslot.start.getTime() &&
              at.getTime() <= timeslot.end.getTime()
          )
          .map(({ item }) => ({
            song: item.song ?? "Unknown Song",
            artist: item.artist ?? "Unknown Artist",
            start: item.start
          }));
        // The API lists newest first.
        return spins.reverse();
      } catch (error) {
        log.warn("schedule.spins.failed", {
          timeslotId: timeslot.id,
          error: errorMessage(error)
        });
        return [];
      }
    }
  };
}

function sortByStart(slots: RawSlot[]) {
  const startOf = (slot: RawSlot) => parseApiDate(slot.start)?.getTime() ?? Number.POSITIVE_INFINITY;
  return [...slots].sort((a, b) => startOf(a) - startOf(b));
}

function redact(url: string) {
  return url.replace(/(access-token|api_key|apikey)=[^&]+/gi, "$1=***");
}
