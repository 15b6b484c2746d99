import { leagueSchema, type Game, type GameStatusKind, type League, type Snapshot, type TeamSide } from "../../shared/schema";
import type { LeagueAdapter, RefreshOutcome } from "./types";
import { LeagueAdapterFactory } from "./adapters";
import { espnFetcher, type ScoreboardTransport } from "../utils/espnFetcher";
import { NoSuchTeamError, PayloadParseError, toRefreshError } from "../types/errors";
import { withSource } from "../logger";

const log = withSource("registry");

const STATUS_PRIORITY: Record<GameStatusKind, number> = {
  in_progress: 0,
  scheduled: 1,
  final: 2,
  postponed: 3,
};

/**
 * Trimmed filter, or undefined when the input is empty
 */
export function normalizeTeamFilter(team?: string | null): string | undefined {
  const trimmed = (team ?? "").trim();
  return trimmed === "" ? undefined : trimmed;
}

function sideMatches(side: TeamSide, needle: string): boolean {
  return (
    side.name.toLowerCase().includes(needle) ||
    (side.shortName?.toLowerCase().includes(needle) ?? false) ||
    side.abbreviation.toLowerCase() === needle
  );
}

/**
 * Case-insensitive: substring of either team's name or short name, or an
 * exact abbreviation.
 */
export function matchesTeam(game: Game, team: string): boolean {
  const needle = team.toLowerCase();
  return sideMatches(game.home, needle) || sideMatches(game.away, needle);
}

function completeness(game: Game): number {
  let score = 0;
  for (const side of [game.home, game.away]) {
    if (side.score !== undefined) score++;
    if (side.record !== undefined) score++;
    if (side.shortName !== undefined) score++;
  }
  return score;
}

/**
 * One game per id. The provider sometimes repeats an event across sections;
 * the copy with more populated fields wins, ties keep the first seen.
 */
export function dedupeGames(games: readonly Game[]): Game[] {
  const byId = new Map<string, Game>();
  for (const game of games) {
    const existing = byId.get(game.id);
    if (!existing || completeness(game) > completeness(existing)) {
      byId.set(game.id, game);
    }
  }
  return Array.from(byId.values());
}

export function compareGames(a: Game, b: Game): number {
  const byStatus = STATUS_PRIORITY[a.status.kind] - STATUS_PRIORITY[b.status.kind];
  if (byStatus !== 0) return byStatus;
  const byStart = a.startTime.getTime() - b.startTime.getTime();
  if (byStart !== 0) return byStart;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function sortGames(games: readonly Game[]): Game[] {
  return games.slice().sort(compareGames);
}

/**
 * Routes raw league payloads through the matching adapter and turns the result
 * into a filtered, deduplicated, ordered snapshot.
 */
export class NormalizationRegistry {
  private readonly transport: ScoreboardTransport;
  private readonly adapterFor: (league: League) => LeagueAdapter;

  constructor(
    transport: ScoreboardTransport = espnFetcher,
    adapterFor: (league: League) => LeagueAdapter = (league) => LeagueAdapterFactory.getAdapter(league)
  ) {
    this.transport = transport;
    this.adapterFor = adapterFor;
  }

  /**
   * Fetch one league's scoreboard and normalize it. Never rejects: every
   * failure comes back as a RefreshError on the outcome.
   */
  async fetchAndNormalize(
    league: League,
    teamFilter?: string,
    options: { signal?: AbortSignal; now?: () => Date } = {}
  ): Promise<RefreshOutcome> {
    const validLeague = leagueSchema.safeParse(league);
    if (!validLeague.success) {
      return {
        ok: false,
        error: new PayloadParseError(`unsupported league: ${String(league)}`, { league }),
      };
    }

    let raw: unknown;
    try {
      raw = await this.transport.fetchScoreboard(validLeague.data, { signal: options.signal });
    } catch (err) {
      const error = toRefreshError(err, { league: validLeague.data });
      log.warn({ league: validLeague.data, code: error.code, err: error.message }, "registry: fetch failed");
      return { ok: false, error };
    }

    const fetchedAt = (options.now ?? (() => new Date()))();
    try {
      return { ok: true, snapshot: this.normalize(validLeague.data, raw, teamFilter, fetchedAt) };
    } catch (err) {
      const error = err instanceof NoSuchTeamError || err instanceof PayloadParseError
        ? err
        : new PayloadParseError(err instanceof Error ? err.message : String(err), { league: validLeague.data });
      log.warn({ league: validLeague.data, code: error.code, err: error.message }, "registry: normalize failed");
      return { ok: false, error };
    }
  }

  /**
   * Pure part of the pipeline: adapter, team filter, dedupe, sort.
   * @throws PayloadParseError, NoSuchTeamError
   */
  normalize(league: League, raw: unknown, teamFilter: string | undefined, fetchedAt: Date): Snapshot {
    const team = normalizeTeamFilter(teamFilter);
    const parsed = this.adapterFor(league).parse(raw, fetchedAt);

    let games = parsed;
    if (team !== undefined) {
      games = parsed.filter((g) => matchesTeam(g, team));
      // An empty league is "no games", not a bad filter
      if (games.length === 0 && parsed.length > 0) {
        throw new NoSuchTeamError(team, league);
      }
    }

    const ordered = sortGames(dedupeGames(games));
    log.debug({ league, team, parsed: parsed.length, kept: ordered.length }, "registry: normalized");

    return Object.freeze({
      games: Object.freeze(ordered),
      fetchedAt,
      league,
      teamFilter: team,
    });
  }
}
