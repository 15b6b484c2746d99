import type { Game, League, Snapshot } from "../../shared/schema";
import type { RefreshError } from "../types/errors";

/**
 * Converts one league's raw provider payload into canonical games.
 *
 * Implementations skip (and log) individual events they cannot parse and
 * throw PayloadParseError only when the payload as a whole is unusable.
 */
export interface LeagueAdapter {
  readonly league: League;
  parse(raw: unknown, fetchedAt: Date): Game[];
}

export type RefreshOutcome =
  | { ok: true; snapshot: Snapshot }
  | { ok: false; error: RefreshError };

// Live-status text for an in-progress game
export interface LiveDescription {
  periodLabel: string;
  clockOrCount: string;
}
