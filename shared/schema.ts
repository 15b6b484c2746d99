import { z } from "zod";

export const LEAGUES = ["mlb", "nba", "wnba", "nfl", "nhl", "mls", "nwsl", "prem"] as const;

export const leagueSchema = z.enum(LEAGUES);

export type League = z.infer<typeof leagueSchema>;

export type SportFamily = "baseball" | "basketball" | "football" | "hockey" | "soccer";

export interface LeagueDescriptor {
  league: League;
  displayName: string;
  sport: SportFamily;
  // Path segment under the provider's sports root, e.g. "baseball/mlb"
  espnPath: string;
}

export const LEAGUE_DESCRIPTORS: Readonly<Record<League, LeagueDescriptor>> = {
  mlb: { league: "mlb", displayName: "MLB", sport: "baseball", espnPath: "baseball/mlb" },
  nba: { league: "nba", displayName: "NBA", sport: "basketball", espnPath: "basketball/nba" },
  wnba: { league: "wnba", displayName: "WNBA", sport: "basketball", espnPath: "basketball/wnba" },
  nfl: { league: "nfl", displayName: "NFL", sport: "football", espnPath: "football/nfl" },
  nhl: { league: "nhl", displayName: "NHL", sport: "hockey", espnPath: "hockey/nhl" },
  mls: { league: "mls", displayName: "MLS", sport: "soccer", espnPath: "soccer/usa.1" },
  nwsl: { league: "nwsl", displayName: "NWSL", sport: "soccer", espnPath: "soccer/usa.nwsl" },
  prem: { league: "prem", displayName: "Premier League", sport: "soccer", espnPath: "soccer/eng.1" },
};

const LEAGUE_ALIASES: Readonly<Record<string, League>> = {
  premier: "prem",
  epl: "prem",
  "premier-league": "prem",
};

/**
 * Resolve user input (case-insensitive, aliases allowed) to a league code.
 * Returns undefined for anything outside the supported set.
 */
export function parseLeague(input: string): League | undefined {
  const normalized = input.trim().toLowerCase();
  const parsed = leagueSchema.safeParse(LEAGUE_ALIASES[normalized] ?? normalized);
  return parsed.success ? parsed.data : undefined;
}

export interface TeamSide {
  name: string;
  shortName?: string;
  abbreviation: string;
  // "W-L" or "W-L-T/D"
  record?: string;
  score?: number;
}

export type GameStatus =
  | { kind: "scheduled"; startTime: Date }
  | { kind: "in_progress"; periodLabel: string; clockOrCount: string }
  | { kind: "final" }
  | { kind: "postponed" };

export type GameStatusKind = GameStatus["kind"];

export interface Game {
  readonly id: string;
  readonly league: League;
  readonly home: Readonly<TeamSide>;
  readonly away: Readonly<TeamSide>;
  readonly status: Readonly<GameStatus>;
  readonly startTime: Date;
  readonly lastUpdated: Date;
}

export interface Snapshot {
  readonly games: readonly Game[];
  readonly fetchedAt: Date;
  readonly league: League;
  readonly teamFilter?: string;
}

export type ErrorKind = "transport" | "parse" | "no_such_team";

export interface ViewError {
  kind: ErrorKind;
  message: string;
  at: Date;
}

export interface ViewState {
  readonly league: League;
  readonly teamFilter?: string;
  readonly scrollOffset: number;
  readonly lastError?: ViewError;
  readonly lastRefreshAt?: Date;
  readonly refreshing: boolean;
  // Bumped on every filter change; tags in-flight refreshes
  readonly filterVersion: number;
}
