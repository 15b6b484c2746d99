import { LEAGUE_DESCRIPTORS, type Game, type Snapshot, type TeamSide, type ViewState } from "../../shared/schema";
import { matchesTeam } from "../agents/normalizationRegistry";
import { clampScroll } from "../state/liveStateStore";

export type RowTone = "live" | "final" | "scheduled" | "postponed";

export interface DisplayRow {
  gameId: string;
  matchup: string;
  status: string;
  records: string;
  tone: RowTone;
}

export interface ProjectionOptions {
  // IANA zone for start and refresh times; defaults to the host zone
  timeZone?: string;
}

export interface FrameOptions extends ProjectionOptions {
  msUntilNextRefresh?: number;
}

export interface Frame {
  header: string;
  rows: DisplayRow[];
  // Total games after filtering, for the "x-y of n" indicator
  total: number;
  statusLine: string;
  footer: string;
}

export function formatClockTime(date: Date, timeZone?: string): string {
  // Newer ICU data puts U+202F before AM/PM
  return date
    .toLocaleTimeString("en-US", {
      hour: "numeric",
      minute: "2-digit",
      timeZone,
    })
    .replace(/\s/g, " ");
}

function formatMatchup(away: TeamSide, home: TeamSide): string {
  if (away.score === undefined || home.score === undefined) {
    return `${away.abbreviation} @ ${home.abbreviation}`;
  }
  return `${away.abbreviation} ${away.score} - ${home.score} ${home.abbreviation}`;
}

function formatRecords(away: TeamSide, home: TeamSide): string {
  if (away.record === undefined && home.record === undefined) return "";
  return `(${away.record ?? ""}) vs (${home.record ?? ""})`;
}

export function formatStatus(game: Game, options: ProjectionOptions = {}): { text: string; tone: RowTone } {
  const status = game.status;
  switch (status.kind) {
    case "scheduled":
      return { text: formatClockTime(status.startTime, options.timeZone), tone: "scheduled" };
    case "in_progress": {
      const detail = [status.periodLabel, status.clockOrCount].filter((s) => s !== "").join(" ");
      return { text: detail ? `live - ${detail}` : "live", tone: "live" };
    }
    case "final":
      return { text: "final", tone: "final" };
    case "postponed":
      return { text: "postponed", tone: "postponed" };
  }
}

export function formatRow(game: Game, options: ProjectionOptions = {}): DisplayRow {
  const { text, tone } = formatStatus(game, options);
  return {
    gameId: game.id,
    matchup: formatMatchup(game.away, game.home),
    status: text,
    records: formatRecords(game.away, game.home),
    tone,
  };
}

/**
 * The snapshot the board may draw for this view. A snapshot kept from another
 * league is never shown under the current league's header.
 */
function shownSnapshot(snapshot: Snapshot | undefined, view: ViewState): Snapshot | undefined {
  return snapshot !== undefined && snapshot.league === view.league ? snapshot : undefined;
}

function visibleGames(snapshot: Snapshot | undefined, view: ViewState): readonly Game[] {
  const shown = shownSnapshot(snapshot, view);
  if (!shown) return [];
  const team = view.teamFilter;
  // Narrow locally only until the fetch for a new filter lands. Once that
  // fetch has failed, the kept snapshot is shown as committed.
  const pending = view.refreshing || view.lastError === undefined;
  if (team === undefined || team === shown.teamFilter || !pending) return shown.games;
  return shown.games.filter((g) => matchesTeam(g, team));
}

/**
 * Rows for the visible window. No I/O; the same inputs always give the same rows.
 */
export function projectRows(
  snapshot: Snapshot | undefined,
  view: ViewState,
  viewportHeight: number,
  options: ProjectionOptions = {}
): DisplayRow[] {
  const games = visibleGames(snapshot, view);
  const height = Math.max(0, Math.floor(viewportHeight));
  const offset = clampScroll(view.scrollOffset, games.length, height);
  return games.slice(offset, offset + height).map((g) => formatRow(g, options));
}

export function projectHeader(view: ViewState): string {
  const name = LEAGUE_DESCRIPTORS[view.league].displayName;
  const indicator = view.refreshing ? " ↻" : "";
  if (view.teamFilter !== undefined) {
    return `${name.toUpperCase()} - ${view.teamFilter.toUpperCase()}${indicator}`;
  }
  return `${name} scoreline${indicator}`;
}

/**
 * One-line summary of what the board is showing: errors first, then the
 * empty states. Empty string when there is nothing to report.
 */
export function projectStatusLine(
  snapshot: Snapshot | undefined,
  view: ViewState,
  options: ProjectionOptions = {}
): string {
  const error = view.lastError;
  if (error) {
    if (error.kind === "no_such_team") {
      return error.message;
    }
    if (view.lastRefreshAt && shownSnapshot(snapshot, view)) {
      return `stale since ${formatClockTime(view.lastRefreshAt, options.timeZone)}: ${error.message}`;
    }
    return `error: ${error.message}`;
  }
  if (!shownSnapshot(snapshot, view)) {
    return view.refreshing ? "loading..." : "";
  }
  if (visibleGames(snapshot, view).length === 0) {
    return "no games found";
  }
  return "";
}

export function projectFooter(total: number, viewportHeight: number, msUntilNextRefresh?: number): string {
  const parts = ["q - quit", "r - refresh", "←/→ - league"];
  if (total > viewportHeight) parts.push("↑/↓ - scroll");
  parts.push(msUntilNextRefresh === undefined ? "next: -" : `next: ${Math.ceil(msUntilNextRefresh / 1000)}s`);
  return parts.join(" | ");
}

export function projectFrame(
  snapshot: Snapshot | undefined,
  view: ViewState,
  viewportHeight: number,
  options: FrameOptions = {}
): Frame {
  const total = visibleGames(snapshot, view).length;
  return {
    header: projectHeader(view),
    rows: projectRows(snapshot, view, viewportHeight, options),
    total,
    statusLine: projectStatusLine(snapshot, view, options),
    footer: projectFooter(total, viewportHeight, options.msUntilNextRefresh),
  };
}
