import type { League, Snapshot, ViewState } from "../../shared/schema";
import type { RefreshOutcome } from "../agents/types";
import { normalizeTeamFilter } from "../agents/normalizationRegistry";
import { logError } from "../types/errors";
import { withSource } from "../logger";

const log = withSource("store");

export interface StoreState {
  readonly snapshot?: Snapshot;
  readonly view: ViewState;
}

export type StoreChangeReason = "commit" | "scroll" | "filter" | "refresh";

export type StoreListener = (state: StoreState, reason: StoreChangeReason) => void;

// Identifies the filter a refresh was started under
export interface RefreshTicket {
  readonly filterVersion: number;
  readonly league: League;
  readonly teamFilter?: string;
}

export function clampScroll(offset: number, gameCount: number, viewportHeight: number): number {
  const max = Math.max(0, gameCount - Math.max(0, Math.floor(viewportHeight)));
  if (!Number.isFinite(offset)) return 0;
  return Math.min(Math.max(0, Math.trunc(offset)), max);
}

/**
 * Single owner of the current snapshot and the view state.
 *
 * Every mutation builds a new frozen StoreState and swaps it in with one
 * assignment, so read() always returns a consistent pair.
 */
export class LiveStateStore {
  private state: StoreState;
  private inFlight = false;
  private viewportHeight = 0;
  private readonly listeners = new Set<StoreListener>();

  constructor(initial: { league: League; teamFilter?: string }) {
    this.state = Object.freeze({
      view: Object.freeze({
        league: initial.league,
        teamFilter: normalizeTeamFilter(initial.teamFilter),
        scrollOffset: 0,
        refreshing: false,
        filterVersion: 0,
      }),
    });
  }

  read(): StoreState {
    return this.state;
  }

  get gameCount(): number {
    return this.state.snapshot?.games.length ?? 0;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Apply a refresh result. Success replaces the snapshot wholesale; failure
   * keeps the last good snapshot and records the error. Results started under
   * an older filter are dropped.
   *
   * @returns whether the outcome was applied
   */
  commitSnapshot(outcome: RefreshOutcome, ticket?: RefreshTicket, now: Date = new Date()): boolean {
    const { view, snapshot } = this.state;
    if (ticket && ticket.filterVersion !== view.filterVersion) {
      return false;
    }

    if (outcome.ok) {
      const games = outcome.snapshot.games.length;
      this.replace(
        {
          snapshot: outcome.snapshot,
          view: {
            ...view,
            lastError: undefined,
            lastRefreshAt: outcome.snapshot.fetchedAt,
            scrollOffset: clampScroll(view.scrollOffset, games, this.viewportHeight),
          },
        },
        "commit"
      );
    } else {
      this.replace(
        {
          snapshot,
          view: {
            ...view,
            lastError: { kind: outcome.error.kind, message: outcome.error.message, at: now },
          },
        },
        "commit"
      );
    }
    return true;
  }

  /**
   * Move the scroll offset, clamped to [0, max(0, gameCount - viewportHeight)].
   * The renderer passes the height it is about to draw with.
   */
  scroll(delta: number, viewportHeight: number): number {
    this.viewportHeight = Math.max(0, Math.floor(viewportHeight));
    const { view } = this.state;
    const next = clampScroll(view.scrollOffset + delta, this.gameCount, this.viewportHeight);
    if (next !== view.scrollOffset) {
      this.replace({ ...this.state, view: { ...view, scrollOffset: next } }, "scroll");
    }
    return next;
  }

  /**
   * Re-clamp after the terminal is resized
   */
  setViewportHeight(viewportHeight: number): void {
    this.scroll(0, viewportHeight);
  }

  /**
   * Switch league and/or team. Scroll resets and the view is marked
   * refreshing until the scheduler fetches for the new filter.
   */
  setFilter(league: League, team?: string): void {
    const { view } = this.state;
    const lastError = view.lastError?.kind === "no_such_team" ? undefined : view.lastError;
    this.replace(
      {
        snapshot: this.state.snapshot,
        view: {
          ...view,
          league,
          teamFilter: normalizeTeamFilter(team),
          scrollOffset: 0,
          refreshing: true,
          lastError,
          filterVersion: view.filterVersion + 1,
        },
      },
      "filter"
    );
  }

  /**
   * @returns a ticket for the current filter, or null if a refresh is already in flight
   */
  beginRefresh(): RefreshTicket | null {
    if (this.inFlight) return null;
    this.inFlight = true;
    const { view } = this.state;
    if (!view.refreshing) {
      this.replace({ ...this.state, view: { ...view, refreshing: true } }, "refresh");
    }
    return Object.freeze({
      filterVersion: view.filterVersion,
      league: view.league,
      teamFilter: view.teamFilter,
    });
  }

  /**
   * Ends the in-flight refresh. If the filter changed meanwhile the view stays
   * marked refreshing; the follow-up fetch clears it.
   */
  endRefresh(ticket?: RefreshTicket): void {
    this.inFlight = false;
    const { view } = this.state;
    const stale = ticket !== undefined && ticket.filterVersion !== view.filterVersion;
    if (view.refreshing && !stale) {
      this.replace({ ...this.state, view: { ...view, refreshing: false } }, "refresh");
    }
  }

  private replace(next: { snapshot?: Snapshot; view: ViewState }, reason: StoreChangeReason): void {
    this.state = Object.freeze({
      snapshot: next.snapshot,
      view: Object.freeze({ ...next.view }),
    });
    // A throwing listener must not abort the mutation that notified it
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(this.state, reason);
      } catch (err) {
        logError(log, err, { operation: "store listener", reason });
      }
    }
  }
}
