import type { League } from "../../shared/schema";
import type { RefreshOutcome } from "../agents/types";
import type { LiveStateStore } from "../state/liveStateStore";
import { logError, toRefreshError } from "../types/errors";
import { withSource } from "../logger";

const log = withSource("scheduler");

export type SchedulerState = "idle" | "fetching" | "backoff" | "stopped";

export type RefreshReason = "startup" | "timer" | "manual" | "filter";

export interface RefreshSource {
  fetchAndNormalize(
    league: League,
    teamFilter?: string,
    options?: { signal?: AbortSignal }
  ): Promise<RefreshOutcome>;
}

export interface RefreshSchedulerOptions {
  intervalMs: number;
  backoffCeilingMs: number;
  // Consecutive transport failures before the wait starts doubling
  backoffThreshold?: number;
  now?: () => number;
}

export interface SchedulerHealth {
  state: SchedulerState;
  delayMs: number;
  consecutiveTransportFailures: number;
  completedCount: number;
  failedCount: number;
  lastCompletedAt?: string;
  lastFailedAt?: string;
  lastError?: string | null;
}

/**
 * Drives refreshes: Idle -> Fetching -> (Idle | Backoff).
 *
 * At most one fetch is in flight. Manual requests during a fetch are dropped;
 * a filter change during a fetch reruns as soon as it returns, since the
 * in-flight result belongs to the old filter and the store discards it.
 */
export class RefreshScheduler {
  private current: SchedulerState = "idle";
  private timer?: ReturnType<typeof setTimeout>;
  private controller?: AbortController;
  private inFlight?: Promise<void>;
  private rerunPending = false;
  private delayMs: number;
  private transportFailures = 0;
  private nextAt?: number;
  private unsubscribe?: () => void;
  private readonly health: Omit<SchedulerHealth, "state" | "delayMs" | "consecutiveTransportFailures"> = {
    completedCount: 0,
    failedCount: 0,
  };

  private readonly intervalMs: number;
  private readonly backoffCeilingMs: number;
  private readonly backoffThreshold: number;
  private readonly now: () => number;

  constructor(
    private readonly store: LiveStateStore,
    private readonly source: RefreshSource,
    options: RefreshSchedulerOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.backoffCeilingMs = Math.max(options.backoffCeilingMs, options.intervalMs);
    this.backoffThreshold = Math.max(1, options.backoffThreshold ?? 2);
    this.now = options.now ?? Date.now;
    this.delayMs = this.intervalMs;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get currentDelayMs(): number {
    return this.delayMs;
  }

  msUntilNextRefresh(): number | undefined {
    if (this.nextAt === undefined || this.current === "fetching") return undefined;
    return Math.max(0, this.nextAt - this.now());
  }

  getHealth(): SchedulerHealth {
    return {
      ...this.health,
      state: this.current,
      delayMs: this.delayMs,
      consecutiveTransportFailures: this.transportFailures,
    };
  }

  /**
   * Fetch now, then keep refreshing on the timer. Filter changes on the
   * store trigger an immediate refresh.
   */
  start(): void {
    if (this.current === "stopped") return;
    this.unsubscribe = this.store.subscribe((_state, reason) => {
      if (reason === "filter") this.requestRefresh("filter");
    });
    this.requestRefresh("startup");
  }

  /**
   * @returns false when the request was dropped (stopped, or a manual/timer
   * request while a fetch is already running)
   */
  requestRefresh(reason: RefreshReason): boolean {
    if (this.current === "stopped") return false;
    if (this.current === "fetching") {
      if (reason === "filter") {
        this.rerunPending = true;
        return true;
      }
      log.debug({ reason }, "refresh coalesced");
      return false;
    }
    this.launch(reason);
    return true;
  }

  /**
   * Stop accepting triggers, abort the in-flight fetch and drop its result
   */
  stop(): void {
    if (this.current === "stopped") return;
    this.current = "stopped";
    this.clearTimer();
    this.nextAt = undefined;
    this.rerunPending = false;
    this.controller?.abort();
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    log.info("scheduler stopped");
  }

  /**
   * Resolves once the current cycle (if any) has settled
   */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private launch(reason: RefreshReason): void {
    this.clearTimer();
    const cycle = this.runCycle(reason).catch((err) => {
      logError(log, err, { operation: "refresh", reason });
    });
    this.inFlight = cycle;
  }

  private async runCycle(reason: RefreshReason): Promise<void> {
    const ticket = this.store.beginRefresh();
    if (!ticket) {
      log.debug({ reason }, "refresh already in flight");
      return;
    }

    this.current = "fetching";
    this.nextAt = undefined;
    const controller = new AbortController();
    this.controller = controller;
    const startedAt = this.now();
    log.debug({ reason, league: ticket.league, team: ticket.teamFilter }, "refresh started");

    let outcome: RefreshOutcome;
    try {
      outcome = await this.source.fetchAndNormalize(ticket.league, ticket.teamFilter, {
        signal: controller.signal,
      });
    } catch (err) {
      outcome = { ok: false, error: toRefreshError(err, { league: ticket.league }) };
    } finally {
      if (this.controller === controller) this.controller = undefined;
    }

    // A result arriving after quit is discarded
    if (this.state === "stopped") return;

    let applied = false;
    try {
      applied = this.store.commitSnapshot(outcome, ticket, new Date(this.now()));
    } finally {
      this.store.endRefresh(ticket);
    }
    this.record(outcome, applied, this.now() - startedAt);

    if (this.rerunPending) {
      this.rerunPending = false;
      this.launch("filter");
      return;
    }
    this.scheduleNext();
  }

  private record(outcome: RefreshOutcome, applied: boolean, durationMs: number): void {
    if (outcome.ok) {
      this.transportFailures = 0;
      this.delayMs = this.intervalMs;
      this.current = "idle";
      this.health.completedCount += 1;
      this.health.lastCompletedAt = new Date(this.now()).toISOString();
      this.health.lastError = null;
      log.info({ games: outcome.snapshot.games.length, durationMs, applied }, "refresh completed");
      return;
    }

    this.health.failedCount += 1;
    this.health.lastFailedAt = new Date(this.now()).toISOString();
    this.health.lastError = outcome.error.message;

    if (outcome.error.kind === "transport") {
      this.transportFailures += 1;
    } else {
      // The provider answered, so the outage streak is over
      this.transportFailures = 0;
    }

    if (this.transportFailures >= this.backoffThreshold) {
      const exponent = this.transportFailures - 1;
      this.delayMs = Math.min(this.intervalMs * Math.pow(2, exponent), this.backoffCeilingMs);
      this.current = "backoff";
      log.warn(
        { failures: this.transportFailures, delayMs: this.delayMs, err: outcome.error.message },
        "refresh failed; backing off"
      );
    } else {
      this.delayMs = this.intervalMs;
      this.current = "idle";
      log.warn({ kind: outcome.error.kind, err: outcome.error.message, applied }, "refresh failed");
    }
  }

  private scheduleNext(): void {
    this.clearTimer();
    this.nextAt = this.now() + this.delayMs;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.requestRefresh("timer");
    }, this.delayMs);
  }

  private clearTimer(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
