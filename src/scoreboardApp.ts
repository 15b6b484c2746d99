import type { League } from "../shared/schema";
import { config } from "./config";
import { withSource } from "./logger";
import { NormalizationRegistry } from "./agents/normalizationRegistry";
import { LiveStateStore } from "./state/liveStateStore";
import { RefreshScheduler, type RefreshSource } from "./jobs/refreshScheduler";
import { projectFrame, type Frame } from "./render/projection";
import { applyAction, keyToAction, type KeyPress } from "./terminal/keys";
import { TerminalBackend } from "./terminal/terminalBackend";

const log = withSource("app");

/**
 * What the run loop needs from a terminal
 */
export interface ScoreboardBackend {
  readonly viewportHeight: number;
  init(): void;
  draw(frame: Frame): void;
  onKey(handler: (key: KeyPress) => void): void;
  onResize(handler: () => void): void;
  close(): void;
}

export interface RunOptions {
  league: League;
  team?: string;
  backend?: ScoreboardBackend;
  source?: RefreshSource;
  intervalMs?: number;
  backoffCeilingMs?: number;
  tickMs?: number;
  timeZone?: string;
}

export interface RunningScoreboard {
  store: LiveStateStore;
  scheduler: RefreshScheduler;
  // Resolves with the exit code once the user quits
  exited: Promise<number>;
}

/**
 * Wire store, scheduler and terminal together and start the loop.
 *
 * The render path only ever reads a store snapshot; input handlers and the
 * scheduler are the only writers.
 *
 * @throws StartupError when the backend cannot initialize
 */
export function startScoreboard(options: RunOptions): RunningScoreboard {
  const backend = options.backend ?? new TerminalBackend();
  backend.init();

  const store = new LiveStateStore({ league: options.league, teamFilter: options.team });
  const scheduler = new RefreshScheduler(store, options.source ?? new NormalizationRegistry(), {
    intervalMs: options.intervalMs ?? config.refreshIntervalMs,
    backoffCeilingMs: options.backoffCeilingMs ?? config.backoffCeilingMs,
  });

  const redraw = () => {
    const { snapshot, view } = store.read();
    backend.draw(projectFrame(snapshot, view, backend.viewportHeight, {
      msUntilNextRefresh: scheduler.msUntilNextRefresh(),
      timeZone: options.timeZone,
    }));
  };

  const exited = new Promise<number>((resolve) => {
    const unsubscribe = store.subscribe(() => redraw());
    const ticker = setInterval(redraw, options.tickMs ?? config.tickMs);

    let done = false;
    const quit = () => {
      if (done) return;
      done = true;
      clearInterval(ticker);
      unsubscribe();
      scheduler.stop();
      backend.close();
      log.info("quit");
      resolve(0);
    };

    backend.onKey((key) => {
      const action = keyToAction(key);
      if (!action) return;
      const shouldQuit = applyAction(action, {
        store,
        scheduler,
        viewportHeight: backend.viewportHeight,
      });
      if (shouldQuit) quit();
    });

    backend.onResize(() => {
      store.setViewportHeight(backend.viewportHeight);
      redraw();
    });
  });

  store.setViewportHeight(backend.viewportHeight);
  log.info({ league: options.league, team: options.team }, "scoreboard started");
  scheduler.start();
  redraw();

  return { store, scheduler, exited };
}
