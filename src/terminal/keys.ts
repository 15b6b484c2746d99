import { LEAGUES, type League } from '../../shared/schema';
import type { LiveStateStore } from '../state/liveStateStore';
import type { RefreshScheduler } from '../jobs/refreshScheduler';

// Shape of readline's keypress event
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
}

export type Action =
  | { type: 'scroll'; delta: number }
  | { type: 'page'; direction: 1 | -1 }
  | { type: 'refresh' }
  | { type: 'cycleLeague'; direction: 1 | -1 }
  | { type: 'clearTeam' }
  | { type: 'quit' };

export function keyToAction(key: KeyPress): Action | null {
  if (key.ctrl && key.name === 'c') return { type: 'quit' };
  switch (key.name) {
    case 'q':
      return { type: 'quit' };
    case 'r':
      return { type: 'refresh' };
    case 'up':
    case 'k':
      return { type: 'scroll', delta: -1 };
    case 'down':
    case 'j':
      return { type: 'scroll', delta: 1 };
    case 'pageup':
      return { type: 'page', direction: -1 };
    case 'pagedown':
      return { type: 'page', direction: 1 };
    case 'left':
      return { type: 'cycleLeague', direction: -1 };
    case 'right':
      return { type: 'cycleLeague', direction: 1 };
    case 'c':
      return { type: 'clearTeam' };
    default:
      return null;
  }
}

export function nextLeague(current: League, direction: 1 | -1): League {
  const index = LEAGUES.indexOf(current);
  return LEAGUES[(index + direction + LEAGUES.length) % LEAGUES.length];
}

export interface ActionContext {
  store: LiveStateStore;
  scheduler: Pick<RefreshScheduler, 'requestRefresh'>;
  viewportHeight: number;
}

/**
 * Apply one input action to the store / scheduler.
 * @returns true when the app should quit
 */
export function applyAction(action: Action, ctx: ActionContext): boolean {
  const { store, scheduler, viewportHeight } = ctx;
  switch (action.type) {
    case 'quit':
      return true;
    case 'refresh':
      scheduler.requestRefresh('manual');
      return false;
    case 'scroll':
      store.scroll(action.delta, viewportHeight);
      return false;
    case 'page':
      store.scroll(action.direction * Math.max(1, viewportHeight), viewportHeight);
      return false;
    case 'cycleLeague': {
      // A team name rarely exists in another league, so switching drops it
      store.setFilter(nextLeague(store.read().view.league, action.direction));
      return false;
    }
    case 'clearTeam': {
      const { view } = store.read();
      if (view.teamFilter !== undefined) store.setFilter(view.league);
      return false;
    }
  }
}
