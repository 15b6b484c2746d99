import type { LiveDescription } from '../types';
import { EspnScoreboardAdapter, fallbackLive, quarterLabel, statusName, type EspnStatus } from './espnAdapter';

/**
 * Four quarters, five-minute overtimes. NBA and WNBA share the status shape.
 */
export abstract class BasketballAdapter extends EspnScoreboardAdapter {
  protected describeLive(status: EspnStatus): LiveDescription {
    const name = statusName(status);
    if (name === 'STATUS_HALFTIME') {
      return { periodLabel: 'Half', clockOrCount: '' };
    }
    if (!status.period || status.period < 1) {
      return fallbackLive(status);
    }
    return {
      periodLabel: quarterLabel(status.period),
      clockOrCount: name === 'STATUS_END_PERIOD' ? 'End' : status.displayClock ?? '',
    };
  }
}

export class NBAAdapter extends BasketballAdapter {
  readonly league = 'nba' as const;
}

export class WNBAAdapter extends BasketballAdapter {
  readonly league = 'wnba' as const;
}
