import type { LiveDescription } from '../types';
import { EspnScoreboardAdapter, fallbackLive, quarterLabel, statusName, type EspnStatus } from './espnAdapter';

/**
 * NFLAdapter
 *
 * Quarters Q1-Q4, then OT (2OT and beyond only happen in the playoffs).
 */
export class NFLAdapter extends EspnScoreboardAdapter {
  readonly league = 'nfl' as const;

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
