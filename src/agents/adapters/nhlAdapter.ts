import type { LiveDescription } from '../types';
import { EspnScoreboardAdapter, fallbackLive, ordinal, statusName, statusTexts, type EspnStatus } from './espnAdapter';

const SHOOTOUT_PATTERN = /\b(so|shootout)\b/i;

/**
 * NHLAdapter
 *
 * Three periods, then OT; regular-season ties go to a shootout, playoff games
 * keep adding overtimes (2OT, 3OT, ...). Intermissions show "INT".
 */
export class NHLAdapter extends EspnScoreboardAdapter {
  readonly league = 'nhl' as const;

  protected describeLive(status: EspnStatus): LiveDescription {
    const period = status.period;
    if (!period || period < 1) {
      return fallbackLive(status);
    }

    const name = statusName(status);
    const clockOrCount = name === 'STATUS_END_PERIOD' ? 'INT' : status.displayClock ?? '';

    if (period <= 3) {
      return { periodLabel: `${ordinal(period)} Period`, clockOrCount };
    }
    if (name.includes('SHOOTOUT') || statusTexts(status).some((t) => SHOOTOUT_PATTERN.test(t))) {
      return { periodLabel: 'SO', clockOrCount: '' };
    }
    return {
      periodLabel: period === 4 ? 'OT' : `${period - 3}OT`,
      clockOrCount,
    };
  }
}
