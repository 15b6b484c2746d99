import type { LiveDescription } from '../types';
import { EspnScoreboardAdapter, fallbackLive, statusName, type EspnStatus } from './espnAdapter';

// "45'+2'" -> "45'+2"
const STOPPAGE_PATTERN = /^(\d+'\+\d+)'$/;

function matchPhase(period: number): string {
  if (period === 1) return '1H';
  if (period === 2) return '2H';
  if (period <= 4) return 'ET';
  return 'PEN';
}

export function normalizeMinute(displayClock: string | undefined): string {
  const clock = (displayClock ?? '').trim();
  if (clock === '' || clock === "0'") return '';
  return clock.replace(STOPPAGE_PATTERN, '$1');
}

/**
 * Soccer runs its clock up: the live label is the match minute with
 * stoppage time, followed by the phase (1H, 2H, ET, PEN).
 */
export abstract class SoccerAdapter extends EspnScoreboardAdapter {
  protected describeLive(status: EspnStatus): LiveDescription {
    if (statusName(status) === 'STATUS_HALFTIME') {
      return { periodLabel: 'HT', clockOrCount: '' };
    }
    const period = status.period;
    if (!period || period < 1) {
      return fallbackLive(status);
    }

    const phase = matchPhase(period);
    const minute = normalizeMinute(status.displayClock);
    if (phase === 'PEN' || minute === '') {
      return { periodLabel: phase, clockOrCount: '' };
    }
    return { periodLabel: minute, clockOrCount: phase };
  }
}

export class MLSAdapter extends SoccerAdapter {
  readonly league = 'mls' as const;
}

export class NWSLAdapter extends SoccerAdapter {
  readonly league = 'nwsl' as const;
}

export class PremierLeagueAdapter extends SoccerAdapter {
  readonly league = 'prem' as const;
}
