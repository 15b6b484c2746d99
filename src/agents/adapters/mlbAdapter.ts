import type { LiveDescription } from '../types';
import { EspnScoreboardAdapter, fallbackLive, ordinal, statusName, statusTexts, type EspnStatus } from './espnAdapter';

const HALF_INNING_PATTERN = /\b(top|bot(?:tom)?|mid(?:dle)?|end)\b(?:\s+of)?(?:\s+the)?\s+(\d{1,2})(?:st|nd|rd|th)?\b/i;
const OUTS_PATTERN = /\b(\d)\s*outs?\b/i;

type HalfInning = 'Top' | 'Bot' | 'Mid' | 'End';

function toHalf(raw: string): HalfInning {
  const lower = raw.toLowerCase();
  if (lower.startsWith('top')) return 'Top';
  if (lower.startsWith('bot')) return 'Bot';
  if (lower.startsWith('mid')) return 'Mid';
  return 'End';
}

/**
 * MLBAdapter
 *
 * Baseball reads its live state from the status text rather than the clock:
 * half-inning ("Top 7th", "Bot 9th"), the breaks between halves ("Mid 5th",
 * "End 3rd"), and the outs count.
 */
export class MLBAdapter extends EspnScoreboardAdapter {
  readonly league = 'mlb' as const;

  protected describeLive(status: EspnStatus): LiveDescription {
    const texts = statusTexts(status);
    const delayed = statusName(status).includes('DELAY');

    for (const text of texts) {
      const match = text.match(HALF_INNING_PATTERN);
      if (!match) continue;
      const half = toHalf(match[1]);
      const inning = parseInt(match[2], 10);
      // No outs during the break between halves
      const outs = half === 'Top' || half === 'Bot' ? this.extractOuts(texts) : undefined;
      return {
        periodLabel: `${half} ${ordinal(inning)}`,
        clockOrCount: delayed ? 'Delayed' : outs ?? '',
      };
    }

    if (status.period && status.period > 0) {
      return {
        periodLabel: ordinal(status.period),
        clockOrCount: delayed ? 'Delayed' : this.extractOuts(texts) ?? '',
      };
    }

    return fallbackLive(status);
  }

  /**
   * @returns "0 Outs", "1 Out", "2 Outs" or undefined
   */
  private extractOuts(texts: string[]): string | undefined {
    for (const text of texts) {
      const match = text.match(OUTS_PATTERN);
      if (match) {
        const count = parseInt(match[1], 10);
        return count === 1 ? '1 Out' : `${count} Outs`;
      }
    }
    return undefined;
  }
}
