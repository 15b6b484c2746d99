import { describe, it, expect } from 'vitest';
import { NFLAdapter } from '@src/agents/adapters/nflAdapter';
import adapterTestUtils, { FETCHED_AT, type EventOptions } from '@src/tests/helpers/adapterTestUtils';

const { espnEvent, scoreboard } = adapterTestUtils;

const KC = { name: 'Kansas City Chiefs', shortName: 'Chiefs', abbreviation: 'KC', score: '17', record: '6-1' };
const BUF = { name: 'Buffalo Bills', shortName: 'Bills', abbreviation: 'BUF', score: '14', record: '5-2' };

function nflStatus(overrides: Partial<EventOptions>) {
  const [game] = new NFLAdapter().parse(
    scoreboard(espnEvent({ id: 'f1', home: KC, away: BUF, state: 'in', ...overrides })),
    FETCHED_AT
  );
  return game.status;
}

describe('NFLAdapter', () => {
  it('shows the quarter and clock', () => {
    expect(nflStatus({ period: 4, displayClock: '2:00' })).toEqual({
      kind: 'in_progress',
      periodLabel: 'Q4',
      clockOrCount: '2:00',
    });
  });

  it('labels overtime', () => {
    expect(nflStatus({ period: 5, displayClock: '8:31' })).toEqual({
      kind: 'in_progress',
      periodLabel: 'OT',
      clockOrCount: '8:31',
    });
  });

  it('shows halftime', () => {
    expect(nflStatus({ period: 2, statusName: 'STATUS_HALFTIME' })).toEqual({
      kind: 'in_progress',
      periodLabel: 'Half',
      clockOrCount: '',
    });
  });

  it('keeps team records', () => {
    const [game] = new NFLAdapter().parse(
      scoreboard(espnEvent({ id: 'f1', home: KC, away: BUF, state: 'post' })),
      FETCHED_AT
    );
    expect(game.league).toBe('nfl');
    expect(game.home.record).toBe('6-1');
    expect(game.away.record).toBe('5-2');
  });
});
