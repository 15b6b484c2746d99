import { describe, it, expect } from 'vitest';
import { MLBAdapter } from '@src/agents/adapters/mlbAdapter';
import { PayloadParseError } from '@src/types/errors';
import adapterTestUtils, { FETCHED_AT, type EventOptions } from '@src/tests/helpers/adapterTestUtils';

const { loadFixtureJson, espnEvent, scoreboard, assertGameBasic } = adapterTestUtils;

const CLE = { name: 'Cleveland Guardians', shortName: 'Guardians', abbreviation: 'CLE', score: '4' };
const DET = { name: 'Detroit Tigers', shortName: 'Tigers', abbreviation: 'DET', score: '2' };

function liveGame(overrides: Partial<EventOptions>) {
  const adapter = new MLBAdapter();
  const games = adapter.parse(
    scoreboard(espnEvent({ id: 'g1', home: CLE, away: DET, state: 'in', ...overrides })),
    FETCHED_AT
  );
  expect(games).toHaveLength(1);
  return games[0];
}

describe('MLBAdapter.parse (ESPN JSON)', () => {
  it('parses every well-formed event in the fixture and skips the broken one', () => {
    const adapter = new MLBAdapter();
    const games = adapter.parse(loadFixtureJson('espn/mlb-scoreboard.sample.json'), FETCHED_AT);

    // The duplicate id is left for the registry to collapse
    expect(games.map((g) => g.id)).toEqual(['401700101', '401700102', '401700103', '401700102']);
    games.forEach(assertGameBasic);
  });

  it('maps an in-progress game to the canonical shape', () => {
    const adapter = new MLBAdapter();
    const [game] = adapter.parse(loadFixtureJson('espn/mlb-scoreboard.sample.json'), FETCHED_AT);

    expect(game.league).toBe('mlb');
    expect(game.home).toEqual({
      name: 'Cleveland Guardians',
      shortName: 'Guardians',
      abbreviation: 'CLE',
      record: '88-70',
      score: 4,
    });
    expect(game.away.abbreviation).toBe('DET');
    expect(game.away.score).toBe(2);
    expect(game.status).toEqual({ kind: 'in_progress', periodLabel: 'Top 7th', clockOrCount: '' });
    expect(game.startTime).toEqual(new Date('2026-10-19T17:10:00Z'));
    expect(game.lastUpdated).toBe(FETCHED_AT);
  });

  it('drops placeholder scores and unusable records on scheduled games', () => {
    const adapter = new MLBAdapter();
    const games = adapter.parse(loadFixtureJson('espn/mlb-scoreboard.sample.json'), FETCHED_AT);
    const scheduled = games[2];

    expect(scheduled.status).toEqual({ kind: 'scheduled', startTime: new Date('2026-10-19T23:15:00Z') });
    expect(scheduled.home.score).toBeUndefined();
    expect(scheduled.away.score).toBeUndefined();
    expect(scheduled.away.record).toBeUndefined();
    expect(scheduled.away.name).toBe('Chicago Cubs');
  });

  it('maps a completed game to final', () => {
    const adapter = new MLBAdapter();
    const games = adapter.parse(loadFixtureJson('espn/mlb-scoreboard.sample.json'), FETCHED_AT);
    expect(games[1].status).toEqual({ kind: 'final' });
    expect(games[1].home.score).toBe(5);
    expect(games[1].away.record).toBe('94-68');
  });

  it('returns frozen games', () => {
    const [game] = new MLBAdapter().parse(loadFixtureJson('espn/mlb-scoreboard.sample.json'), FETCHED_AT);
    expect(Object.isFrozen(game)).toBe(true);
    expect(Object.isFrozen(game.home)).toBe(true);
  });

  it('throws PayloadParseError when the events list is missing', () => {
    const adapter = new MLBAdapter();
    expect(() => adapter.parse({ leagues: [] }, FETCHED_AT)).toThrow(PayloadParseError);
    expect(() => adapter.parse('not json', FETCHED_AT)).toThrow(PayloadParseError);
  });

  it('returns an empty list for a day with no games', () => {
    expect(new MLBAdapter().parse({ events: [] }, FETCHED_AT)).toEqual([]);
  });

  it('skips an in-progress game without a score', () => {
    const adapter = new MLBAdapter();
    const event = espnEvent({
      id: 'g1',
      home: { ...CLE, score: undefined },
      away: DET,
      state: 'in',
      detail: 'Top 1st',
    });
    expect(adapter.parse(scoreboard(event), FETCHED_AT)).toEqual([]);
  });

  it('skips a game whose two sides are the same team', () => {
    const adapter = new MLBAdapter();
    const event = espnEvent({ id: 'g1', home: CLE, away: CLE, state: 'post' });
    expect(adapter.parse(scoreboard(event), FETCHED_AT)).toEqual([]);
  });

  it('skips a game with an unparseable start time', () => {
    const adapter = new MLBAdapter();
    const event = espnEvent({ id: 'g1', date: 'someday', home: CLE, away: DET, state: 'post' });
    expect(adapter.parse(scoreboard(event), FETCHED_AT)).toEqual([]);
  });

  it('keeps parsing after a bad event', () => {
    const adapter = new MLBAdapter();
    const games = adapter.parse(
      scoreboard(
        { id: 'broken' },
        espnEvent({ id: 'g2', home: CLE, away: DET, state: 'post' })
      ),
      FETCHED_AT
    );
    expect(games.map((g) => g.id)).toEqual(['g2']);
  });

  it('ignores a record that is not W-L', () => {
    const adapter = new MLBAdapter();
    const [game] = adapter.parse(
      scoreboard(espnEvent({ id: 'g1', home: { ...CLE, record: 'first place' }, away: { ...DET, record: '85-73' }, state: 'post' })),
      FETCHED_AT
    );
    expect(game.home.record).toBeUndefined();
    expect(game.away.record).toBe('85-73');
  });

  describe('postponed statuses', () => {
    it.each(['STATUS_POSTPONED', 'STATUS_CANCELED', 'STATUS_SUSPENDED'])('maps %s to postponed', (statusName) => {
      const adapter = new MLBAdapter();
      const [game] = adapter.parse(
        scoreboard(espnEvent({ id: 'g1', home: CLE, away: DET, state: 'pre', statusName })),
        FETCHED_AT
      );
      expect(game.status).toEqual({ kind: 'postponed' });
    });

    it('treats an incomplete post-game state as postponed', () => {
      const adapter = new MLBAdapter();
      const [game] = adapter.parse(
        scoreboard(espnEvent({ id: 'g1', home: CLE, away: DET, state: 'post', statusName: 'STATUS_RAIN', completed: false })),
        FETCHED_AT
      );
      expect(game.status).toEqual({ kind: 'postponed' });
    });
  });

  describe('live status', () => {
    it('reads the half inning and outs', () => {
      expect(liveGame({ detail: 'Bottom 9th, 2 Outs' }).status).toEqual({
        kind: 'in_progress',
        periodLabel: 'Bot 9th',
        clockOrCount: '2 Outs',
      });
    });

    it('uses the singular for one out', () => {
      expect(liveGame({ detail: 'Top 1st, 1 Out' }).status).toEqual({
        kind: 'in_progress',
        periodLabel: 'Top 1st',
        clockOrCount: '1 Out',
      });
    });

    it('labels the middle of an inning without outs', () => {
      expect(liveGame({ detail: 'Middle 5th' }).status).toEqual({
        kind: 'in_progress',
        periodLabel: 'Mid 5th',
        clockOrCount: '',
      });
    });

    it('labels the end of an inning', () => {
      expect(liveGame({ detail: 'End of the 3rd' }).status).toEqual({
        kind: 'in_progress',
        periodLabel: 'End 3rd',
        clockOrCount: '',
      });
    });

    it('marks a rain delay', () => {
      expect(liveGame({ detail: 'Top 4th', statusName: 'STATUS_DELAYED' }).status).toEqual({
        kind: 'in_progress',
        periodLabel: 'Top 4th',
        clockOrCount: 'Delayed',
      });
    });

    it('falls back to the inning number when the text has no half', () => {
      expect(liveGame({ detail: 'In Progress', period: 6 }).status).toEqual({
        kind: 'in_progress',
        periodLabel: '6th',
        clockOrCount: '',
      });
    });

    it('falls back to a generic label with neither text nor period', () => {
      expect(liveGame({}).status).toEqual({
        kind: 'in_progress',
        periodLabel: 'In Progress',
        clockOrCount: '',
      });
    });
  });
});
