import { describe, it, expect } from 'vitest';
import type { ViewState } from '@shared/schema';
import {
  formatClockTime,
  formatRow,
  projectFooter,
  projectFrame,
  projectHeader,
  projectRows,
  projectStatusLine,
} from '@src/render/projection';
import adapterTestUtils, { FETCHED_AT } from '@src/tests/helpers/adapterTestUtils';

const { makeGame, makeSnapshot, team } = adapterTestUtils;

const UTC = { timeZone: 'UTC' };

const baseView: ViewState = {
  league: 'mlb',
  scrollOffset: 0,
  refreshing: false,
  filterVersion: 0,
};

const liveGame = makeGame({
  id: 'live',
  home: team('Cleveland Guardians', 'CLE', { shortName: 'Guardians', score: 4, record: '88-70' }),
  away: team('Detroit Tigers', 'DET', { shortName: 'Tigers', score: 2, record: '85-73' }),
  status: { kind: 'in_progress', periodLabel: 'Top 7th', clockOrCount: '' },
});

const scheduledGame = makeGame({
  id: 'sched',
  home: team('St. Louis Cardinals', 'STL'),
  away: team('Chicago Cubs', 'CHC'),
  status: { kind: 'scheduled', startTime: new Date('2026-10-19T23:15:00Z') },
  startTime: new Date('2026-10-19T23:15:00Z'),
});

describe('formatClockTime', () => {
  it('formats hours and minutes in the given zone', () => {
    expect(formatClockTime(new Date('2026-10-19T23:15:00Z'), 'UTC')).toBe('11:15 PM');
    expect(formatClockTime(new Date('2026-10-19T09:05:00Z'), 'UTC')).toBe('9:05 AM');
  });
});

describe('formatRow', () => {
  it('formats a live game', () => {
    expect(formatRow(liveGame, UTC)).toEqual({
      gameId: 'live',
      matchup: 'DET 2 - 4 CLE',
      status: 'live - Top 7th',
      records: '(85-73) vs (88-70)',
      tone: 'live',
    });
  });

  it('includes the clock when there is one', () => {
    const game = makeGame({ id: 'q', status: { kind: 'in_progress', periodLabel: 'Q3', clockOrCount: '5:12' } });
    expect(formatRow(game, UTC).status).toBe('live - Q3 5:12');
  });

  it('shows a scheduled game with its start time and no score', () => {
    expect(formatRow(scheduledGame, UTC)).toEqual({
      gameId: 'sched',
      matchup: 'CHC @ STL',
      status: '11:15 PM',
      records: '',
      tone: 'scheduled',
    });
  });

  it('labels final and postponed games', () => {
    expect(formatRow(makeGame({ id: 'f', status: { kind: 'final' } }), UTC)).toMatchObject({
      matchup: 'AWY 0 - 1 HOM',
      status: 'final',
      tone: 'final',
    });
    expect(formatRow(makeGame({ id: 'p', status: { kind: 'postponed' } }), UTC)).toMatchObject({
      status: 'postponed',
      tone: 'postponed',
    });
  });

  it('leaves a missing record blank', () => {
    const game = makeGame({ id: 'r', away: team('Away Team', 'AWY', { score: 0, record: '1-0' }) });
    expect(formatRow(game, UTC).records).toBe('(1-0) vs ()');
  });
});

describe('projectRows', () => {
  const many = Array.from({ length: 10 }, (_, i) => makeGame({ id: `g${i}` }));

  it('returns the visible window', () => {
    const rows = projectRows(makeSnapshot(many), { ...baseView, scrollOffset: 2 }, 3, UTC);
    expect(rows.map((r) => r.gameId)).toEqual(['g2', 'g3', 'g4']);
  });

  it('clamps an offset past the end', () => {
    const rows = projectRows(makeSnapshot(many), { ...baseView, scrollOffset: 8 }, 3, UTC);
    expect(rows.map((r) => r.gameId)).toEqual(['g7', 'g8', 'g9']);
  });

  it('narrows to the team filter', () => {
    const rows = projectRows(makeSnapshot([scheduledGame, liveGame]), { ...baseView, teamFilter: 'tigers' }, 5, UTC);
    expect(rows.map((r) => r.gameId)).toEqual(['live']);
  });

  it('is empty without a snapshot', () => {
    expect(projectRows(undefined, baseView, 5)).toEqual([]);
  });

  it('shows the committed games once the new filter has failed', () => {
    const snapshot = { ...makeSnapshot([liveGame]), teamFilter: 'guardians' };
    const view: ViewState = {
      ...baseView,
      teamFilter: 'nonexistent',
      lastError: { kind: 'no_such_team', message: 'no results for filter "nonexistent"', at: FETCHED_AT },
    };
    expect(projectRows(snapshot, view, 5, UTC).map((r) => r.gameId)).toEqual(['live']);
  });

  it('narrows while the fetch for a new filter is pending', () => {
    const view: ViewState = {
      ...baseView,
      teamFilter: 'tigers',
      refreshing: true,
      lastError: { kind: 'transport', message: 'HTTP 503: Service Unavailable', at: FETCHED_AT },
    };
    const rows = projectRows(makeSnapshot([scheduledGame, liveGame]), view, 5, UTC);
    expect(rows.map((r) => r.gameId)).toEqual(['live']);
  });

  it('draws nothing from another league', () => {
    const rows = projectRows(makeSnapshot([liveGame], 'mlb'), { ...baseView, league: 'nba', refreshing: true }, 5, UTC);
    expect(rows).toEqual([]);
  });

  it('gives the same rows for the same inputs', () => {
    const snapshot = makeSnapshot([liveGame, scheduledGame]);
    expect(projectRows(snapshot, baseView, 5, UTC)).toEqual(projectRows(snapshot, baseView, 5, UTC));
  });
});

describe('projectHeader', () => {
  it('names the league', () => {
    expect(projectHeader(baseView)).toBe('MLB scoreline');
    expect(projectHeader({ ...baseView, league: 'prem' })).toBe('Premier League scoreline');
  });

  it('shows the team filter', () => {
    expect(projectHeader({ ...baseView, teamFilter: 'guardians' })).toBe('MLB - GUARDIANS');
  });

  it('marks a refresh in progress', () => {
    expect(projectHeader({ ...baseView, refreshing: true })).toBe('MLB scoreline ↻');
  });
});

describe('projectStatusLine', () => {
  const snapshot = makeSnapshot([liveGame]);
  const at = new Date('2026-10-19T18:02:00Z');

  it('shows a no-such-team message as is', () => {
    const view: ViewState = {
      ...baseView,
      teamFilter: 'nonexistent',
      lastError: { kind: 'no_such_team', message: 'no results for filter "nonexistent"', at },
    };
    expect(projectStatusLine(snapshot, view, UTC)).toBe('no results for filter "nonexistent"');
  });

  it('marks data as stale after a failed refresh', () => {
    const view: ViewState = {
      ...baseView,
      lastRefreshAt: FETCHED_AT,
      lastError: { kind: 'transport', message: 'HTTP 503: Service Unavailable', at },
    };
    expect(projectStatusLine(snapshot, view, UTC)).toBe('stale since 6:00 PM: HTTP 503: Service Unavailable');
  });

  it('shows the error alone before any data arrived', () => {
    const view: ViewState = {
      ...baseView,
      lastError: { kind: 'transport', message: 'timed out after 10000ms', at },
    };
    expect(projectStatusLine(undefined, view, UTC)).toBe('error: timed out after 10000ms');
  });

  it('does not call another league\'s games stale', () => {
    const view: ViewState = {
      ...baseView,
      league: 'nba',
      lastRefreshAt: FETCHED_AT,
      lastError: { kind: 'transport', message: 'HTTP 503: Service Unavailable', at },
    };
    expect(projectStatusLine(snapshot, view, UTC)).toBe('error: HTTP 503: Service Unavailable');
    expect(projectStatusLine(snapshot, { ...baseView, league: 'nba', refreshing: true }, UTC)).toBe('loading...');
  });

  it('shows loading and empty states', () => {
    expect(projectStatusLine(undefined, { ...baseView, refreshing: true })).toBe('loading...');
    expect(projectStatusLine(undefined, baseView)).toBe('');
    expect(projectStatusLine(makeSnapshot([]), baseView)).toBe('no games found');
    expect(projectStatusLine(snapshot, baseView)).toBe('');
  });
});

describe('projectFooter', () => {
  it('adds the scroll hint only when the list overflows', () => {
    expect(projectFooter(10, 3, 12_400)).toBe('q - quit | r - refresh | ←/→ - league | ↑/↓ - scroll | next: 13s');
    expect(projectFooter(2, 3, 0)).toBe('q - quit | r - refresh | ←/→ - league | next: 0s');
  });

  it('shows a dash while a refresh is running', () => {
    expect(projectFooter(2, 3, undefined)).toBe('q - quit | r - refresh | ←/→ - league | next: -');
  });
});

describe('projectFrame', () => {
  it('assembles every part of the frame', () => {
    const frame = projectFrame(
      makeSnapshot([scheduledGame, liveGame]),
      { ...baseView, teamFilter: 'guardians' },
      4,
      { ...UTC, msUntilNextRefresh: 30_000 }
    );

    expect(frame).toEqual({
      header: 'MLB - GUARDIANS',
      rows: [formatRow(liveGame, UTC)],
      total: 1,
      statusLine: '',
      footer: 'q - quit | r - refresh | ←/→ - league | next: 30s',
    });
  });
});
