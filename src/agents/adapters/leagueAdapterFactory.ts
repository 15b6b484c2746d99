import { LEAGUES, parseLeague, type League } from '../../../shared/schema';
import type { LeagueAdapter } from '../types';
import { MLBAdapter } from './mlbAdapter';
import { NBAAdapter, WNBAAdapter } from './basketballAdapter';
import { NFLAdapter } from './nflAdapter';
import { NHLAdapter } from './nhlAdapter';
import { MLSAdapter, NWSLAdapter, PremierLeagueAdapter } from './soccerAdapter';

function assertNever(value: never): never {
  throw new Error(`Unhandled league: ${String(value)}`);
}

/**
 * LeagueAdapterFactory
 *
 * Closed dispatch over the supported leagues. Adding a league to LEAGUES
 * without a case here is a compile error.
 *
 * Usage:
 *   const adapter = LeagueAdapterFactory.getAdapter('mlb');
 *   const games = adapter.parse(payload, new Date());
 */
export class LeagueAdapterFactory {
  private static cache = new Map<League, LeagueAdapter>();

  static getAdapter(league: League): LeagueAdapter {
    const cached = this.cache.get(league);
    if (cached) return cached;
    const adapter = this.create(league);
    this.cache.set(league, adapter);
    return adapter;
  }

  private static create(league: League): LeagueAdapter {
    switch (league) {
      case 'mlb':
        return new MLBAdapter();
      case 'nba':
        return new NBAAdapter();
      case 'wnba':
        return new WNBAAdapter();
      case 'nfl':
        return new NFLAdapter();
      case 'nhl':
        return new NHLAdapter();
      case 'mls':
        return new MLSAdapter();
      case 'nwsl':
        return new NWSLAdapter();
      case 'prem':
        return new PremierLeagueAdapter();
      default:
        return assertNever(league);
    }
  }

  static getSupportedLeagues(): readonly League[] {
    return LEAGUES;
  }

  /**
   * Case-insensitive, accepts aliases such as "epl"
   */
  static isSupported(league?: string | null): boolean {
    if (league == null) return false;
    return parseLeague(league) !== undefined;
  }
}
