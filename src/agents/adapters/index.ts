/**
 * Adapters Module
 *
 * Central export point for all league adapters and the factory.
 */

export { LeagueAdapterFactory } from './leagueAdapterFactory';
export { EspnScoreboardAdapter } from './espnAdapter';
export { MLBAdapter } from './mlbAdapter';
export { BasketballAdapter, NBAAdapter, WNBAAdapter } from './basketballAdapter';
export { NFLAdapter } from './nflAdapter';
export { NHLAdapter } from './nhlAdapter';
export { SoccerAdapter, MLSAdapter, NWSLAdapter, PremierLeagueAdapter } from './soccerAdapter';
