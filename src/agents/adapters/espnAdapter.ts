import { z } from 'zod';
import type { Game, GameStatus, League, TeamSide } from '../../../shared/schema';
import type { LeagueAdapter, LiveDescription } from '../types';
import { GameParseError, PayloadParseError } from '../../types/errors';
import { withSource } from '../../logger';

const log = withSource('adapter');

// Non-essential fields fall back to undefined instead of failing the event
const lenientString = z.string().optional().catch(undefined);

const espnTeamSchema = z.object({
  id: z.union([z.string(), z.number()]).optional().catch(undefined),
  displayName: lenientString,
  shortDisplayName: lenientString,
  name: lenientString,
  abbreviation: lenientString,
});

const espnRecordSchema = z.object({
  name: lenientString,
  type: lenientString,
  summary: lenientString,
});

const espnCompetitorSchema = z.object({
  homeAway: lenientString,
  team: espnTeamSchema.optional(),
  score: z.union([z.string(), z.number()]).optional().catch(undefined),
  records: z.array(espnRecordSchema).optional().catch(undefined),
});

const espnStatusTypeSchema = z.object({
  name: lenientString,
  state: lenientString,
  completed: z.boolean().optional().catch(undefined),
  description: lenientString,
  detail: lenientString,
  shortDetail: lenientString,
});

const espnStatusSchema = z.object({
  displayClock: lenientString,
  period: z.number().optional().catch(undefined),
  type: espnStatusTypeSchema.optional(),
});

const espnCompetitionSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  date: z.string().optional(),
  competitors: z.array(z.unknown()).optional(),
  status: espnStatusSchema.optional(),
});

const espnEventSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  date: z.string().optional(),
  name: lenientString,
  shortName: lenientString,
  competitions: z.array(espnCompetitionSchema).optional(),
  status: espnStatusSchema.optional(),
});

const espnScoreboardSchema = z.object({
  events: z.array(z.unknown()),
});

export type EspnStatus = z.infer<typeof espnStatusSchema>;
type EspnCompetitor = z.infer<typeof espnCompetitorSchema>;

const POSTPONED_STATUS_NAMES = new Set([
  'STATUS_POSTPONED',
  'STATUS_CANCELED',
  'STATUS_SUSPENDED',
  'STATUS_FORFEIT',
]);

const RECORD_PATTERN = /^\d+-\d+(?:-\d+)?$/;

export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1: return `${n}st`;
    case 2: return `${n}nd`;
    case 3: return `${n}rd`;
    default: return `${n}th`;
  }
}

/**
 * Label for sports played in quarters: Q1-Q4, then OT, 2OT, ...
 */
export function quarterLabel(period: number): string {
  if (period <= 4) return `Q${period}`;
  if (period === 5) return 'OT';
  return `${period - 4}OT`;
}

export function statusName(status: EspnStatus): string {
  return (status.type?.name ?? '').toUpperCase();
}

/**
 * Status text sources in the order ESPN fills them most reliably
 */
export function statusTexts(status: EspnStatus): string[] {
  const t = status.type;
  return [t?.shortDetail, t?.detail, t?.description]
    .filter((s): s is string => typeof s === 'string' && s.trim() !== '');
}

/**
 * Used when a live game carries no usable period number
 */
export function fallbackLive(status: EspnStatus): LiveDescription {
  return {
    periodLabel: statusTexts(status)[0] ?? 'In Progress',
    clockOrCount: '',
  };
}

function parseScore(raw: EspnCompetitor['score']): number | undefined {
  if (raw === undefined) return undefined;
  const n = typeof raw === 'number' ? raw : Number(raw.trim());
  if (typeof raw === 'string' && raw.trim() === '') return undefined;
  return Number.isInteger(n) && n >= 0 ? n : undefined;
}

function parseRecord(competitor: EspnCompetitor): string | undefined {
  const records = competitor.records ?? [];
  const overall = records.find((r) => r.type === 'total' || r.name?.toLowerCase() === 'overall') ?? records[0];
  const summary = overall?.summary?.trim();
  return summary && RECORD_PATTERN.test(summary) ? summary : undefined;
}

/**
 * Shared parser for ESPN "site API" scoreboards. Every league served by that
 * API has the same event/competition/competitor envelope; subclasses only
 * describe how a live game's period and clock read in their sport.
 */
export abstract class EspnScoreboardAdapter implements LeagueAdapter {
  abstract readonly league: League;

  protected abstract describeLive(status: EspnStatus): LiveDescription;

  parse(raw: unknown, fetchedAt: Date): Game[] {
    const payload = espnScoreboardSchema.safeParse(raw);
    if (!payload.success) {
      throw new PayloadParseError(`${this.league}: scoreboard payload has no events list`, {
        league: this.league,
        issues: payload.error.issues.map((i) => i.path.join('.') || '(root)'),
      });
    }

    const games: Game[] = [];
    payload.data.events.forEach((rawEvent, index) => {
      try {
        games.push(this.parseEvent(rawEvent, fetchedAt));
      } catch (err) {
        if (!(err instanceof GameParseError)) throw err;
        log.warn(
          { league: this.league, index, field: err.field, code: err.code, eventId: err.context?.eventId },
          'adapter: skipped game'
        );
      }
    });

    return games;
  }

  /**
   * @throws GameParseError when an essential field is missing or malformed
   */
  parseEvent(rawEvent: unknown, fetchedAt: Date): Game {
    const parsed = espnEventSchema.safeParse(rawEvent);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw GameParseError.invalid(issue ? issue.path.join('.') || 'event' : 'event');
    }
    const event = parsed.data;

    if (event.id === undefined || String(event.id).trim() === '') {
      throw GameParseError.missing('id');
    }
    const id = String(event.id);
    const context = { eventId: id };

    const competition = event.competitions?.[0];
    if (!competition) throw GameParseError.missing('competitions[0]', context);

    const dateText = event.date ?? competition.date;
    if (!dateText) throw GameParseError.missing('date', context);
    const startTime = new Date(dateText);
    if (Number.isNaN(startTime.getTime())) throw GameParseError.invalid('date', context);

    const competitors = (competition.competitors ?? [])
      .map((c) => espnCompetitorSchema.safeParse(c))
      .flatMap((r) => (r.success ? [r.data] : []));
    const home = this.parseSide(competitors, 'home', context);
    const away = this.parseSide(competitors, 'away', context);

    if (
      home.abbreviation.toLowerCase() === away.abbreviation.toLowerCase() ||
      home.name.toLowerCase() === away.name.toLowerCase()
    ) {
      throw GameParseError.invalid('competitors', { ...context, team: home.abbreviation });
    }

    const status = competition.status ?? event.status;
    if (!status) throw GameParseError.missing('status', context);
    const gameStatus = this.parseStatus(status, startTime, context);

    if (gameStatus.kind === 'in_progress' || gameStatus.kind === 'final') {
      if (home.score === undefined) throw GameParseError.missing('competitors.home.score', context);
      if (away.score === undefined) throw GameParseError.missing('competitors.away.score', context);
    } else if (gameStatus.kind === 'scheduled') {
      // ESPN reports "0" before first pitch / tip-off
      delete home.score;
      delete away.score;
    }

    return Object.freeze({
      id,
      league: this.league,
      home: Object.freeze(home),
      away: Object.freeze(away),
      status: Object.freeze(gameStatus),
      startTime,
      lastUpdated: fetchedAt,
    });
  }

  private parseSide(competitors: EspnCompetitor[], side: 'home' | 'away', context: Record<string, unknown>): TeamSide {
    const competitor = competitors.find((c) => c.homeAway?.toLowerCase() === side);
    if (!competitor) throw GameParseError.missing(`competitors.${side}`, context);

    const team = competitor.team;
    const name = team?.displayName ?? team?.name;
    if (!name) throw GameParseError.missing(`competitors.${side}.team.displayName`, context);
    const abbreviation = team?.abbreviation;
    if (!abbreviation) throw GameParseError.missing(`competitors.${side}.team.abbreviation`, context);

    const out: TeamSide = { name, abbreviation };
    if (team?.shortDisplayName) out.shortName = team.shortDisplayName;
    const record = parseRecord(competitor);
    if (record !== undefined) out.record = record;
    const score = parseScore(competitor.score);
    if (score !== undefined) out.score = score;
    return out;
  }

  private parseStatus(status: EspnStatus, startTime: Date, context: Record<string, unknown>): GameStatus {
    if (POSTPONED_STATUS_NAMES.has(statusName(status))) {
      return { kind: 'postponed' };
    }

    switch (status.type?.state?.toLowerCase()) {
      case 'pre':
        return { kind: 'scheduled', startTime };
      case 'in':
        return { kind: 'in_progress', ...this.describeLive(status) };
      case 'post':
        return status.type?.completed === false ? { kind: 'postponed' } : { kind: 'final' };
      default:
        throw GameParseError.missing('status.type.state', context);
    }
  }
}
