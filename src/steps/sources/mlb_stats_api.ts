import _ from 'lodash';
import { asArray, asObject, asString, isIsoDate, normalizeName, readNumber } from '../../utils';
import {
  loadStatCatalog,
  ObservedStatEvent,
  PerGameFetchFailure,
  PlayerNotFoundError,
  StatCatalog,
} from '../timeline';
import { extractPlayerStat } from './boxscore';
import { GameStatSource, ScheduledGame } from './types';

export const DEFAULT_MLB_STATS_API_URL = 'https://statsapi.mlb.com/api/v1';

const REGULAR_SEASON = 'R';
const SKIPPED_STATES = new Set(['Postponed', 'Cancelled']);

export interface RosterEntry {
  id: number;
  fullName: string;
  teamId?: number;
  position?: string;
}

export interface MlbStatsApiOptions {
  baseUrl?: string;
  fetchFn?: typeof fetch;
  catalog?: StatCatalog;
}

function parseRosterEntry(raw: unknown): RosterEntry | undefined {
  const person = asObject(raw);
  const id = readNumber(person?.id);
  const fullName = asString(person?.fullName);
  if (!person || id === undefined || !fullName) return undefined;
  return {
    id,
    fullName,
    teamId: readNumber(asObject(person.currentTeam)?.id),
    position: asString(asObject(person.primaryPosition)?.abbreviation),
  };
}

export function parseSchedule(raw: unknown): ScheduledGame[] {
  const games: ScheduledGame[] = [];
  asArray(asObject(raw)?.dates).forEach((day) => {
    const dayObj = asObject(day);
    asArray(dayObj?.games).forEach((entry) => {
      const game = asObject(entry);
      if (!game || game.gameType !== REGULAR_SEASON) return;
      const state = asString(asObject(game.status)?.detailedState);
      if (state && SKIPPED_STATES.has(state)) return;
      const gameId = readNumber(game.gamePk);
      const date = asString(game.officialDate) ?? asString(dayObj?.date);
      if (gameId === undefined || !date || !isIsoDate(date)) return;
      games.push({ gameId, date });
    });
  });
  return _.sortBy(games, (game) => game.date);
}

/**
 * Game data from the public MLB Stats API. Player lookups are cached per
 * season; schedules and boxscores are fetched on every call.
 */
export class MlbStatsApiSource implements GameStatSource {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly catalog: StatCatalog;
  private readonly playersBySeason = new Map<number, RosterEntry[]>();

  constructor(options: MlbStatsApiOptions = {}) {
    this.baseUrl = (options.baseUrl ?? process.env.MLB_STATS_API_URL ?? DEFAULT_MLB_STATS_API_URL).replace(/\/$/, '');
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.catalog = options.catalog ?? loadStatCatalog();
  }

  private async getJson(pathname: string, params?: Record<string, string | number>): Promise<unknown> {
    const query = new URLSearchParams();
    Object.entries(params ?? {}).forEach(([key, value]) => query.append(key, String(value)));
    const qs = query.toString();
    const url = `${this.baseUrl}${pathname}${qs ? `?${qs}` : ''}`;

    const response = await this.fetchFn(url);
    if (!response.ok) {
      throw new Error(`MLB Stats API error (${response.status}) for ${url}`);
    }
    const body: unknown = await response.json();
    return body;
  }

  private async seasonPlayers(season: number): Promise<RosterEntry[]> {
    const cached = this.playersBySeason.get(season);
    if (cached) return cached;

    const raw = await this.getJson('/sports/1/players', { season });
    const players = asArray(asObject(raw)?.people)
      .map(parseRosterEntry)
      .filter((entry): entry is RosterEntry => entry !== undefined);
    this.playersBySeason.set(season, players);
    return players;
  }

  async lookupPlayer(player: string, season: number): Promise<RosterEntry> {
    const wanted = normalizeName(player);
    const players = await this.seasonPlayers(season);
    const match = players.find((entry) => normalizeName(entry.fullName) === wanted);
    if (!match) {
      throw new PlayerNotFoundError(player, season);
    }
    return match;
  }

  async teamForPlayer(player: string, season: number): Promise<number> {
    const entry = await this.lookupPlayer(player, season);
    if (entry.teamId === undefined) {
      throw new PlayerNotFoundError(player, season);
    }
    return entry.teamId;
  }

  async scheduledGames(season: number, teamId: number): Promise<ScheduledGame[]> {
    const raw = await this.getJson('/schedule', {
      sportId: 1,
      season,
      teamId,
      gameType: REGULAR_SEASON,
    });
    return parseSchedule(raw);
  }

  async scheduleWindow(season: number, teamId: number): Promise<string[]> {
    const games = await this.scheduledGames(season, teamId);
    return games.map((game) => game.date);
  }

  async boxscore(gameId: number): Promise<unknown> {
    return this.getJson(`/game/${gameId}/boxscore`);
  }

  /**
   * One event per team game the player appears in. A game whose boxscore
   * cannot be fetched or read is skipped with a warning.
   */
  async eventsForPlayer(player: string, season: number, statName: string): Promise<ObservedStatEvent[]> {
    const teamId = await this.teamForPlayer(player, season);
    const games = await this.scheduledGames(season, teamId);
    const events: ObservedStatEvent[] = [];

    console.info(`Counting stat "${statName}" for ${player} in ${season} (${games.length} games)`);
    for (const game of games) {
      try {
        const value = extractPlayerStat(await this.boxscore(game.gameId), player, statName, this.catalog);
        if (value !== undefined) {
          events.push({ date: game.date, value });
        }
      } catch (err) {
        const failure = new PerGameFetchFailure(game.gameId, err);
        console.warn(failure.message);
      }
    }
    console.info(`   ${events.length} appearances for ${player}`);

    return events;
  }
}
